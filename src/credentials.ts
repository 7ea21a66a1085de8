/**
 * Credential loading from the environment.
 *
 * The signing core never reads files or variables itself; this module is
 * the collaborator that turns `.env`-style configuration into a
 * {@link Credential}.
 *
 * Variables, per environment:
 * - `DEMO_KEYID` / `DEMO_KEYFILE`
 * - `PROD_KEYID` / `PROD_KEYFILE`
 *
 * `*_KEYFILE` is a path to a PEM file.
 */

import * as fs from "fs";
import * as dotenv from "dotenv";
import { createCredential, SigningError, type Credential } from "./auth";
import type { Environment } from "./shared/constants";

/**
 * Names of the variables holding the key id and key file path.
 */
export function credentialVariables(environment: Environment): {
  keyId: string;
  keyFile: string;
} {
  const prefix = environment === "demo" ? "DEMO" : "PROD";
  return { keyId: `${prefix}_KEYID`, keyFile: `${prefix}_KEYFILE` };
}

/**
 * Load a credential from a variables map (defaults to `process.env`).
 *
 * @throws {SigningError} If a variable is missing or the key file is unreadable
 */
export function loadCredentialFromEnv(
  environment: Environment,
  env: NodeJS.ProcessEnv = process.env,
  readFile: (path: string) => string = (path) => fs.readFileSync(path, "utf8")
): Credential {
  const names = credentialVariables(environment);
  const keyId = env[names.keyId];
  const keyFile = env[names.keyFile];
  if (!keyId) {
    throw SigningError.invalidKey(`${names.keyId} is not set`);
  }
  if (!keyFile) {
    throw SigningError.invalidKey(`${names.keyFile} is not set`);
  }

  let pem: string;
  try {
    pem = readFile(keyFile);
  } catch (e) {
    throw SigningError.invalidKey(
      `cannot read ${keyFile}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
  return createCredential(keyId, pem);
}

/**
 * Read a `.env` file into `process.env`, then load the credential.
 */
export function loadCredentialFromDotenv(
  environment: Environment,
  dotenvPath?: string
): Credential {
  dotenv.config(dotenvPath ? { path: dotenvPath } : {});
  return loadCredentialFromEnv(environment, process.env);
}

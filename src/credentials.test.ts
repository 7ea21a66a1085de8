import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { SigningError } from "./auth";
import {
  credentialVariables,
  loadCredentialFromDotenv,
  loadCredentialFromEnv,
} from "./credentials";
import { rsaKeyPair } from "../test/keys";

describe("credentialVariables", () => {
  it("names the variables per environment", () => {
    expect(credentialVariables("demo")).toEqual({ keyId: "DEMO_KEYID", keyFile: "DEMO_KEYFILE" });
    expect(credentialVariables("prod")).toEqual({ keyId: "PROD_KEYID", keyFile: "PROD_KEYFILE" });
  });
});

describe("loadCredentialFromEnv", () => {
  const env = { DEMO_KEYID: "test-key-id", DEMO_KEYFILE: "/keys/demo.pem" };

  it("reads the key file named by the environment", () => {
    const read: string[] = [];
    const credential = loadCredentialFromEnv("demo", env, (file) => {
      read.push(file);
      return rsaKeyPair().privateKey;
    });

    expect(read).toEqual(["/keys/demo.pem"]);
    expect(credential.keyId).toBe("test-key-id");
    expect(credential.privateKey.asymmetricKeyType).toBe("rsa");
  });

  it("fails when the key id is missing", () => {
    expect(() => loadCredentialFromEnv("prod", env, () => "")).toThrow(
      "Invalid key material: PROD_KEYID is not set"
    );
  });

  it("fails when the key file is missing", () => {
    expect(() => loadCredentialFromEnv("demo", { DEMO_KEYID: "test-key-id" }, () => "")).toThrow(
      "Invalid key material: DEMO_KEYFILE is not set"
    );
  });

  it("wraps read failures in a SigningError", () => {
    const load = () =>
      loadCredentialFromEnv("demo", env, () => {
        throw new Error("ENOENT");
      });

    expect(load).toThrow(SigningError);
    expect(load).toThrow("Invalid key material: cannot read /keys/demo.pem: ENOENT");
  });
});

describe("loadCredentialFromDotenv", () => {
  const saved = { id: process.env.DEMO_KEYID, file: process.env.DEMO_KEYFILE };
  let dir: string | null = null;

  afterEach(() => {
    restore("DEMO_KEYID", saved.id);
    restore("DEMO_KEYFILE", saved.file);
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  function restore(name: string, value: string | undefined): void {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }

  it("loads variables from a .env file", () => {
    delete process.env.DEMO_KEYID;
    delete process.env.DEMO_KEYFILE;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "kalshi-creds-"));
    const keyFile = path.join(dir, "demo.pem");
    const envFile = path.join(dir, ".env");
    fs.writeFileSync(keyFile, rsaKeyPair().privateKey);
    fs.writeFileSync(envFile, `DEMO_KEYID=test-key-id\nDEMO_KEYFILE=${keyFile}\n`);

    const credential = loadCredentialFromDotenv("demo", envFile);

    expect(credential.keyId).toBe("test-key-id");
    expect(credential.privateKey.type).toBe("private");
  });
});

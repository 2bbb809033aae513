// backend/services/redfish/test/security/Authenticator.spec.ts
import { describe, it, expect } from "vitest";
import { StaticCredentialAuthenticator } from "../../src/security/Authenticator";

describe("StaticCredentialAuthenticator", () => {
  const auth = new StaticCredentialAuthenticator({
    username: "root",
    password: "test-secret",
  });

  it("accepts the configured account", () => {
    expect(auth.verify({ username: "root", password: "test-secret" })).toBe(true);
  });

  it.each([
    ["wrong password", { username: "root", password: "nope" }],
    ["wrong user", { username: "admin", password: "test-secret" }],
    ["both wrong", { username: "admin", password: "nope" }],
    ["case differs", { username: "Root", password: "test-secret" }],
    ["password prefix", { username: "root", password: "test" }],
    ["empty", { username: "", password: "" }],
  ])("rejects %s", (_label, creds) => {
    expect(auth.verify(creds)).toBe(false);
  });

  it("requires a username", () => {
    expect(
      () => new StaticCredentialAuthenticator({ username: "", password: "x" })
    ).toThrow(/username is required/);
  });
});

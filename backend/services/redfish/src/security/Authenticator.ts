// backend/services/redfish/src/security/Authenticator.ts
import { createHash, timingSafeEqual } from "node:crypto";
import type { Credentials } from "./basicCredentials";

export interface Authenticator {
  verify(credentials: Credentials): Promise<boolean> | boolean;
}

/**
 * Single configured account. Both fields are compared on every call, via
 * fixed-length digests, so timing does not reveal which one (or how much of
 * it) matched.
 */
export class StaticCredentialAuthenticator implements Authenticator {
  private readonly userDigest: Buffer;
  private readonly passwordDigest: Buffer;

  public constructor(expected: Credentials) {
    if (!expected.username) {
      throw new Error("StaticCredentialAuthenticator: username is required");
    }
    this.userDigest = digest(expected.username);
    this.passwordDigest = digest(expected.password);
  }

  public verify(credentials: Credentials): boolean {
    const userOk = timingSafeEqual(digest(credentials.username), this.userDigest);
    const passwordOk = timingSafeEqual(
      digest(credentials.password),
      this.passwordDigest
    );
    return userOk && passwordOk;
  }
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

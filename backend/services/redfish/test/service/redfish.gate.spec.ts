// backend/services/redfish/test/service/redfish.gate.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { TLS_BASIC_AUTH_POLICY } from "../../src/policy/TransportPolicy";
import {
  SERVICE_ROOT_BODY,
  TEST_CREDENTIALS,
  makeApp,
} from "../helpers/server";

// TLS is terminated by a trusted proxy; X-Forwarded-Proto marks the hop.
const behindProxy = makeApp({ policy: TLS_BASIC_AUTH_POLICY, trustProxy: true });
const { username, password } = TEST_CREDENTIALS;

describe("TLS + Basic transport gate", () => {
  it("redirects cleartext requests to https on the same host", async () => {
    const res = await request(behindProxy)
      .get("/redfish/v1/?a=1")
      .set("Host", "bmc.example.test");
    expect(res.status).toBe(308);
    expect(res.headers["location"]).toBe("https://bmc.example.test/redfish/v1/?a=1");
    expect(res.headers["content-length"]).toBe("0");
    expect(res.headers["odata-version"]).toBe("4.0");
  });

  it("does not trust X-Forwarded-Proto unless configured", async () => {
    const direct = makeApp({ policy: TLS_BASIC_AUTH_POLICY, trustProxy: false });
    const res = await request(direct)
      .get("/redfish/v1/")
      .set("Host", "bmc.example.test")
      .set("X-Forwarded-Proto", "https")
      .auth(username, password);
    expect(res.status).toBe(308);
    expect(res.headers["location"]).toBe("https://bmc.example.test/redfish/v1/");
  });

  it("challenges requests without credentials", async () => {
    const res = await request(behindProxy)
      .get("/redfish/v1/")
      .set("X-Forwarded-Proto", "https");
    expect(res.status).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Basic realm="Redfish", charset="UTF-8"');
    expect(res.headers["odata-version"]).toBe("4.0");
    expect(res.headers["cache-control"]).toBe("no-cache");
    expect(res.headers["content-length"]).toBe("0");
    expect(res.text ?? "").toBe("");
  });

  it("challenges unknown paths too, so nothing leaks", async () => {
    const res = await request(behindProxy)
      .get("/redfish/v1/Systems")
      .set("X-Forwarded-Proto", "https");
    expect(res.status).toBe(401);
  });

  it("rejects a wrong password", async () => {
    const res = await request(behindProxy)
      .get("/redfish/v1/")
      .set("X-Forwarded-Proto", "https")
      .auth(username, "wrong");
    expect(res.status).toBe(401);
  });

  it("rejects a malformed Authorization header", async () => {
    const res = await request(behindProxy)
      .get("/redfish/v1/")
      .set("X-Forwarded-Proto", "https")
      .set("Authorization", "Basic not-base64!");
    expect(res.status).toBe(401);
  });

  it("advertises a configured realm", async () => {
    const app = makeApp({
      policy: TLS_BASIC_AUTH_POLICY,
      trustProxy: true,
      authRealm: "BMC",
    });
    const res = await request(app).get("/redfish").set("X-Forwarded-Proto", "https");
    expect(res.headers["www-authenticate"]).toBe('Basic realm="BMC", charset="UTF-8"');
  });

  it("serves the service root with valid credentials", async () => {
    const res = await request(behindProxy)
      .get("/redfish/v1/")
      .set("X-Forwarded-Proto", "https")
      .auth(username, password);
    expect(res.status).toBe(200);
    expect(res.text).toBe(SERVICE_ROOT_BODY);
  });

  it("keeps health probes outside the gate", async () => {
    const res = await request(behindProxy).get("/healthz");
    expect(res.status).toBe(200);
  });

  it("turns an authenticator failure into problem+json", async () => {
    const app = makeApp({
      policy: TLS_BASIC_AUTH_POLICY,
      trustProxy: true,
      authenticator: {
        verify: async () => {
          throw new Error("credential store unavailable");
        },
      },
    });
    const res = await request(app)
      .get("/redfish/v1/")
      .set("X-Forwarded-Proto", "https")
      .auth(username, password);
    expect(res.status).toBe(500);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toMatchObject({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "An unexpected error occurred.",
    });
  });

  it("refuses to build an auth gate without an authenticator", () => {
    expect(() =>
      makeApp({ policy: TLS_BASIC_AUTH_POLICY, authenticator: undefined })
    ).toThrow(/no authenticator was provided/);
  });
});

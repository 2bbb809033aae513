// backend/services/shared/middleware/problemJson.test.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { errorProblemJson } from "./problemJson";
import { asyncHandler } from "./asyncHandler";

function appThrowing(err: unknown) {
  const app = express();
  app.get(
    "/boom",
    asyncHandler(async () => {
      throw err;
    })
  );
  app.use(errorProblemJson());
  return app;
}

describe("errorProblemJson", () => {
  it("hides internals behind a generic 500", async () => {
    const res = await request(appThrowing(new Error("db password leaked"))).get("/boom");
    expect(res.status).toBe(500);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "An unexpected error occurred.",
    });
  });

  it("keeps a 4xx status and message", async () => {
    const err = Object.assign(new Error("bad input"), { statusCode: 422 });
    const res = await request(appThrowing(err)).get("/boom");
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Request Error",
      status: 422,
      detail: "bad input",
    });
  });

  it("falls back to 500 for out-of-range statuses", async () => {
    const err = Object.assign(new Error("weird"), { status: 302 });
    const res = await request(appThrowing(err)).get("/boom");
    expect(res.status).toBe(500);
  });

  it("handles non-Error throwables", async () => {
    const res = await request(appThrowing("plain string")).get("/boom");
    expect(res.status).toBe(500);
    expect(res.body.detail).toBe("An unexpected error occurred.");
  });
});

import { afterEach, describe, expect, it } from "vitest";
import { TEST_ADMIN_TOKEN, UnavailablePartitionStore } from "./helpers/fakes";
import { startApiTestServer } from "./helpers/server";

const echoOperation = {
  id: "op1",
  name: "Echo",
  tags: ["default"],
  method: "post",
  url: "/echo",
  description: "d",
  params: {}
};

const adminHeaders = {
  authorization: `Bearer ${TEST_ADMIN_TOKEN}`,
  "content-type": "application/json"
};

let closeServer: (() => Promise<void>) | undefined;

async function start(input: Parameters<typeof startApiTestServer>[0] = {}) {
  const server = await startApiTestServer(input);
  closeServer = server.close;
  return server;
}

afterEach(async () => {
  if (closeServer) {
    await closeServer();
    closeServer = undefined;
  }
});

function post(baseUrl: string, path: string, body: unknown, headers: Record<string, string> = adminHeaders) {
  return fetch(`${baseUrl}${path}`, { method: "POST", headers, body: JSON.stringify(body) });
}

describe("GET /api/ops", () => {
  it("requires the caller header", async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/api/ops`);

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Missing X-Ops-User header" }
    });
  });

  it("lists the caller's operations before shared system operations", async () => {
    const { baseUrl } = await start();
    await post(baseUrl, "/api/ops", { ops: [echoOperation] });
    await post(baseUrl, "/api/ops", { owner: "alice", ops: [{ ...echoOperation, id: "op2", name: "Mine" }] });

    const response = await fetch(`${baseUrl}/api/ops?tag=default`, { headers: { "x-ops-user": "alice" } });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      message: "Successfully retrieved available operations for user",
      data: [{ id: "op2" }, { id: "op1" }]
    });
  });

  it("returns 503 when the store cannot be read", async () => {
    const { baseUrl } = await start({ store: new UnavailablePartitionStore() });

    const response = await fetch(`${baseUrl}/api/ops`, { headers: { "x-ops-user": "alice" } });

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      success: false,
      code: "STORE_UNAVAILABLE",
      message: "Failed to read partition alice/default: connection refused"
    });
  });
});

describe("POST /api/ops", () => {
  it("registers operations for the system owner by default", async () => {
    const { baseUrl } = await start();

    const response = await post(baseUrl, "/api/ops", { ops: [echoOperation] });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      message: "Successfully associated operations with provided tags and user",
      data: [
        {
          id: "op1",
          name: "Echo",
          description: "d",
          method: "POST",
          url: "/echo",
          tags: ["default", "all"],
          params: [],
          includeAccessToken: true,
          type: "custom"
        }
      ]
    });

    const all = await fetch(`${baseUrl}/api/ops/all`, { headers: adminHeaders });
    expect(await all.json()).toMatchObject({ success: true, data: [{ id: "op1" }] });
  });

  it("rejects writes without the admin token", async () => {
    const { baseUrl } = await start();

    const missing = await post(baseUrl, "/api/ops", { ops: [echoOperation] }, { "content-type": "application/json" });
    const wrong = await post(
      baseUrl,
      "/api/ops",
      { ops: [echoOperation] },
      { authorization: "Bearer test-admin-tokem", "content-type": "application/json" }
    );

    expect(missing.status).toBe(401);
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Invalid admin token" } });
  });

  it("returns field issues for an invalid operation", async () => {
    const { baseUrl } = await start();

    const response = await post(baseUrl, "/api/ops", { ops: [{ ...echoOperation, method: "TRACE" }] });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      code: "VALIDATION_ERROR",
      message: "Operation validation failed: ops.0.method: Method must be one of GET, POST, PUT, DELETE, PATCH",
      issues: [{ path: "ops.0.method", message: "Method must be one of GET, POST, PUT, DELETE, PATCH" }]
    });
  });

  it("rejects a body without operations", async () => {
    const { baseUrl } = await start();

    const response = await post(baseUrl, "/api/ops", { ops: [] });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: "INVALID_OPS_BODY",
      details: { fieldErrors: { ops: ["ops must contain at least one operation"] } }
    });
  });

  it("rejects malformed JSON", async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/api/ops`, { method: "POST", headers: adminHeaders, body: "{" });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { code: "INVALID_JSON", message: "Request body is not valid JSON." }
    });
  });
});

describe("POST /api/ops/delete", () => {
  it("removes the operation from every tag and reports a repeat as a no-op", async () => {
    const { baseUrl } = await start();
    await post(baseUrl, "/api/ops", { ops: [echoOperation] });
    const ref = { id: "op1", name: "Echo", url: "/echo" };

    const first = await post(baseUrl, "/api/ops/delete", { op: ref });
    expect(await first.json()).toEqual({
      success: true,
      message: "Successfully deleted the specified operation(s)",
      data: { removed: 2, tags: ["default", "all"] }
    });

    const second = await post(baseUrl, "/api/ops/delete", { op: ref });
    expect(await second.json()).toEqual({
      success: true,
      message: "No matching operation(s) found to delete",
      data: { removed: 0, tags: [] }
    });

    const all = await fetch(`${baseUrl}/api/ops/all`, { headers: adminHeaders });
    expect(await all.json()).toEqual({
      success: true,
      message: "Successfully retrieved available operations for user",
      data: []
    });
  });
});

describe("health endpoints", () => {
  it("reports liveness and store readiness", async () => {
    const { baseUrl } = await start();

    const health = await fetch(`${baseUrl}/health`);
    const ready = await fetch(`${baseUrl}/ready`);

    expect(await health.json()).toEqual({ status: "ok" });
    expect(ready.status).toBe(200);
    expect(await ready.json()).toEqual({
      status: "ready",
      checks: { store: { status: "ok" } },
      timestamp: "2026-02-23T00:00:00.000Z"
    });
  });

  it("reports a degraded store", async () => {
    const { baseUrl } = await start({ store: new UnavailablePartitionStore() });

    const ready = await fetch(`${baseUrl}/ready`);

    expect(ready.status).toBe(503);
    expect(await ready.json()).toEqual({
      status: "degraded",
      checks: { store: { status: "error", message: "connection refused" } },
      timestamp: "2026-02-23T00:00:00.000Z"
    });
  });
});

import { createServer, type Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { HttpCollaborator } from "../../src/agents/http-adapter.js";
import type { WireRequest } from "../../src/agents/wire.js";
import type { Snapshot } from "../../src/workspace/types.js";
import { makeTask, result } from "../helpers/fixtures.js";

const snapshot: Snapshot = { revision: 3, files: new Map([["Makefile", "all:"]]), digest: "abc" };
const opts = () => ({ signal: new AbortController().signal, deadline: Date.now() + 5_000 });

let server: Server;
let base: string;
const received: Array<{ headers: Record<string, string | string[] | undefined>; body: unknown }> = [];

beforeAll(async () => {
  server = createServer((req, res) => {
    let body = "";
    req.on("data", (chunk: Buffer) => {
      body += chunk.toString("utf-8");
    });
    req.on("end", () => {
      if (req.method === "HEAD") {
        res.writeHead(200).end();
        return;
      }
      received.push({ headers: req.headers, body: JSON.parse(body) });
      switch (req.url) {
        case "/ok":
          res.writeHead(200, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ changeSet: { summary: "add mm", changes: [{ op: "write", path: "mm.c", content: "" }] }, cost: 0.25 }));
          break;
        case "/error":
          res.writeHead(503).end("overloaded");
          break;
        case "/billed-error":
          res.writeHead(502, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "upstream reset", cost: 0.4 }));
          break;
        case "/garbage":
          res.writeHead(200).end(JSON.stringify({ changeSet: { changes: [{ op: "rename", path: "x" }] } }));
          break;
        default:
          // /slow: never answers
          break;
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("HttpCollaborator", () => {
  it("posts the task and snapshot and returns the parsed generation", async () => {
    const worker = new HttpCollaborator({
      name: "remote",
      url: `${base}/ok`,
      roles: ["developer"],
      headers: { Authorization: "Bearer test-secret" },
    });
    const task = makeTask("mm-001", { attempts: 1, lastResult: result("rejected") });
    const generation = await worker.generate(task, snapshot, opts());

    expect(generation).toEqual({
      changeSet: { summary: "add mm", changes: [{ op: "write", path: "mm.c", content: "" }] },
      cost: 0.25,
    });
    const last = received[received.length - 1];
    expect(last?.headers.authorization).toBe("Bearer test-secret");
    const body = lastWireRequest();
    expect(body.task).toMatchObject({ id: "mm-001", attempt: 2, maxAttempts: 3, feedback: "rejected" });
    expect(body.snapshot).toEqual({ revision: 3, digest: "abc", files: { Makefile: "all:" } });
  });

  it("leaves file contents out when asked to", async () => {
    const worker = new HttpCollaborator({ name: "remote", url: `${base}/ok`, roles: ["developer"], includeFiles: false });
    await worker.generate(makeTask("a"), snapshot, opts());
    expect(lastWireRequest().snapshot).toEqual({ revision: 3, digest: "abc" });
  });

  it("fails on a non-2xx status", async () => {
    const worker = new HttpCollaborator({ name: "remote", url: `${base}/error`, roles: ["developer"] });
    await expect(worker.generate(makeTask("a"), snapshot, opts())).rejects.toMatchObject({
      code: "COLLABORATOR_FAILED",
      message: "remote: HTTP 503: overloaded",
    });
  });

  it("keeps the cost reported alongside an error status", async () => {
    const worker = new HttpCollaborator({ name: "remote", url: `${base}/billed-error`, roles: ["developer"] });
    await expect(worker.generate(makeTask("a"), snapshot, opts())).rejects.toMatchObject({
      code: "COLLABORATOR_FAILED",
      message: 'remote: HTTP 502: {"error":"upstream reset","cost":0.4}',
      cost: 0.4,
    });
  });

  it("rejects a malformed change-set", async () => {
    const worker = new HttpCollaborator({ name: "remote", url: `${base}/garbage`, roles: ["developer"] });
    await expect(worker.generate(makeTask("a"), snapshot, opts())).rejects.toMatchObject({
      code: "MALFORMED_OUTPUT",
      cost: 0,
    });
  });

  it("times out", async () => {
    const worker = new HttpCollaborator({ name: "remote", url: `${base}/slow`, roles: ["developer"], timeout: 50 });
    await expect(worker.generate(makeTask("a"), snapshot, opts())).rejects.toMatchObject({
      code: "COLLABORATOR_TIMEOUT",
      message: "remote timed out after 50ms",
    });
  });

  it("reports cancellation", async () => {
    const worker = new HttpCollaborator({ name: "remote", url: `${base}/slow`, roles: ["developer"] });
    const controller = new AbortController();
    const pending = worker.generate(makeTask("a"), snapshot, { signal: controller.signal, deadline: Date.now() + 5_000 });
    setTimeout(() => controller.abort(), 20);
    await expect(pending).rejects.toMatchObject({ code: "COLLABORATOR_CANCELLED", message: "remote: request cancelled" });
  });

  it("fails for an unreachable endpoint", async () => {
    const worker = new HttpCollaborator({ name: "down", url: "http://127.0.0.1:1", roles: ["developer"], timeout: 500 });
    await expect(worker.generate(makeTask("a"), snapshot, opts())).rejects.toMatchObject({ code: "COLLABORATOR_FAILED" });
  });

  it("checks health with a HEAD request", async () => {
    expect(await new HttpCollaborator({ name: "up", url: `${base}/ok`, roles: ["developer"] }).healthCheck()).toBe(true);
    expect(await new HttpCollaborator({ name: "down", url: "http://127.0.0.1:1", roles: ["developer"] }).healthCheck()).toBe(
      false,
    );
  });
});

function isWire(value: unknown): value is WireRequest {
  return typeof value === "object" && value !== null && "task" in value && "snapshot" in value;
}

function lastWireRequest(): WireRequest {
  const body = received[received.length - 1]?.body;
  if (!isWire(body)) throw new Error("no wire request received");
  return body;
}

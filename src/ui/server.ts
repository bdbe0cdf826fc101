import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { getConfig } from "../config.js";
import type { Engine } from "../engine.js";
import { OrchestratorError, errorMessage } from "../errors.js";
import type { RunStore } from "../persistence/store.js";
import { AbortRequestSchema, BudgetUpdateRequestSchema, formatIssues } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { HealthResponse, SSEEvent } from "./types.js";

export type StatusServerOptions = {
  engine: Engine;
  port?: number;
  host?: string;
  runStore?: RunStore;
};

/**
 * Operator surface: read-only status plus the three write paths the engine
 * allows (abort, budget ceiling, resume). Engine events stream over SSE.
 */
export class StatusServer {
  private engine: Engine;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private runStore?: RunStore;
  private sseClients = new Set<ServerResponse>();
  private unsubscribe?: () => void;

  constructor(opts: StatusServerOptions) {
    this.engine = opts.engine;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.runStore = opts.runStore;
  }

  start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        }
      });
    });
    this.server = server;
    this.unsubscribe = this.engine.subscribe((event) => this.broadcastSSE(event));

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Status server running at http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  stop(): Promise<void> {
    this.unsubscribe?.();
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    // CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      return this.handleHealth(res);
    }

    if (method === "GET" && pathname === "/api/status") {
      json(res, 200, this.engine.status());
      return;
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "POST" && pathname === "/api/abort") {
      return this.handleAbort(req, res);
    }

    if (method === "PUT" && pathname === "/api/budget") {
      return this.handleBudget(req, res);
    }

    if (method === "POST" && pathname === "/api/resume") {
      return this.handleResume(res);
    }

    if (method === "GET" && pathname === "/api/runs") {
      json(res, 200, this.runStore?.list() ?? []);
      return;
    }

    const runMatch = pathname.match(/^\/api\/runs\/([^/]+)$/);
    const runId = runMatch?.[1];
    if (method === "GET" && runId !== undefined) {
      return this.handleGetRun(res, runId);
    }

    if (method === "DELETE" && runId !== undefined) {
      return this.handleDeleteRun(res, runId);
    }

    if (method === "GET" && pathname === "/api/workers/health") {
      const health = await this.engine.collaborators.checkAllHealth();
      json(res, 200, { collaborators: health });
      return;
    }

    json(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    const { runId, state } = this.engine.status();
    const body: HealthResponse = {
      ok: true,
      runId,
      state,
      collaborators: this.engine.collaborators.list().map((c) => ({
        name: c.name,
        type: c.type,
        description: c.description,
        roles: c.roles,
        health: this.engine.collaborators.getCachedHealth(c.name),
      })),
    };
    json(res, 200, body);
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private async handleAbort(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJson(req, res);
    if (body === undefined) return;
    const result = AbortRequestSchema.safeParse(body);
    if (!result.success) {
      json(res, 400, { error: formatIssues(result.error) });
      return;
    }
    const { state } = this.engine.status();
    if (state !== "running") {
      json(res, 409, { error: `No run in progress (state: ${state})` });
      return;
    }
    this.engine.abort(result.data.reason);
    json(res, 202, { aborting: true });
  }

  private async handleBudget(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJson(req, res);
    if (body === undefined) return;
    const result = BudgetUpdateRequestSchema.safeParse(body);
    if (!result.success) {
      json(res, 400, { error: formatIssues(result.error) });
      return;
    }
    this.engine.setBudgetCeiling(result.data.ceiling);
    const { events: _events, ...budget } = this.engine.budget.snapshot();
    json(res, 200, budget);
  }

  private handleResume(res: ServerResponse): void {
    const { state } = this.engine.status();
    if (state !== "halted") {
      json(res, 409, { error: `Run cannot be resumed (state: ${state})` });
      return;
    }
    try {
      this.engine.assertResumable();
    } catch (err) {
      if (!(err instanceof OrchestratorError)) throw err;
      json(res, 409, { error: err.message, code: err.code });
      return;
    }
    this.engine.resume().catch((err: unknown) => {
      const code = err instanceof OrchestratorError ? err.code : undefined;
      log.error("Resume failed", { code, error: errorMessage(err) });
    });
    json(res, 202, { resuming: true, runId: this.engine.currentRunId });
  }

  private handleGetRun(res: ServerResponse, runId: string): void {
    const run = this.runStore?.get(runId);
    if (!run) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    json(res, 200, { ...run, ledger: this.runStore?.ledger(runId) ?? [] });
  }

  private handleDeleteRun(res: ServerResponse, runId: string): void {
    if (runId === this.engine.currentRunId && this.engine.status().state === "running") {
      json(res, 409, { error: "Cannot delete the run in progress" });
      return;
    }
    const deleted = this.runStore?.delete(runId) ?? false;
    if (!deleted) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    this.broadcastSSE({ type: "run:deleted", runId });
    json(res, 200, { deleted: true, runId });
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

/** Parsed JSON body, or undefined after answering 400. An empty body reads as `{}`. */
async function readJson(req: IncomingMessage, res: ServerResponse): Promise<unknown> {
  const body = await readBody(req);
  if (body.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    json(res, 400, { error: "Invalid JSON body" });
    return undefined;
  }
}

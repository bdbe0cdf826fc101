import type { z } from "zod";
import type { CollaboratorHealth } from "../agents/registry.js";
import type { AbortRequestSchema, BudgetUpdateRequestSchema } from "../schemas.js";
import type { EngineEvent } from "../types.js";

// --- REST Request/Response ---

export type BudgetUpdateRequest = z.infer<typeof BudgetUpdateRequestSchema>;
export type AbortRequest = z.infer<typeof AbortRequestSchema>;

export type HealthResponse = {
  ok: true;
  runId?: string;
  state: string;
  collaborators: Array<{
    name: string;
    type: string;
    description?: string;
    roles: string[];
    health?: CollaboratorHealth;
  }>;
};

// --- SSE ---

export type SSEEvent = EngineEvent;

import { CollaboratorError, errorMessage } from "../errors.js";
import type { Task } from "../planner/types.js";
import { GenerationSchema, formatIssues, reportedCost } from "../schemas.js";
import type { Snapshot } from "../workspace/types.js";
import type { Generation } from "./adapter.js";

/** JSON body sent to out-of-process workers (HTTP endpoints, scripts). */
export type WireRequest = {
  task: {
    id: string;
    title: string;
    description?: string;
    role: string;
    topology: string;
    attempt: number;
    maxAttempts: number;
    input?: Record<string, unknown>;
    /** Summary of the previous attempt's rejection, so the worker can fix it. */
    feedback?: string;
  };
  snapshot: {
    revision: number;
    digest: string;
    files?: Record<string, string>;
  };
  deadline: number;
};

export function toWireRequest(
  task: Readonly<Task>,
  snapshot: Snapshot,
  deadline: number,
  includeFiles = true,
): WireRequest {
  return {
    task: {
      id: task.id,
      title: task.title,
      description: task.description,
      role: task.role,
      topology: task.topology,
      attempt: task.attempts + 1,
      maxAttempts: task.maxAttempts,
      input: task.input,
      feedback: task.lastResult && task.lastResult.status !== "accepted" ? task.lastResult.summary : undefined,
    },
    snapshot: {
      revision: snapshot.revision,
      digest: snapshot.digest,
      files: includeFiles ? Object.fromEntries(snapshot.files) : undefined,
    },
    deadline,
  };
}

/** Decode and validate a worker's JSON answer. */
export function parseGeneration(raw: string, source: string): Generation {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new CollaboratorError("MALFORMED_OUTPUT", `${source} returned invalid JSON: ${errorMessage(err)}`);
  }
  const result = GenerationSchema.safeParse(decoded);
  if (!result.success) {
    throw new CollaboratorError(
      "MALFORMED_OUTPUT",
      `${source} returned a malformed change-set: ${formatIssues(result.error)}`,
      reportedCost(decoded),
    );
  }
  return result.data;
}

/** Cost carried by an error body such as `{ "error": "...", "cost": 2 }`; 0 for anything else. */
export function costFromBody(raw: string): number {
  try {
    return reportedCost(JSON.parse(raw));
  } catch {
    return 0;
  }
}

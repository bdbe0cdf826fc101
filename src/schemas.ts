import { z } from "zod";
import { ROLES } from "./planner/types.js";
import { HALT_REASONS } from "./scheduler/types.js";

/**
 * Parse `value` with `schema`, mapping zod issues to a single message and
 * handing it to `toError` so callers raise their own error type.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  toError: (message: string) => Error,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toError(formatIssues(result.error));
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

const IdSchema = z
  .string()
  .min(1, "id must not be empty")
  .regex(/^[A-Za-z0-9][\w.-]*$/, "id may only contain letters, digits, '.', '_' and '-'");

export const RoleSchema = z.enum(ROLES);

// --- Topology descriptors ---

export const TaskDescriptorSchema = z.object({
  id: IdSchema,
  role: RoleSchema,
  dependsOn: z.array(z.string()).default([]),
  title: z.string().optional(),
  description: z.string().optional(),
  maxAttempts: z.number().int().min(1).optional(),
  estimatedCost: z.number().min(0).optional(),
  input: z.record(z.unknown()).optional(),
});

export const TopologyDescriptorSchema = z.object({
  topology: IdSchema,
  description: z.string().optional(),
  tasks: z.array(TaskDescriptorSchema).min(1, "a topology needs at least one task"),
});

// --- Change-sets produced by workers ---

const RelativePathSchema = z
  .string()
  .min(1, "path must not be empty")
  .refine((p) => !p.startsWith("/") && !/^[A-Za-z]:[\\/]/.test(p), "path must be relative")
  .refine((p) => !p.split(/[\\/]/).includes(".."), "path must not contain '..'")
  .refine((p) => p.split(/[\\/]/)[0] !== ".git", "path must not point into .git");

export const FileChangeSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("write"), path: RelativePathSchema, content: z.string() }),
  z.object({ op: z.literal("delete"), path: RelativePathSchema }),
]);

export const ChangeSetSchema = z.object({
  summary: z.string().optional(),
  changes: z.array(FileChangeSchema),
});

const CostSchema = z.number().finite().min(0);

/** What a remote or scripted worker must answer with. */
export const GenerationSchema = z.object({
  changeSet: ChangeSetSchema,
  cost: CostSchema.default(0),
});

const ReportedCostSchema = z.object({ cost: CostSchema });

/** The `cost` of an answer whose change-set was rejected, or 0 when it has none. */
export function reportedCost(value: unknown): number {
  const result = ReportedCostSchema.safeParse(value);
  return result.success ? result.data.cost : 0;
}

// --- Config files ---

const poolSize = z.number().int().min(0);

export const PoolSizesSchema = z
  .object({
    manager: poolSize,
    architect: poolSize,
    developer: poolSize,
    reviewer: poolSize,
    tester: poolSize,
    integrator: poolSize,
    "data-scientist": poolSize,
    "model-architect": poolSize,
    training: poolSize,
  })
  .partial()
  .strict();

export const CommandSpecSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export const CollaboratorSpecSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("http"),
    name: z.string().min(1),
    roles: z.array(RoleSchema).min(1),
    url: z.string().url(),
    headers: z.record(z.string()).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    type: z.literal("command"),
    name: z.string().min(1),
    roles: z.array(RoleSchema).min(1),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    timeoutMs: z.number().int().positive().optional(),
  }),
]);

export const EngineConfigFileSchema = z
  .object({
    budget: z
      .object({
        ceiling: z.number().min(0),
        warnAt: z.number().min(0),
        defaultTaskEstimate: z.number().min(0),
      })
      .partial()
      .strict(),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1),
        baseDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
      })
      .partial()
      .strict(),
    workers: z
      .object({
        invokeTimeoutMs: z.number().int().positive(),
        degradeAfter: z.number().int().min(1),
        pools: PoolSizesSchema,
      })
      .partial()
      .strict(),
    validation: z.object({ stepTimeoutMs: z.number().int().positive() }).partial().strict(),
    workspace: z
      .object({ branchPrefix: z.string().min(1), root: z.string().min(1), trunkBranch: z.string().min(1) })
      .partial()
      .strict(),
    server: z
      .object({ port: z.number().int().min(0).max(65535), host: z.string().min(1) })
      .partial()
      .strict(),
    persistence: z.object({ dbPath: z.string().min(1) }).partial().strict(),
    collaborators: z.array(CollaboratorSpecSchema),
    runners: z
      .object({
        build: CommandSpecSchema,
        isolatedTest: CommandSpecSchema,
        integrationTest: CommandSpecSchema,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type CommandSpec = z.infer<typeof CommandSpecSchema>;
export type CollaboratorSpec = z.infer<typeof CollaboratorSpecSchema>;
export type EngineConfigFile = z.infer<typeof EngineConfigFileSchema>;

// --- Operator requests ---

export const BudgetUpdateRequestSchema = z.object({
  ceiling: z.number({ required_error: "ceiling is required" }).min(0, "ceiling must be >= 0"),
});

export const AbortRequestSchema = z.object({
  reason: z.string().max(500).optional(),
});

// --- Stored runs ---

const count = z.number().int().min(0);

const TopologyReportSchema = z.object({
  topology: z.string(),
  halt: z.enum(HALT_REASONS),
  counts: z.object({
    pending: count,
    blocked: count,
    ready: count,
    dispatched: count,
    validating: count,
    completed: count,
    "failed-retryable": count,
    "failed-terminal": count,
    "blocked-by-ancestor": count,
  }),
  completed: count,
  failedTerminal: count,
  blockedByAncestor: count,
  pending: count,
  costAccrued: z.number(),
  trunkRevision: count,
  error: z.string().optional(),
});

export const RunReportSchema = z.object({
  runId: z.string(),
  halt: z.enum(HALT_REASONS),
  topologies: z.array(TopologyReportSchema),
  spent: z.number(),
  ceiling: z.number(),
  startedAt: z.number(),
  finishedAt: z.number(),
  durationMs: z.number(),
});

export const TopologyNamesSchema = z.array(z.string());

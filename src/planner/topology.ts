import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { GraphDefinitionError, errorMessage } from "../errors.js";
import { TopologyDescriptorSchema, parseOrThrow } from "../schemas.js";
import type { TopologyDescriptor } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const BUNDLED_DIR = join(__dirname, "..", "..", "topologies");

/** The two canonical topologies shipped with the engine. */
export const BUNDLED_TOPOLOGIES = ["kernel-build", "model-training"] as const;
export type BundledTopology = (typeof BUNDLED_TOPOLOGIES)[number];

/** Validate the shape of a decoded descriptor. Graph structure is checked later by `buildGraph`. */
export function parseTopology(raw: unknown): TopologyDescriptor {
  return parseOrThrow(
    TopologyDescriptorSchema,
    raw,
    (msg) => new GraphDefinitionError("INVALID_DESCRIPTOR", `Invalid topology descriptor: ${msg}`),
  );
}

export async function loadTopologyFile(path: string): Promise<TopologyDescriptor> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new GraphDefinitionError("INVALID_DESCRIPTOR", `Cannot read topology ${path}: ${errorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new GraphDefinitionError("INVALID_DESCRIPTOR", `Topology ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseTopology(raw);
}

export function isBundledTopology(name: string): name is BundledTopology {
  return BUNDLED_TOPOLOGIES.some((t) => t === name);
}

export function loadBundledTopology(name: BundledTopology): Promise<TopologyDescriptor> {
  return loadTopologyFile(join(BUNDLED_DIR, `${name}.json`));
}

/** Resolve a CLI argument: a bundled topology name or a path to a descriptor file. */
export function resolveTopology(nameOrPath: string): Promise<TopologyDescriptor> {
  return isBundledTopology(nameOrPath) ? loadBundledTopology(nameOrPath) : loadTopologyFile(nameOrPath);
}

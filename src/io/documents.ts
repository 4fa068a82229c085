import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import yaml from "js-yaml";
import { fromAggregatedLibrary, isAggregatedLibrary } from "../catalog/aggregatedLibrary.js";
import { IPCatalog } from "../catalog/ipCatalog.js";
import type { CatalogSource } from "../catalog/types.js";
import { parseBusConfigText } from "../bus/busConfig.js";
import type { BusConfig } from "../bus/types.js";

function parseDocument(path: string, text: string): unknown {
  return extname(path).toLowerCase() === ".json" ? JSON.parse(text) : yaml.load(text);
}

/** Reads one catalog document (JSON or YAML, plain or aggregated layout). */
export async function readCatalogSource(path: string): Promise<CatalogSource> {
  const doc = parseDocument(path, await readFile(path, "utf-8"));
  return { name: path, descriptors: isAggregatedLibrary(doc) ? fromAggregatedLibrary(doc) : doc };
}

/**
 * Reads all catalog files in parallel, then merges them in the order given,
 * whatever order the reads finish in.
 */
export async function readCatalog(paths: readonly string[]): Promise<IPCatalog> {
  const sources = await Promise.all(paths.map((path) => readCatalogSource(path)));
  return IPCatalog.load(sources);
}

export async function readBusConfig(path: string): Promise<BusConfig> {
  return parseBusConfigText(await readFile(path, "utf-8"));
}

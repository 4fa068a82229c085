import { MalformedDescriptorError } from "../errors.js";

interface RawDescriptor {
  cell_count: number;
  irq: boolean;
  fifo: boolean;
  interface_pins: unknown[];
  description: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The Wishbone figure of `info.cell_count`: a number, or a list of `{ <bus>: count }`. */
function wishboneCellCount(name: string, raw: unknown): number {
  if (raw === undefined || raw === null) return 0;
  if (typeof raw === "number") return raw;
  if (!Array.isArray(raw)) {
    throw new MalformedDescriptorError(name, "info.cell_count", "expected a number or a list of per-bus counts");
  }
  for (const entry of raw) {
    if (!isRecord(entry) || !Object.hasOwn(entry, "WB")) continue;
    const count = entry.WB;
    if (typeof count === "number") return count;
    if (typeof count === "string" && /^\d+$/.test(count.trim())) return Number.parseInt(count.trim(), 10);
    throw new MalformedDescriptorError(name, "info.cell_count", `WB count ${JSON.stringify(count)} is not a number`);
  }
  return 0;
}

function nonEmpty(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Detects the aggregated IP library layout: one entry per IP repository under
 * `slaves`, each carrying `info`, `external_interface`, `flags` and `fifos`.
 */
export function isAggregatedLibrary(doc: unknown): doc is { slaves: unknown[] } {
  return isRecord(doc) && Array.isArray(doc.slaves);
}

/**
 * Converts an aggregated IP library into the `type_id → descriptor` mapping
 * {@link IPCatalog.load} consumes.
 */
export function fromAggregatedLibrary(doc: { slaves: unknown[] }): Record<string, RawDescriptor> {
  const descriptors: Record<string, RawDescriptor> = {};

  doc.slaves.forEach((entry, index) => {
    if (!isRecord(entry) || !isRecord(entry.info)) {
      throw new MalformedDescriptorError(`slaves[${index}]`, "info", "expected an object");
    }
    const { name, description, cell_count } = entry.info;
    if (typeof name !== "string" || name.length === 0) {
      throw new MalformedDescriptorError(`slaves[${index}]`, "info.name", "expected a non-empty string");
    }

    if (Object.hasOwn(descriptors, name)) {
      throw new MalformedDescriptorError(name, "info.name", "listed more than once");
    }

    const external = entry.external_interface ?? [];
    if (!Array.isArray(external)) {
      throw new MalformedDescriptorError(name, "external_interface", "expected a list");
    }

    descriptors[name] = {
      cell_count: wishboneCellCount(name, cell_count),
      // Any flags list, even an empty one, means the IP has an interrupt line.
      irq: entry.flags !== undefined && entry.flags !== null,
      fifo: nonEmpty(entry.fifos),
      interface_pins: external.map((pin: unknown) =>
        isRecord(pin) ? { name: pin.name, width: pin.width, direction: pin.direction } : pin,
      ),
      description: typeof description === "string" ? description.trim() : "",
    };
  });

  return descriptors;
}

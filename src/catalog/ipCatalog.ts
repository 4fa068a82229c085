import { DuplicateTypeError, MalformedDescriptorError, UnknownTypeError } from "../errors.js";
import { isVerilogIdentifier } from "../utils/verilogUtils.js";
import type { CatalogSource, InterfacePin, IPDescriptor, PinDirection } from "./types.js";

const DIRECTION_ALIASES: Record<string, PinDirection> = {
  in: "in",
  input: "in",
  out: "out",
  output: "out",
  bidir: "bidir",
  inout: "bidir",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function parsePin(typeId: string, raw: unknown, index: number): InterfacePin {
  const field = `interface_pins[${index}]`;
  if (!isRecord(raw)) {
    throw new MalformedDescriptorError(typeId, field, "expected an object");
  }
  const { name, width, direction } = raw;
  if (typeof name !== "string" || !isVerilogIdentifier(name)) {
    throw new MalformedDescriptorError(typeId, `${field}.name`, `expected a Verilog identifier, got ${JSON.stringify(name)}`);
  }
  if (width !== undefined && !(isCount(width) && width >= 1)) {
    throw new MalformedDescriptorError(typeId, `${field}.width`, "expected an integer >= 1");
  }
  const resolved = typeof direction === "string" ? DIRECTION_ALIASES[direction.toLowerCase()] : undefined;
  if (!resolved) {
    throw new MalformedDescriptorError(typeId, `${field}.direction`, "expected one of in, out, bidir");
  }
  return Object.freeze({ name, width: isCount(width) ? width : 1, direction: resolved });
}

/**
 * Validates one raw descriptor and returns a frozen {@link IPDescriptor}.
 */
export function parseDescriptor(typeId: string, raw: unknown): IPDescriptor {
  if (!isRecord(raw)) {
    throw new MalformedDescriptorError(typeId, "(descriptor)", "expected an object");
  }
  const { cell_count, irq, fifo, interface_pins, description, module } = raw;
  if (!isCount(cell_count)) {
    throw new MalformedDescriptorError(typeId, "cell_count", "expected a non-negative integer");
  }
  if (typeof irq !== "boolean") {
    throw new MalformedDescriptorError(typeId, "irq", "expected a boolean");
  }
  if (typeof fifo !== "boolean") {
    throw new MalformedDescriptorError(typeId, "fifo", "expected a boolean");
  }
  if (!Array.isArray(interface_pins)) {
    throw new MalformedDescriptorError(typeId, "interface_pins", "expected a list");
  }
  if (description !== undefined && typeof description !== "string") {
    throw new MalformedDescriptorError(typeId, "description", "expected a string");
  }
  if (module !== undefined && (typeof module !== "string" || module.length === 0)) {
    throw new MalformedDescriptorError(typeId, "module", "expected a non-empty string");
  }
  const moduleName = typeof module === "string" ? module : `${typeId}_WB`;
  if (!isVerilogIdentifier(moduleName)) {
    throw new MalformedDescriptorError(typeId, "module", `'${moduleName}' is not a Verilog identifier`);
  }

  const pins = interface_pins.map((pin, index) => parsePin(typeId, pin, index));
  const seen = new Set<string>();
  for (const pin of pins) {
    if (seen.has(pin.name)) {
      throw new MalformedDescriptorError(typeId, "interface_pins", `pin '${pin.name}' is declared twice`);
    }
    seen.add(pin.name);
  }

  return Object.freeze({
    typeId,
    moduleName,
    cellCount: cell_count,
    hasIrq: irq,
    hasFifo: fifo,
    interfacePins: Object.freeze(pins),
    description: typeof description === "string" ? description : "",
  });
}

function sameDescriptor(a: IPDescriptor, b: IPDescriptor): boolean {
  if (
    a.moduleName !== b.moduleName ||
    a.cellCount !== b.cellCount ||
    a.hasIrq !== b.hasIrq ||
    a.hasFifo !== b.hasFifo ||
    a.description !== b.description ||
    a.interfacePins.length !== b.interfacePins.length
  ) {
    return false;
  }
  return a.interfacePins.every((pin, i) => {
    const other = b.interfacePins[i];
    return pin.name === other.name && pin.width === other.width && pin.direction === other.direction;
  });
}

/**
 * Read-only index of IP descriptors. Built once by {@link IPCatalog.load} and
 * passed explicitly to whatever needs it; there is no mutating API.
 */
export class IPCatalog {
  private constructor(private readonly entries: ReadonlyMap<string, IPDescriptor>) {}

  /**
   * Merges the sources in the order given. Later sources may add types; a type
   * repeated with different content is fatal no matter which source came first.
   */
  static load(sources: readonly CatalogSource[]): IPCatalog {
    const entries = new Map<string, IPDescriptor>();
    const origins = new Map<string, string>();

    for (const source of sources) {
      if (!isRecord(source.descriptors)) {
        throw new MalformedDescriptorError("*", "(document)", `catalog '${source.name}' is not a mapping of type ids`);
      }
      for (const [typeId, raw] of Object.entries(source.descriptors)) {
        const descriptor = parseDescriptor(typeId, raw);
        const existing = entries.get(typeId);
        if (existing) {
          if (!sameDescriptor(existing, descriptor)) {
            throw new DuplicateTypeError(typeId, origins.get(typeId) ?? "?", source.name);
          }
          continue;
        }
        entries.set(typeId, descriptor);
        origins.set(typeId, source.name);
      }
    }

    return new IPCatalog(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  has(typeId: string): boolean {
    return this.entries.has(typeId);
  }

  lookup(typeId: string): IPDescriptor {
    const descriptor = this.entries.get(typeId);
    if (!descriptor) {
      throw new UnknownTypeError(typeId);
    }
    return descriptor;
  }

  /** Type ids in load order. */
  types(): string[] {
    return [...this.entries.keys()];
  }
}

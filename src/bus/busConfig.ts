import yaml from "js-yaml";
import { ConfigShapeError } from "../errors.js";
import { isVerilogIdentifier, parseHexAddress } from "../utils/verilogUtils.js";
import { INTERCONNECT_PORTS, slaveNetNames } from "./types.js";
import type { BusConfig, PinBinding, SlaveInstance } from "./types.js";

const MAX_ADDRESS = 0xffffffff;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBitIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function parseBaseAddress(raw: unknown, slaveIndex: number): number {
  let value: number | undefined;
  if (typeof raw === "string") {
    value = parseHexAddress(raw);
  } else if (typeof raw === "number" && Number.isInteger(raw)) {
    // YAML reads an unquoted 0x30000000 as a number.
    value = raw;
  }
  if (value === undefined) {
    throw new ConfigShapeError(slaveIndex, "base_address", `expected a hexadecimal address, got ${JSON.stringify(raw)}`);
  }
  if (value < 0 || value > MAX_ADDRESS) {
    throw new ConfigShapeError(slaveIndex, "base_address", `${JSON.stringify(raw)} does not fit in 32 bits`);
  }
  return value;
}

function parsePinBindings(raw: unknown, slaveIndex: number): Map<string, PinBinding> {
  const bindings = new Map<string, PinBinding>();
  if (raw === undefined || raw === null) {
    return bindings;
  }
  if (!isRecord(raw)) {
    throw new ConfigShapeError(slaveIndex, "io_pins", "expected a mapping of pin name to bit index");
  }
  for (const [pin, value] of Object.entries(raw)) {
    if (isBitIndex(value)) {
      bindings.set(pin, { kind: "offset", start: value });
    } else if (Array.isArray(value) && value.length > 0 && value.every(isBitIndex)) {
      bindings.set(pin, { kind: "bits", bits: Object.freeze([...value]) });
    } else {
      throw new ConfigShapeError(slaveIndex, `io_pins.${pin}`, "expected a bit index or a non-empty list of bit indices");
    }
  }
  return bindings;
}

function parseSlave(raw: unknown, slaveIndex: number): SlaveInstance {
  if (!isRecord(raw)) {
    throw new ConfigShapeError(slaveIndex, "(slave)", "expected a mapping");
  }
  const { name, type, base_address, irq, io_pins } = raw;
  if (typeof name !== "string" || !isVerilogIdentifier(name)) {
    throw new ConfigShapeError(slaveIndex, "name", `expected a Verilog identifier that is not a keyword, got ${JSON.stringify(name)}`);
  }
  if (typeof type !== "string" || type.length === 0) {
    throw new ConfigShapeError(slaveIndex, "type", "expected a non-empty string");
  }
  if (irq !== undefined && irq !== null && !isBitIndex(irq)) {
    throw new ConfigShapeError(slaveIndex, "irq", `expected a non-negative integer, got ${JSON.stringify(irq)}`);
  }

  return Object.freeze({
    name,
    typeId: type,
    baseAddress: parseBaseAddress(base_address, slaveIndex),
    ioPinBindings: parsePinBindings(io_pins, slaveIndex),
    irqIndex: isBitIndex(irq) ? irq : undefined,
  });
}

/**
 * Structural parse of a bus configuration document: either a list of slave
 * records or `{ slaves: [...] }`. Stops at the first malformed record. Types,
 * pins and addresses are not checked against anything here.
 */
export function parseBusConfig(raw: unknown): BusConfig {
  const list = isRecord(raw) ? raw.slaves : raw;
  if (!Array.isArray(list)) {
    throw new ConfigShapeError(undefined, "slaves", "expected a list of slave records");
  }

  const slaves = list.map((entry: unknown, index) => parseSlave(entry, index));

  // Names become Verilog instances and C macros, so they must differ ignoring case.
  const seen = new Map<string, string>();
  slaves.forEach((slave, index) => {
    const key = slave.name.toUpperCase();
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new ConfigShapeError(index, "name", `'${slave.name}' clashes with '${previous}'`);
    }
    seen.set(key, slave.name);
  });

  const owners = new Map<string, string>();
  slaves.forEach((slave, index) => {
    const nets = slaveNetNames(slave.name);
    for (const net of nets) {
      if (INTERCONNECT_PORTS.includes(net)) {
        throw new ConfigShapeError(index, "name", `'${slave.name}' would declare '${net}', a port of the interconnect`);
      }
      const owner = owners.get(net);
      if (owner !== undefined) {
        throw new ConfigShapeError(index, "name", `'${slave.name}' would declare '${net}', already declared for '${owner}'`);
      }
    }
    for (const net of nets) {
      owners.set(net, slave.name);
    }
  });

  return Object.freeze({ slaves: Object.freeze(slaves) });
}

/** Parses YAML (or JSON, which YAML accepts) bus configuration text. */
export function parseBusConfigText(text: string): BusConfig {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigShapeError(undefined, "document", detail, { cause: error });
  }
  return parseBusConfig(doc);
}

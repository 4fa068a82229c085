import type { IPCatalog } from "../catalog/ipCatalog.js";
import type { IPDescriptor } from "../catalog/types.js";
import { UnknownTypeError } from "../errors.js";
import type { BindDiagnostic } from "./diagnostics.js";
import type { BitClaim, BusConfig, BusOptions, InterfaceBinding, PinBinding, Validation } from "./types.js";
import { DEFAULT_BUS_OPTIONS } from "./types.js";

function resolveBits(binding: PinBinding, width: number): readonly number[] {
  if (binding.kind === "bits") {
    return binding.bits;
  }
  return Array.from({ length: width }, (_, i) => binding.start + i);
}

function lookupOrReport(
  catalog: IPCatalog,
  slave: string,
  typeId: string,
  errors: BindDiagnostic[],
): IPDescriptor | undefined {
  try {
    return catalog.lookup(typeId);
  } catch (error) {
    if (error instanceof UnknownTypeError) {
      errors.push({ kind: "UnknownType", slave, typeId });
      return undefined;
    }
    throw error;
  }
}

/**
 * Resolves every slave's pin bindings and IRQ against its IP descriptor and
 * claims bits of the shared I/O and interrupt vectors. Works from the
 * descriptor's declared pins only; nothing here depends on which IP it is.
 * All violations across the config are collected.
 */
export function bindInterfaces(
  config: BusConfig,
  catalog: IPCatalog,
  options: Pick<BusOptions, "ioWidth" | "irqWidth"> = DEFAULT_BUS_OPTIONS,
): Validation<InterfaceBinding, BindDiagnostic> {
  const { ioWidth, irqWidth } = options;
  const errors: BindDiagnostic[] = [];
  const io = new Map<number, BitClaim>();
  const pins = new Map<string, Map<string, readonly number[]>>();
  const irq = new Map<number, string>();

  for (const slave of config.slaves) {
    const descriptor = lookupOrReport(catalog, slave.name, slave.typeId, errors);
    if (!descriptor) continue;

    const slavePins = new Map<string, readonly number[]>();
    pins.set(slave.name, slavePins);

    for (const [pinName, binding] of slave.ioPinBindings) {
      const pin = descriptor.interfacePins.find((p) => p.name === pinName);
      if (!pin) {
        errors.push({ kind: "UnknownPin", slave: slave.name, typeId: slave.typeId, pin: pinName });
        continue;
      }

      const bits = resolveBits(binding, pin.width);
      if (bits.length !== pin.width) {
        errors.push({ kind: "IOWidthMismatch", slave: slave.name, pin: pinName, expected: pin.width, actual: bits.length });
        continue;
      }
      const outside = bits.filter((bit) => bit >= ioWidth);
      if (outside.length > 0) {
        errors.push({ kind: "IOBitRange", slave: slave.name, pin: pinName, bits: outside, ioWidth });
        continue;
      }

      bits.forEach((bit, pinBit) => {
        const previous = io.get(bit);
        if (previous) {
          errors.push({
            kind: "IOBitConflict",
            slaveA: previous.slave,
            pinA: previous.pin,
            slaveB: slave.name,
            pinB: pinName,
            bit,
          });
          return;
        }
        io.set(bit, { slave: slave.name, pin: pinName, pinBit, direction: pin.direction });
      });
      slavePins.set(pinName, bits);
    }

    if (slave.irqIndex === undefined) continue;
    if (!descriptor.hasIrq) {
      errors.push({ kind: "IrqUnsupported", slave: slave.name, typeId: slave.typeId });
    }
    if (slave.irqIndex >= irqWidth) {
      errors.push({ kind: "IrqOutOfRange", slave: slave.name, index: slave.irqIndex, irqWidth });
    } else if (descriptor.hasIrq) {
      const previous = irq.get(slave.irqIndex);
      if (previous !== undefined) {
        errors.push({ kind: "IrqConflict", slaveA: previous, slaveB: slave.name, index: slave.irqIndex });
      } else {
        irq.set(slave.irqIndex, slave.name);
      }
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: { io, pins, irq } };
}

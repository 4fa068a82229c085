import type { AddressDiagnostic } from "./diagnostics.js";
import type { AddressMap, AddressWindow, BusConfig, BusOptions, Validation } from "./types.js";
import { DEFAULT_BUS_OPTIONS } from "./types.js";

/**
 * Checks alignment and overlap of every slave window. Reports every problem in
 * the config, never just the first.
 */
export function validateAddresses(
  config: BusConfig,
  options: Pick<BusOptions, "windowSize"> = DEFAULT_BUS_OPTIONS,
): Validation<AddressMap, AddressDiagnostic> {
  const { windowSize } = options;
  const errors: AddressDiagnostic[] = [];
  const map = new Map<string, AddressWindow>();

  for (const slave of config.slaves) {
    if (slave.baseAddress % windowSize !== 0) {
      errors.push({ kind: "AddressMisaligned", slave: slave.name, baseAddress: slave.baseAddress, windowSize });
    }
    map.set(slave.name, { base: slave.baseAddress, end: slave.baseAddress + windowSize });
  }

  // Array.prototype.sort is stable, so equal bases keep declaration order.
  const sorted = [...map.entries()].sort(([, a], [, b]) => a.base - b.base);
  for (let i = 0; i < sorted.length; i += 1) {
    const [nameA, windowA] = sorted[i];
    for (let j = i + 1; j < sorted.length; j += 1) {
      const [nameB, windowB] = sorted[j];
      if (windowB.base >= windowA.end) break;
      errors.push({ kind: "AddressConflict", slaveA: nameA, slaveB: nameB, windowA, windowB });
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: map };
}

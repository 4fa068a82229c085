import type { AddressMap, BusConfig, BusOptions, InterfaceBinding } from "../bus/types.js";
import { hex32 } from "../utils/verilogUtils.js";

export function emitAddressHeader(
  config: BusConfig,
  addressMap: AddressMap,
  binding: InterfaceBinding,
  options: Pick<BusOptions, "moduleName" | "windowSize">,
): string {
  const guard = `${options.moduleName.toUpperCase()}_H`;
  const irqBySlave = new Map<string, number>();
  for (const [index, slave] of binding.irq) {
    irqBySlave.set(slave, index);
  }

  const lines = [
    `/* ${options.moduleName} address map. Generated file; edit the bus configuration instead. */`,
    `#ifndef ${guard}`,
    `#define ${guard}`,
  ];
  for (const slave of config.slaves) {
    const prefix = slave.name.toUpperCase();
    const base = addressMap.get(slave.name)?.base ?? slave.baseAddress;
    lines.push("");
    lines.push(`#define ${prefix}_BASE ${hex32(base)}UL`);
    lines.push(`#define ${prefix}_SIZE ${hex32(options.windowSize)}UL`);
    const irq = irqBySlave.get(slave.name);
    if (irq !== undefined) {
      lines.push(`#define ${prefix}_IRQ ${irq}`);
    }
  }
  lines.push("");
  lines.push(`#endif /* ${guard} */`);
  return `${lines.join("\n")}\n`;
}

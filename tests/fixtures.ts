import { IPCatalog, parseBusConfig } from "../src/index.js";
import type { BusConfig, CatalogSource } from "../src/index.js";

export const CORE_IPS: CatalogSource = {
  name: "core-ips.json",
  descriptors: {
    EF_UART: {
      cell_count: 3000,
      irq: true,
      fifo: true,
      interface_pins: [
        { name: "rx", width: 1, direction: "in" },
        { name: "tx", width: 1, direction: "out" },
      ],
      description: "UART with receive and transmit FIFOs",
    },
    EF_GPIO14: {
      cell_count: 1200,
      irq: true,
      fifo: false,
      interface_pins: [{ name: "gpio", width: 14, direction: "bidir" }],
      description: "14-bit GPIO port",
    },
    EF_SPI: {
      cell_count: 2500,
      irq: true,
      fifo: true,
      interface_pins: [
        { name: "sclk", direction: "out" },
        { name: "mosi", direction: "out" },
        { name: "miso", direction: "in" },
        { name: "irq_out", direction: "out" },
      ],
    },
    EF_TMR: {
      cell_count: 800,
      irq: false,
      fifo: false,
      interface_pins: [{ name: "pwm", width: 2, direction: "output" }],
      description: "Timer with two PWM outputs",
    },
  },
};

export function coreCatalog(): IPCatalog {
  return IPCatalog.load([CORE_IPS]);
}

/** Two UARTs and a GPIO port on the first three windows of the user area. */
export function threeSlaveConfig(): BusConfig {
  return parseBusConfig([
    { name: "uart0", type: "EF_UART", base_address: "0x30000000", irq: 0, io_pins: { rx: 10, tx: 11 } },
    { name: "uart1", type: "EF_UART", base_address: "0x30010000", irq: 1, io_pins: { rx: 12, tx: 13 } },
    { name: "gpio0", type: "EF_GPIO14", base_address: "32'h30020000", irq: 2, io_pins: { gpio: 14 } },
  ]);
}

import type { PinDirection } from "../catalog/types.js";
import { isVerilogIdentifier } from "../utils/verilogUtils.js";

/**
 * Where a slave pin lands on the global I/O vector: either a start bit, with
 * the width taken from the IP descriptor, or an explicit list of bits (LSB first).
 */
export type PinBinding =
  | { kind: "offset"; start: number }
  | { kind: "bits"; bits: readonly number[] };

export interface SlaveInstance {
  readonly name: string;
  readonly typeId: string;
  readonly baseAddress: number;
  readonly ioPinBindings: ReadonlyMap<string, PinBinding>;
  readonly irqIndex?: number;
}

/** Slaves in declaration order; the order decides instantiation and mux priority. */
export interface BusConfig {
  readonly slaves: readonly SlaveInstance[];
}

/** Ports of the emitted interconnect module. */
export const INTERCONNECT_PORTS: readonly string[] = Object.freeze([
  "wb_clk",
  "wb_rst",
  "wb_adr",
  "wb_dat_i",
  "wb_dat_o",
  "wb_sel",
  "wb_we",
  "wb_stb",
  "wb_cyc",
  "wb_ack",
  "io_in",
  "io_out",
  "io_oen",
  "user_irq",
]);

/** Identifiers the interconnect declares for one slave: its instance, chip select and response wires. */
export function slaveNetNames(slave: string): string[] {
  return [slave, `cs_${slave}`, `${slave}_dat_o`, `${slave}_ack`, `${slave}_irq`];
}

export interface AddressWindow {
  readonly base: number;
  /** Exclusive. */
  readonly end: number;
}

/** Slave name → window, in declaration order. */
export type AddressMap = ReadonlyMap<string, AddressWindow>;

export interface BitClaim {
  readonly slave: string;
  readonly pin: string;
  /** Bit position inside the pin. */
  readonly pinBit: number;
  readonly direction: PinDirection;
}

export interface InterfaceBinding {
  /** Global bit index → the pin bit that claims it. Unclaimed bits are absent. */
  readonly io: ReadonlyMap<number, BitClaim>;
  /** Resolved global bits of each bound pin, keyed by slave then pin. */
  readonly pins: ReadonlyMap<string, ReadonlyMap<string, readonly number[]>>;
  /** IRQ index → slave name. */
  readonly irq: ReadonlyMap<number, string>;
}

export type Validation<T, E> = { ok: true; value: T } | { ok: false; errors: E[] };

export interface BusOptions {
  /** Address window reserved for every slave; a power of two. */
  windowSize: number;
  /** Width of the shared external I/O vector. */
  ioWidth: number;
  /** Width of the interrupt vector. */
  irqWidth: number;
  /** Name of the emitted interconnect module. */
  moduleName: string;
}

export const DEFAULT_BUS_OPTIONS: Readonly<BusOptions> = Object.freeze({
  windowSize: 0x10000,
  ioWidth: 38,
  irqWidth: 3,
  moduleName: "wb_bus",
});

export function resolveBusOptions(partial: Partial<BusOptions> = {}): BusOptions {
  const options: BusOptions = {
    windowSize: partial.windowSize ?? DEFAULT_BUS_OPTIONS.windowSize,
    ioWidth: partial.ioWidth ?? DEFAULT_BUS_OPTIONS.ioWidth,
    irqWidth: partial.irqWidth ?? DEFAULT_BUS_OPTIONS.irqWidth,
    moduleName: partial.moduleName ?? DEFAULT_BUS_OPTIONS.moduleName,
  };
  const { windowSize, ioWidth, irqWidth, moduleName } = options;
  if (!Number.isInteger(windowSize) || windowSize < 4 || windowSize > 2 ** 32 || !Number.isInteger(Math.log2(windowSize))) {
    throw new RangeError(`Window size must be a power of two between 4 and 2^32, got ${windowSize}`);
  }
  if (!Number.isInteger(ioWidth) || ioWidth < 1) {
    throw new RangeError(`I/O vector width must be a positive integer, got ${ioWidth}`);
  }
  if (!Number.isInteger(irqWidth) || irqWidth < 1) {
    throw new RangeError(`IRQ vector width must be a positive integer, got ${irqWidth}`);
  }
  if (!isVerilogIdentifier(moduleName)) {
    throw new RangeError(`Module name '${moduleName}' is not a Verilog identifier`);
  }
  return options;
}

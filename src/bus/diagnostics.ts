import { hex32 } from "../utils/verilogUtils.js";

export type AddressDiagnostic =
  | { kind: "AddressMisaligned"; slave: string; baseAddress: number; windowSize: number }
  | {
      kind: "AddressConflict";
      slaveA: string;
      slaveB: string;
      windowA: { base: number; end: number };
      windowB: { base: number; end: number };
    };

export type BindDiagnostic =
  | { kind: "UnknownType"; slave: string; typeId: string }
  | { kind: "UnknownPin"; slave: string; typeId: string; pin: string }
  | { kind: "IOWidthMismatch"; slave: string; pin: string; expected: number; actual: number }
  | { kind: "IOBitRange"; slave: string; pin: string; bits: number[]; ioWidth: number }
  | { kind: "IOBitConflict"; slaveA: string; pinA: string; slaveB: string; pinB: string; bit: number }
  | { kind: "IrqOutOfRange"; slave: string; index: number; irqWidth: number }
  | { kind: "IrqConflict"; slaveA: string; slaveB: string; index: number }
  | { kind: "IrqUnsupported"; slave: string; typeId: string };

/** Every finding the validators can pool. Closed: add a variant here and to {@link formatDiagnostic}. */
export type BusDiagnostic = AddressDiagnostic | BindDiagnostic;

export type DiagnosticKind = BusDiagnostic["kind"];

function range(window: { base: number; end: number }): string {
  return `[${hex32(window.base)}, ${hex32(window.end)})`;
}

export function formatDiagnostic(diagnostic: BusDiagnostic): string {
  switch (diagnostic.kind) {
    case "AddressMisaligned":
      return `${diagnostic.slave}: base address ${hex32(diagnostic.baseAddress)} is not aligned to the ${hex32(diagnostic.windowSize)} window`;
    case "AddressConflict":
      return `${diagnostic.slaveA} ${range(diagnostic.windowA)} overlaps ${diagnostic.slaveB} ${range(diagnostic.windowB)}`;
    case "UnknownType":
      return `${diagnostic.slave}: IP type '${diagnostic.typeId}' is not in the catalog`;
    case "UnknownPin":
      return `${diagnostic.slave}: IP type '${diagnostic.typeId}' has no interface pin '${diagnostic.pin}'`;
    case "IOWidthMismatch":
      return `${diagnostic.slave}.${diagnostic.pin}: ${diagnostic.actual} bits bound, pin is ${diagnostic.expected} bits wide`;
    case "IOBitRange":
      return `${diagnostic.slave}.${diagnostic.pin}: bit ${diagnostic.bits.join(", ")} outside io[${diagnostic.ioWidth - 1}:0]`;
    case "IOBitConflict":
      return `io[${diagnostic.bit}] is claimed by both ${diagnostic.slaveA}.${diagnostic.pinA} and ${diagnostic.slaveB}.${diagnostic.pinB}`;
    case "IrqOutOfRange":
      return `${diagnostic.slave}: irq ${diagnostic.index} outside user_irq[${diagnostic.irqWidth - 1}:0]`;
    case "IrqConflict":
      return `irq ${diagnostic.index} is claimed by both ${diagnostic.slaveA} and ${diagnostic.slaveB}`;
    case "IrqUnsupported":
      return `${diagnostic.slave}: IP type '${diagnostic.typeId}' has no interrupt output`;
  }
}

import type { IPCatalog } from "../catalog/ipCatalog.js";
import type { InterfacePin, IPDescriptor } from "../catalog/types.js";
import type { AddressMap, BusConfig, BusOptions, InterfaceBinding, SlaveInstance } from "../bus/types.js";
import { DEFAULT_BUS_OPTIONS } from "../bus/types.js";
import { bitSelect, hex32, verilogHex, zeros } from "../utils/verilogUtils.js";
import { emitAddressHeader } from "./headerEmitter.js";

export interface GeneratedArtifacts {
  interconnect: string;
  header?: string;
}

export interface EmitOptions extends BusOptions {
  /** Also render the C address-map header. */
  header: boolean;
}

const INDENT = "    ";
const DATA_WIDTH = 32;

function portLine(direction: "input" | "output", width: number, name: string): string {
  const range = width > 1 ? `[${width - 1}:0]` : "";
  return `${INDENT}${direction.padEnd(6)} wire ${range.padEnd(6)} ${name}`;
}

function chipSelect(slave: string): string {
  return `cs_${slave}`;
}

function pinConnections(pin: InterfacePin, bits: readonly number[] | undefined): string[] {
  const { name, width, direction } = pin;
  if (direction === "in") {
    return [`.${name}(${bits ? bitSelect("io_in", bits) : zeros(width)})`];
  }
  if (direction === "out") {
    return [`.${name}(${bits ? bitSelect("io_out", bits) : ""})`];
  }
  return [
    `.${name}_in(${bits ? bitSelect("io_in", bits) : zeros(width)})`,
    `.${name}_out(${bits ? bitSelect("io_out", bits) : ""})`,
    `.${name}_oe(${bits ? bitSelect("io_oen", bits) : ""})`,
  ];
}

class VerilogWriter {
  private readonly lines: string[] = [];

  line(text = ""): void {
    this.lines.push(text);
  }

  body(text: string): void {
    this.lines.push(`${INDENT}${text}`);
  }

  toString(): string {
    return `${this.lines.join("\n")}\n`;
  }
}

class InterconnectEmitter {
  private readonly out = new VerilogWriter();
  private readonly irqSlaves: Set<string>;

  constructor(
    private readonly config: BusConfig,
    private readonly addressMap: AddressMap,
    private readonly binding: InterfaceBinding,
    private readonly catalog: IPCatalog,
    private readonly options: BusOptions,
  ) {
    this.irqSlaves = new Set(binding.irq.values());
  }

  emit(): string {
    this.writeHeader();
    this.writeChipSelects();
    this.writeResponseWires();
    for (const slave of this.config.slaves) {
      this.writeInstance(slave, this.catalog.lookup(slave.typeId));
    }
    this.writeResponseMux();
    this.writeInterrupts();
    this.writeIoPads();
    this.out.line("endmodule");
    this.out.line();
    this.out.line("`default_nettype wire");
    return this.out.toString();
  }

  private writeHeader(): void {
    const { moduleName, ioWidth, irqWidth } = this.options;
    const count = this.config.slaves.length;
    const out = this.out;
    out.line(`// ${moduleName}: Wishbone interconnect for ${count} slave${count === 1 ? "" : "s"}.`);
    out.line("// Generated file; edit the bus configuration instead.");
    out.line();
    out.line("`default_nettype none");
    out.line();
    out.line(`module ${moduleName} (`);
    const ports = [
      portLine("input", 1, "wb_clk"),
      portLine("input", 1, "wb_rst"),
      portLine("input", DATA_WIDTH, "wb_adr"),
      portLine("input", DATA_WIDTH, "wb_dat_i"),
      portLine("output", DATA_WIDTH, "wb_dat_o"),
      portLine("input", DATA_WIDTH / 8, "wb_sel"),
      portLine("input", 1, "wb_we"),
      portLine("input", 1, "wb_stb"),
      portLine("input", 1, "wb_cyc"),
      portLine("output", 1, "wb_ack"),
      portLine("input", ioWidth, "io_in"),
      portLine("output", ioWidth, "io_out"),
      portLine("output", ioWidth, "io_oen"),
      portLine("output", irqWidth, "user_irq"),
    ];
    ports.forEach((port, i) => out.line(i < ports.length - 1 ? `${port},` : port));
    out.line(");");
  }

  private writeChipSelects(): void {
    this.out.line();
    this.out.body("// Chip selects");
    for (const slave of this.config.slaves) {
      const window = this.addressMap.get(slave.name);
      if (!window) {
        throw new Error(`No address window for slave ${slave.name}`);
      }
      this.out.body(
        `wire ${chipSelect(slave.name)} = (wb_adr >= ${verilogHex(window.base)}) && (wb_adr < ${verilogHex(window.end)});`,
      );
    }
  }

  private writeResponseWires(): void {
    this.out.line();
    this.out.body("// Slave responses");
    for (const slave of this.config.slaves) {
      this.out.body(`wire [${DATA_WIDTH - 1}:0] ${slave.name}_dat_o;`);
      this.out.body(`wire        ${slave.name}_ack;`);
      if (this.irqSlaves.has(slave.name)) {
        this.out.body(`wire        ${slave.name}_irq;`);
      }
    }
  }

  private writeInstance(slave: SlaveInstance, descriptor: IPDescriptor): void {
    const boundPins = this.binding.pins.get(slave.name);
    const connections = [
      ".clk_i(wb_clk)",
      ".rst_i(wb_rst)",
      ".adr_i(wb_adr)",
      ".dat_i(wb_dat_i)",
      `.dat_o(${slave.name}_dat_o)`,
      ".sel_i(wb_sel)",
      ".cyc_i(wb_cyc)",
      `.stb_i(wb_stb & ${chipSelect(slave.name)})`,
      ".we_i(wb_we)",
      `.ack_o(${slave.name}_ack)`,
    ];
    if (descriptor.hasIrq) {
      connections.push(`.IRQ(${this.irqSlaves.has(slave.name) ? `${slave.name}_irq` : ""})`);
    }
    for (const pin of descriptor.interfacePins) {
      connections.push(...pinConnections(pin, boundPins?.get(pin.name)));
    }

    this.out.line();
    this.out.body(`// ${slave.name}: ${slave.typeId} at ${hex32(slave.baseAddress)}`);
    this.out.body(`${descriptor.moduleName} ${slave.name} (`);
    connections.forEach((connection, i) => {
      this.out.body(`${INDENT}${connection}${i < connections.length - 1 ? "," : ""}`);
    });
    this.out.body(");");
  }

  private writeResponseMux(): void {
    this.out.line();
    this.out.body("// Response mux, first chip select wins");
    this.writePriorityChain("wb_dat_o", "dat_o", verilogHex(0, DATA_WIDTH));
    this.writePriorityChain("wb_ack", "ack", "1'b0");
  }

  private writePriorityChain(target: string, suffix: string, fallback: string): void {
    const head = `assign ${target} = `;
    const pad = " ".repeat(head.length);
    const arms = this.config.slaves.map((slave) => `${chipSelect(slave.name)} ? ${slave.name}_${suffix} :`);
    if (arms.length === 0) {
      this.out.body(`${head}${fallback};`);
      return;
    }
    arms.forEach((arm, i) => this.out.body(`${i === 0 ? head : pad}${arm}`));
    this.out.body(`${pad}${fallback};`);
  }

  private writeInterrupts(): void {
    this.out.line();
    this.out.body("// Interrupts");
    for (let index = 0; index < this.options.irqWidth; index += 1) {
      const slave = this.binding.irq.get(index);
      this.out.body(`assign user_irq[${index}] = ${slave ? `${slave}_irq` : "1'b0"};`);
    }
  }

  private writeIoPads(): void {
    this.out.line();
    this.out.body("// I/O pads: io_oen is active high");
    for (let bit = 0; bit < this.options.ioWidth; bit += 1) {
      const claim = this.binding.io.get(bit);
      if (!claim) {
        this.out.body(`assign io_out[${bit}] = 1'b0; assign io_oen[${bit}] = 1'b1; // unclaimed`);
        continue;
      }
      const label = `${claim.slave}.${claim.pin}[${claim.pinBit}]`;
      if (claim.direction === "in") {
        this.out.body(`assign io_out[${bit}] = 1'b0; assign io_oen[${bit}] = 1'b0; // ${label} input`);
      } else if (claim.direction === "out") {
        this.out.body(`assign io_oen[${bit}] = 1'b1; // ${label} output`);
      } else {
        this.out.body(`// io[${bit}] driven by ${label}`);
      }
    }
  }
}

/**
 * Renders the interconnect module (and optionally the C address-map header)
 * from validated inputs. The output depends on nothing but the arguments, so
 * identical inputs give byte-identical text.
 */
export function emitInterconnect(
  config: BusConfig,
  addressMap: AddressMap,
  binding: InterfaceBinding,
  catalog: IPCatalog,
  options: Partial<EmitOptions> = {},
): GeneratedArtifacts {
  const resolved: EmitOptions = { ...DEFAULT_BUS_OPTIONS, header: true, ...options };
  const interconnect = new InterconnectEmitter(config, addressMap, binding, catalog, resolved).emit();
  if (!resolved.header) {
    return { interconnect };
  }
  return { interconnect, header: emitAddressHeader(config, addressMap, binding, resolved) };
}

import { describe, expect, it } from "vitest";
import { INTERCONNECT_PORTS, emitInterconnect, generate, parseBusConfig, validateBus } from "../src/index.js";
import type { BusConfig, EmitOptions } from "../src/index.js";
import { coreCatalog, threeSlaveConfig } from "./fixtures.js";

const catalog = coreCatalog();

function emit(config: BusConfig, options: Partial<EmitOptions> = {}) {
  const validation = validateBus(config, catalog, options);
  if (!validation.ok) {
    throw new Error(`unexpected diagnostics: ${JSON.stringify(validation.errors)}`);
  }
  const { addressMap, binding } = validation.value;
  return emitInterconnect(config, addressMap, binding, catalog, options);
}

function lines(text: string): string[] {
  return text.split("\n");
}

describe("emitInterconnect", () => {
  it("renders a single-slave interconnect", () => {
    const config = parseBusConfig([
      { name: "uart0", type: "EF_UART", base_address: "0x30000000", irq: 0, io_pins: { rx: 0, tx: 1 } },
    ]);
    const { interconnect } = emit(config, { ioWidth: 4, irqWidth: 2, header: false });

    expect(interconnect).toBe(
      [
        "// wb_bus: Wishbone interconnect for 1 slave.",
        "// Generated file; edit the bus configuration instead.",
        "",
        "`default_nettype none",
        "",
        "module wb_bus (",
        "    input  wire        wb_clk,",
        "    input  wire        wb_rst,",
        "    input  wire [31:0] wb_adr,",
        "    input  wire [31:0] wb_dat_i,",
        "    output wire [31:0] wb_dat_o,",
        "    input  wire [3:0]  wb_sel,",
        "    input  wire        wb_we,",
        "    input  wire        wb_stb,",
        "    input  wire        wb_cyc,",
        "    output wire        wb_ack,",
        "    input  wire [3:0]  io_in,",
        "    output wire [3:0]  io_out,",
        "    output wire [3:0]  io_oen,",
        "    output wire [1:0]  user_irq",
        ");",
        "",
        "    // Chip selects",
        "    wire cs_uart0 = (wb_adr >= 32'h3000_0000) && (wb_adr < 32'h3001_0000);",
        "",
        "    // Slave responses",
        "    wire [31:0] uart0_dat_o;",
        "    wire        uart0_ack;",
        "    wire        uart0_irq;",
        "",
        "    // uart0: EF_UART at 0x30000000",
        "    EF_UART_WB uart0 (",
        "        .clk_i(wb_clk),",
        "        .rst_i(wb_rst),",
        "        .adr_i(wb_adr),",
        "        .dat_i(wb_dat_i),",
        "        .dat_o(uart0_dat_o),",
        "        .sel_i(wb_sel),",
        "        .cyc_i(wb_cyc),",
        "        .stb_i(wb_stb & cs_uart0),",
        "        .we_i(wb_we),",
        "        .ack_o(uart0_ack),",
        "        .IRQ(uart0_irq),",
        "        .rx(io_in[0]),",
        "        .tx(io_out[1])",
        "    );",
        "",
        "    // Response mux, first chip select wins",
        "    assign wb_dat_o = cs_uart0 ? uart0_dat_o :",
        `${" ".repeat(22)}32'h0000_0000;`,
        "    assign wb_ack = cs_uart0 ? uart0_ack :",
        `${" ".repeat(20)}1'b0;`,
        "",
        "    // Interrupts",
        "    assign user_irq[0] = uart0_irq;",
        "    assign user_irq[1] = 1'b0;",
        "",
        "    // I/O pads: io_oen is active high",
        "    assign io_out[0] = 1'b0; assign io_oen[0] = 1'b0; // uart0.rx[0] input",
        "    assign io_oen[1] = 1'b1; // uart0.tx[0] output",
        "    assign io_out[2] = 1'b0; assign io_oen[2] = 1'b1; // unclaimed",
        "    assign io_out[3] = 1'b0; assign io_oen[3] = 1'b1; // unclaimed",
        "endmodule",
        "",
        "`default_nettype wire",
        "",
      ].join("\n"),
    );
  });

  it("declares exactly the interconnect ports", () => {
    const text = lines(emit(threeSlaveConfig()).interconnect);
    const start = text.indexOf("module wb_bus (");
    const end = text.indexOf(");", start);
    const ports = text.slice(start + 1, end).map((line) => line.replace(/,$/, "").split(" ").pop());
    expect(ports).toEqual(INTERCONNECT_PORTS);
  });

  it("gives identical output for identical inputs", () => {
    const first = emit(threeSlaveConfig());
    const second = emit(threeSlaveConfig());
    expect(second).toEqual(first);
  });

  it("chains chip selects in declaration order", () => {
    const text = lines(emit(threeSlaveConfig()).interconnect);
    expect(text.filter((line) => line.startsWith("    wire cs_"))).toEqual([
      "    wire cs_uart0 = (wb_adr >= 32'h3000_0000) && (wb_adr < 32'h3001_0000);",
      "    wire cs_uart1 = (wb_adr >= 32'h3001_0000) && (wb_adr < 32'h3002_0000);",
      "    wire cs_gpio0 = (wb_adr >= 32'h3002_0000) && (wb_adr < 32'h3003_0000);",
    ]);
    const mux = text.indexOf("    assign wb_ack = cs_uart0 ? uart0_ack :");
    expect(text.slice(mux, mux + 4)).toEqual([
      "    assign wb_ack = cs_uart0 ? uart0_ack :",
      `${" ".repeat(20)}cs_uart1 ? uart1_ack :`,
      `${" ".repeat(20)}cs_gpio0 ? gpio0_ack :`,
      `${" ".repeat(20)}1'b0;`,
    ]);
  });

  it("connects bidirectional pins to all three pad vectors", () => {
    const text = lines(emit(threeSlaveConfig()).interconnect);
    expect(text).toContain("        .gpio_in(io_in[27:14]),");
    expect(text).toContain("        .gpio_out(io_out[27:14]),");
    expect(text).toContain("        .gpio_oe(io_oen[27:14])");
    expect(text).toContain("    // io[14] driven by gpio0.gpio[0]");
    expect(text).toContain("    // io[27] driven by gpio0.gpio[13]");
    expect(text).toContain("    assign io_out[37] = 1'b0; assign io_oen[37] = 1'b1; // unclaimed");
  });

  it("ties off unbound pins and an unassigned interrupt", () => {
    const config = parseBusConfig([{ name: "spi0", type: "EF_SPI", base_address: "0x30000000" }]);
    const text = lines(emit(config).interconnect);
    expect(text).toContain("        .IRQ(),");
    expect(text).toContain("        .sclk(),");
    expect(text).toContain("        .miso(1'b0),");
    expect(text).toContain("        .irq_out()");
    expect(text).not.toContain("    wire        spi0_irq;");
    expect(text).toContain("    assign user_irq[0] = 1'b0;");
  });

  it("concatenates non-contiguous bits MSB first", () => {
    const config = parseBusConfig([
      { name: "tmr0", type: "EF_TMR", base_address: "0x30000000", io_pins: { pwm: [5, 3] } },
    ]);
    const text = lines(emit(config).interconnect);
    expect(text).toContain("        .pwm({io_out[3], io_out[5]})");
    expect(text).toContain("    assign io_oen[3] = 1'b1; // tmr0.pwm[1] output");
    expect(text.some((line) => line.includes(".IRQ("))).toBe(false);
  });

  it("renders an empty bus with constant responses", () => {
    const { interconnect } = emit(parseBusConfig([]));
    const text = lines(interconnect);
    expect(text[0]).toBe("// wb_bus: Wishbone interconnect for 0 slaves.");
    expect(text).toContain("    assign wb_dat_o = 32'h0000_0000;");
    expect(text).toContain("    assign wb_ack = 1'b0;");
    expect(text).toContain("    assign user_irq[2] = 1'b0;");
  });

  it("widens the end literal of the topmost window", () => {
    const config = parseBusConfig([{ name: "top", type: "EF_TMR", base_address: "0xFFFF0000" }]);
    expect(lines(emit(config).interconnect)).toContain(
      "    wire cs_top = (wb_adr >= 32'hFFFF_0000) && (wb_adr < 33'h1_0000_0000);",
    );
  });

  it("uses the configured module name", () => {
    const artifacts = emit(threeSlaveConfig(), { moduleName: "periph_bus" });
    expect(lines(artifacts.interconnect)).toContain("module periph_bus (");
    expect(artifacts.header?.split("\n").slice(0, 3)).toEqual([
      "/* periph_bus address map. Generated file; edit the bus configuration instead. */",
      "#ifndef PERIPH_BUS_H",
      "#define PERIPH_BUS_H",
    ]);
  });
});

describe("emitAddressHeader", () => {
  it("lists every window and interrupt", () => {
    expect(generate(threeSlaveConfig(), catalog).header).toBe(
      [
        "/* wb_bus address map. Generated file; edit the bus configuration instead. */",
        "#ifndef WB_BUS_H",
        "#define WB_BUS_H",
        "",
        "#define UART0_BASE 0x30000000UL",
        "#define UART0_SIZE 0x00010000UL",
        "#define UART0_IRQ 0",
        "",
        "#define UART1_BASE 0x30010000UL",
        "#define UART1_SIZE 0x00010000UL",
        "#define UART1_IRQ 1",
        "",
        "#define GPIO0_BASE 0x30020000UL",
        "#define GPIO0_SIZE 0x00010000UL",
        "#define GPIO0_IRQ 2",
        "",
        "#endif /* WB_BUS_H */",
        "",
      ].join("\n"),
    );
  });

  it("is skipped when not requested", () => {
    expect(generate(threeSlaveConfig(), catalog, { header: false }).header).toBeUndefined();
  });
});

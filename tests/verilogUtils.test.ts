import { describe, expect, it } from "vitest";
import {
  DEFAULT_BUS_OPTIONS,
  bitSelect,
  hex32,
  isVerilogIdentifier,
  isVerilogKeyword,
  parseHexAddress,
  resolveBusOptions,
  verilogHex,
  zeros,
} from "../src/index.js";

describe("verilogUtils", () => {
  it("formats sized hex literals in groups of four digits", () => {
    expect(verilogHex(0x30000000)).toBe("32'h3000_0000");
    expect(verilogHex(0)).toBe("32'h0000_0000");
    expect(verilogHex(0x100000000)).toBe("33'h1_0000_0000");
    expect(verilogHex(0xab, 8)).toBe("8'hAB");
  });

  it("formats C addresses with eight digits", () => {
    expect(hex32(0x10000)).toBe("0x00010000");
    expect(hex32(0xdeadbeef)).toBe("0xDEADBEEF");
  });

  it("selects single bits, ranges and concatenations", () => {
    expect(bitSelect("io_in", [7])).toBe("io_in[7]");
    expect(bitSelect("io_in", [4, 5, 6])).toBe("io_in[6:4]");
    expect(bitSelect("io_out", [9, 2, 3])).toBe("{io_out[3], io_out[2], io_out[9]}");
  });

  it("builds zero constants", () => {
    expect(zeros(1)).toBe("1'b0");
    expect(zeros(14)).toBe("{14{1'b0}}");
  });

  it("parses the accepted address spellings", () => {
    expect(parseHexAddress("0x3000_0000")).toBe(0x30000000);
    expect(parseHexAddress(" 32'h30010000 ")).toBe(0x30010000);
    expect(parseHexAddress("'hff")).toBe(0xff);
    expect(parseHexAddress("0X1f")).toBe(0x1f);
    expect(parseHexAddress("0x_1")).toBeUndefined();
    expect(parseHexAddress("12")).toBeUndefined();
    expect(parseHexAddress("0xg")).toBeUndefined();
  });

  it("recognises Verilog identifiers", () => {
    expect(isVerilogIdentifier("uart_0")).toBe(true);
    expect(isVerilogIdentifier("_tmp$1")).toBe(true);
    expect(isVerilogIdentifier("0uart")).toBe(false);
    expect(isVerilogIdentifier("uart-0")).toBe(false);
    expect(isVerilogIdentifier("reg")).toBe(false);
    expect(isVerilogIdentifier("Reg")).toBe(true);
  });

  it("knows the reserved words", () => {
    expect(isVerilogKeyword("endmodule")).toBe(true);
    expect(isVerilogKeyword("uwire")).toBe(true);
    expect(isVerilogKeyword("uart")).toBe(false);
  });
});

describe("resolveBusOptions", () => {
  it("fills in defaults", () => {
    expect(resolveBusOptions()).toEqual(DEFAULT_BUS_OPTIONS);
    expect(resolveBusOptions({ ioWidth: 16 })).toEqual({ ...DEFAULT_BUS_OPTIONS, ioWidth: 16 });
  });

  it.each([
    [{ windowSize: 0x18000 }, "Window size must be a power of two between 4 and 2^32, got 98304"],
    [{ windowSize: 2 }, "Window size must be a power of two between 4 and 2^32, got 2"],
    [{ ioWidth: 0 }, "I/O vector width must be a positive integer, got 0"],
    [{ irqWidth: 1.5 }, "IRQ vector width must be a positive integer, got 1.5"],
    [{ moduleName: "wb bus" }, "Module name 'wb bus' is not a Verilog identifier"],
    [{ moduleName: "module" }, "Module name 'module' is not a Verilog identifier"],
  ])("rejects %o", (options, message) => {
    expect(() => resolveBusOptions(options)).toThrow(message);
  });
});

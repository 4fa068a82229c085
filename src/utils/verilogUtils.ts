import keywords from "./verilogKeywords.json" with { type: "json" };

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;
const KEYWORDS: ReadonlySet<string> = new Set(keywords);

export function isVerilogKeyword(name: string): boolean {
  return KEYWORDS.has(name);
}

/** A simple identifier that is not a reserved word, usable as a module, instance or port name. */
export function isVerilogIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !KEYWORDS.has(name);
}

/** `0x30000000`: C-style, at least eight digits. */
export function hex32(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(8, "0")}`;
}

/**
 * Sized hex literal, `32'h3000_0000`. Values that do not fit in `width` bits
 * widen the literal so that `base + window` at the top of the address space
 * stays exact.
 */
export function verilogHex(value: number, width = 32): string {
  const bits = Math.max(width, value === 0 ? 1 : Math.floor(Math.log2(value)) + 1);
  const digits = value.toString(16).toUpperCase().padStart(Math.ceil(bits / 4), "0");
  const grouped = digits.replace(/\B(?=([0-9A-F]{4})+$)/g, "_");
  return `${bits}'h${grouped}`;
}

/** Verilog select of `vector` covering `bits` (LSB first). */
export function bitSelect(vector: string, bits: readonly number[]): string {
  if (bits.length === 1) {
    return `${vector}[${bits[0]}]`;
  }
  const contiguous = bits.every((bit, i) => i === 0 || bit === bits[i - 1] + 1);
  if (contiguous) {
    return `${vector}[${bits[bits.length - 1]}:${bits[0]}]`;
  }
  return `{${[...bits].reverse().map((bit) => `${vector}[${bit}]`).join(", ")}}`;
}

export function zeros(width: number): string {
  return width === 1 ? "1'b0" : `{${width}{1'b0}}`;
}

/**
 * Parses an address written as `0x3000_0000`, `32'h30000000` or `'h30000000`.
 * Returns undefined for anything else.
 */
export function parseHexAddress(text: string): number | undefined {
  const match = text.trim().match(/^(?:0x|(?:\d+)?'h)([0-9a-f][0-9a-f_]*)$/i);
  if (!match) {
    return undefined;
  }
  const value = Number.parseInt(match[1].replace(/_/g, ""), 16);
  return Number.isSafeInteger(value) ? value : undefined;
}

import type { BusDiagnostic } from "./bus/diagnostics.js";

/**
 * A bus configuration document whose shape is broken. There is no partial
 * interpretation of such a document, so parsing stops at the first one.
 */
export class ConfigShapeError extends Error {
  constructor(
    readonly slaveIndex: number | undefined,
    readonly field: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    const where = slaveIndex === undefined ? "bus config" : `slave #${slaveIndex}`;
    super(`${where}: invalid '${field}': ${detail}`, options);
    this.name = "ConfigShapeError";
  }
}

export class MalformedDescriptorError extends Error {
  constructor(
    readonly typeId: string,
    readonly field: string,
    detail: string,
  ) {
    super(`IP descriptor '${typeId}': invalid '${field}': ${detail}`);
    this.name = "MalformedDescriptorError";
  }
}

export class DuplicateTypeError extends Error {
  constructor(
    readonly typeId: string,
    readonly sourceA: string,
    readonly sourceB: string,
  ) {
    super(`IP type '${typeId}' is declared differently in '${sourceA}' and '${sourceB}'`);
    this.name = "DuplicateTypeError";
  }
}

export class UnknownTypeError extends Error {
  constructor(readonly typeId: string) {
    super(`IP type '${typeId}' is not in the catalog`);
    this.name = "UnknownTypeError";
  }
}

export type MissingMarker = "begin" | "end" | "both";

export class NoMarkerFoundError extends Error {
  constructor(
    readonly missing: MissingMarker,
    readonly markers: { begin: string; end: string },
  ) {
    const which =
      missing === "both" ? `'${markers.begin}' and '${markers.end}'` : `'${missing === "begin" ? markers.begin : markers.end}'`;
    super(`Marker ${which} not found`);
    this.name = "NoMarkerFoundError";
  }
}

export class MalformedMarkerError extends Error {
  constructor(readonly reason: string) {
    super(`Malformed marker pair: ${reason}`);
    this.name = "MalformedMarkerError";
  }
}

/**
 * Thrown by `generate` when the pooled validation result is not empty.
 * Carries every diagnostic found in the run.
 */
export class ValidationError extends Error {
  constructor(readonly diagnostics: readonly BusDiagnostic[]) {
    super(`Bus validation failed with ${diagnostics.length} error${diagnostics.length === 1 ? "" : "s"}`);
    this.name = "ValidationError";
  }
}

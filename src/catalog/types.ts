export type PinDirection = "in" | "out" | "bidir";

export interface InterfacePin {
  readonly name: string;
  readonly width: number;
  readonly direction: PinDirection;
}

export interface IPDescriptor {
  readonly typeId: string;
  /** Verilog module instantiated for this IP; defaults to `<typeId>_WB`. */
  readonly moduleName: string;
  readonly cellCount: number;
  readonly hasIrq: boolean;
  readonly hasFifo: boolean;
  readonly interfacePins: readonly InterfacePin[];
  readonly description: string;
}

/**
 * One catalog document as handed over by whoever fetched it. `name` only
 * identifies the document in diagnostics (a path or a URL).
 */
export interface CatalogSource {
  name: string;
  descriptors: unknown;
}

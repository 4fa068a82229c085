import type { IPCatalog } from "../catalog/ipCatalog.js";
import { validateAddresses } from "../bus/addressAllocator.js";
import type { BusDiagnostic } from "../bus/diagnostics.js";
import { bindInterfaces } from "../bus/interfaceBinder.js";
import type { AddressMap, BusConfig, BusOptions, InterfaceBinding, Validation } from "../bus/types.js";
import { resolveBusOptions } from "../bus/types.js";
import { emitInterconnect } from "../emit/verilogEmitter.js";
import type { GeneratedArtifacts } from "../emit/verilogEmitter.js";
import { ValidationError } from "../errors.js";

export interface GenerateOptions extends Partial<BusOptions> {
  /** Render the C address-map header as well. Defaults to true. */
  header?: boolean;
}

export interface ValidatedBus {
  addressMap: AddressMap;
  binding: InterfaceBinding;
}

/**
 * Runs the address and interface checks independently and pools what they
 * find. The result is ok only if neither reported anything.
 */
export function validateBus(
  config: BusConfig,
  catalog: IPCatalog,
  options: Partial<BusOptions> = {},
): Validation<ValidatedBus, BusDiagnostic> {
  const resolved = resolveBusOptions(options);
  const addresses = validateAddresses(config, resolved);
  const interfaces = bindInterfaces(config, catalog, resolved);

  if (addresses.ok && interfaces.ok) {
    return { ok: true, value: { addressMap: addresses.value, binding: interfaces.value } };
  }
  const errors: BusDiagnostic[] = [
    ...(addresses.ok ? [] : addresses.errors),
    ...(interfaces.ok ? [] : interfaces.errors),
  ];
  return { ok: false, errors };
}

/**
 * Validates `config` against `catalog` and renders the interconnect. Throws
 * {@link ValidationError} with every pooled diagnostic instead of emitting
 * anything when validation finds a problem.
 */
export function generate(config: BusConfig, catalog: IPCatalog, options: GenerateOptions = {}): GeneratedArtifacts {
  const { header = true, ...busOptions } = options;
  const resolved = resolveBusOptions(busOptions);
  const validation = validateBus(config, catalog, resolved);
  if (!validation.ok) {
    throw new ValidationError(validation.errors);
  }
  const { addressMap, binding } = validation.value;
  return emitInterconnect(config, addressMap, binding, catalog, { ...resolved, header });
}

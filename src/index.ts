export * from "./errors.js";
export * from "./catalog/types.js";
export * from "./catalog/ipCatalog.js";
export * from "./catalog/aggregatedLibrary.js";
export * from "./bus/types.js";
export * from "./bus/diagnostics.js";
export * from "./bus/busConfig.js";
export * from "./bus/addressAllocator.js";
export * from "./bus/interfaceBinder.js";
export * from "./emit/verilogEmitter.js";
export * from "./emit/headerEmitter.js";
export * from "./emit/projectFragments.js";
export * from "./patch/artifactPatcher.js";
export * from "./pipeline/generate.js";
export * from "./io/documents.js";
export * from "./integration/caravelProject.js";
export * from "./utils/verilogUtils.js";

#!/usr/bin/env node
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { resolve, join } from "node:path";
import { formatDiagnostic } from "./bus/diagnostics.js";
import { DEFAULT_BUS_OPTIONS } from "./bus/types.js";
import { blackboxFiles, wrapperInstantiation } from "./emit/projectFragments.js";
import { ValidationError } from "./errors.js";
import { CaravelProject } from "./integration/caravelProject.js";
import { readBusConfig, readCatalog } from "./io/documents.js";
import { applyPatch, hashMarkers, verilogMarkers } from "./patch/artifactPatcher.js";
import { generate } from "./pipeline/generate.js";

interface CliArgs {
  command?: string;
  positional: string[];
  ipLibs: string[];
  outputDir: string;
  moduleName: string;
  verilogOnly: boolean;
  headerOnly: boolean;
  full: boolean;
  caravelRoot?: string;
  updateOpenlane: boolean;
  begin?: string;
  end?: string;
}

function printUsage(): void {
  console.error(
    [
      "Usage: wbgen <command> [options]",
      "",
      "  generate <bus.yaml> [--ip-lib <file>]... [--output-dir <dir>] [--module <name>]",
      "           [--verilog-only | --header-only] [--caravel-root <dir> [--update-openlane]]",
      "  list [--ip-lib <file>]...",
      "  info <type> [--ip-lib <file>]... [--full]",
      "  patch <target> <fragment> --begin <line> --end <line>",
      "  update-wrapper <caravel_root> [--module <name>]",
      "  update-openlane <caravel_root> <bus.yaml> [--ip-lib <file>]...",
    ].join("\n"),
  );
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    positional: [],
    ipLibs: [],
    outputDir: ".",
    moduleName: DEFAULT_BUS_OPTIONS.moduleName,
    verilogOnly: false,
    headerOnly: false,
    full: false,
    updateOpenlane: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = i + 1 < argv.length ? argv[i + 1] : undefined;
    if (arg === "--ip-lib" && next !== undefined) {
      args.ipLibs.push(next);
      i += 1;
    } else if (arg === "--output-dir" && next !== undefined) {
      args.outputDir = next;
      i += 1;
    } else if (arg === "--module" && next !== undefined) {
      args.moduleName = next;
      i += 1;
    } else if (arg === "--caravel-root" && next !== undefined) {
      args.caravelRoot = next;
      i += 1;
    } else if (arg === "--begin" && next !== undefined) {
      args.begin = next;
      i += 1;
    } else if (arg === "--end" && next !== undefined) {
      args.end = next;
      i += 1;
    } else if (arg === "--verilog-only") {
      args.verilogOnly = true;
    } else if (arg === "--header-only") {
      args.headerOnly = true;
    } else if (arg === "--full") {
      args.full = true;
    } else if (arg === "--update-openlane") {
      args.updateOpenlane = true;
    } else if (args.command === undefined) {
      args.command = arg;
    } else {
      args.positional.push(arg);
    }
  }

  if (args.ipLibs.length === 0) {
    args.ipLibs.push("ip-lib.json");
  }
  return args;
}

function fail(message: string): never {
  console.error(message);
  printUsage();
  process.exit(1);
}

async function generateCommand(args: CliArgs): Promise<void> {
  const [busPath] = args.positional;
  if (!busPath) fail("generate: missing bus configuration file");
  if (args.verilogOnly && args.headerOnly) fail("generate: --verilog-only and --header-only exclude each other");

  const [config, catalog] = await Promise.all([readBusConfig(busPath), readCatalog(args.ipLibs)]);
  const artifacts = generate(config, catalog, { moduleName: args.moduleName, header: !args.verilogOnly });

  const outputDir = resolve(process.cwd(), args.outputDir);
  await mkdir(outputDir, { recursive: true });
  if (!args.headerOnly) {
    const verilogPath = join(outputDir, `${args.moduleName}.v`);
    await writeFile(verilogPath, artifacts.interconnect);
    console.log(`Wrote interconnect to ${verilogPath}`);
  }
  if (artifacts.header !== undefined) {
    const headerPath = join(outputDir, `${args.moduleName}.h`);
    await writeFile(headerPath, artifacts.header);
    console.log(`Wrote address map to ${headerPath}`);
  }

  if (args.caravelRoot) {
    const project = await CaravelProject.open(resolve(process.cwd(), args.caravelRoot));
    if (!args.headerOnly) {
      const rtl = await project.writeRtl(`${args.moduleName}.v`, artifacts.interconnect);
      console.log(`Wrote interconnect to ${rtl}`);
      const wrapper = await project.updateWrapper(wrapperInstantiation(args.moduleName), verilogMarkers(args.moduleName));
      console.log(`Backed up ${wrapper.path} to ${wrapper.backup}`);
      console.log(`Updated ${wrapper.path}`);
    }
    if (args.updateOpenlane) {
      const openlane = await project.updateOpenlaneConfig(blackboxFiles(config, catalog), hashMarkers(args.moduleName));
      console.log(`Backed up ${openlane.path} to ${openlane.backup}`);
      console.log(`Updated ${openlane.path}`);
    }
  }
}

async function listCommand(args: CliArgs): Promise<void> {
  const catalog = await readCatalog(args.ipLibs);
  console.log("Available IP types:");
  for (const typeId of catalog.types()) {
    console.log(`  - ${typeId}`);
  }
}

async function infoCommand(args: CliArgs): Promise<void> {
  const [typeId] = args.positional;
  if (!typeId) fail("info: missing IP type");
  const catalog = await readCatalog(args.ipLibs);
  const descriptor = catalog.lookup(typeId);
  const pins = descriptor.interfacePins.map((pin) => `${pin.name}[${pin.width}] (${pin.direction})`);
  console.log(`Information for ${typeId}:`);
  console.log(`  Module: ${descriptor.moduleName}`);
  console.log(`  Cell count: ${descriptor.cellCount}`);
  console.log(`  Interrupts: ${descriptor.hasIrq ? "Yes" : "No"}`);
  console.log(`  FIFO usage: ${descriptor.hasFifo ? "Yes" : "No"}`);
  console.log(`  External interfaces: ${pins.length > 0 ? pins.join(", ") : "None"}`);
  if (args.full) {
    console.log(`  Description: ${descriptor.description}`);
  }
}

async function patchCommand(args: CliArgs): Promise<void> {
  const [targetPath, fragmentPath] = args.positional;
  if (!targetPath || !fragmentPath) fail("patch: expected <target> and <fragment>");
  if (args.begin === undefined || args.end === undefined) fail("patch: --begin and --end are required");

  const [existing, fragment] = await Promise.all([readFile(targetPath, "utf-8"), readFile(fragmentPath, "utf-8")]);
  await writeFile(targetPath, applyPatch(existing, fragment, { begin: args.begin, end: args.end }));
  console.log(`Updated ${targetPath}`);
}

async function updateWrapperCommand(args: CliArgs): Promise<void> {
  const [root] = args.positional;
  if (!root) fail("update-wrapper: missing caravel_root");
  const project = await CaravelProject.open(resolve(process.cwd(), root));
  const result = await project.updateWrapper(wrapperInstantiation(args.moduleName), verilogMarkers(args.moduleName));
  console.log(`Backed up ${result.path} to ${result.backup}`);
  console.log(`Updated ${result.path}`);
}

async function updateOpenlaneCommand(args: CliArgs): Promise<void> {
  const [root, busPath] = args.positional;
  if (!root || !busPath) fail("update-openlane: expected <caravel_root> and <bus.yaml>");
  const [config, catalog, project] = await Promise.all([
    readBusConfig(busPath),
    readCatalog(args.ipLibs),
    CaravelProject.open(resolve(process.cwd(), root)),
  ]);
  const result = await project.updateOpenlaneConfig(blackboxFiles(config, catalog), hashMarkers(args.moduleName));
  console.log(`Backed up ${result.path} to ${result.backup}`);
  console.log(`Updated ${result.path}`);
}

const COMMANDS: Record<string, (args: CliArgs) => Promise<void>> = {
  generate: generateCommand,
  list: listCommand,
  info: infoCommand,
  patch: patchCommand,
  "update-wrapper": updateWrapperCommand,
  "update-openlane": updateOpenlaneCommand,
};

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command =
    args.command !== undefined && Object.hasOwn(COMMANDS, args.command) ? COMMANDS[args.command] : undefined;
  if (!command) {
    printUsage();
    process.exit(args.command === undefined || args.command === "help" ? 0 : 1);
  }
  await command(args);
}

main().catch((error) => {
  if (error instanceof ValidationError) {
    console.error(`${error.message}:`);
    for (const diagnostic of error.diagnostics) {
      console.error(`  - ${formatDiagnostic(diagnostic)}`);
    }
  } else {
    console.error(error instanceof Error ? error.stack ?? error.message : error);
  }
  process.exit(1);
});

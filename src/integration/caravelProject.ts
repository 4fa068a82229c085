import { access, copyFile, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tclBlackboxFragment } from "../emit/projectFragments.js";
import { applyPatch, hashMarkers, verilogMarkers } from "../patch/artifactPatcher.js";
import type { MarkerPair } from "../patch/artifactPatcher.js";

export interface PatchedFile {
  path: string;
  backup: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function backup(path: string): Promise<string> {
  const target = `${path}.bak`;
  await copyFile(path, target);
  return target;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * A Caravel user project on disk: the wrapper RTL and the OpenLane config of
 * `user_project_wrapper`. Every write first copies the original to `<file>.bak`.
 */
export class CaravelProject {
  readonly rtlDir: string;
  readonly wrapperPath: string;

  private constructor(
    readonly root: string,
    private readonly openlaneConfig: { path: string; format: "tcl" | "json" },
  ) {
    this.rtlDir = join(root, "verilog", "rtl");
    this.wrapperPath = join(this.rtlDir, "user_project_wrapper.v");
  }

  static async open(root: string): Promise<CaravelProject> {
    const wrapper = join(root, "verilog", "rtl", "user_project_wrapper.v");
    if (!(await exists(wrapper))) {
      throw new Error(`${root} does not look like a Caravel user project: ${wrapper} not found`);
    }
    const configDir = join(root, "openlane", "user_project_wrapper");
    const tcl = join(configDir, "config.tcl");
    if (await exists(tcl)) {
      return new CaravelProject(root, { path: tcl, format: "tcl" });
    }
    const json = join(configDir, "config.json");
    if (await exists(json)) {
      return new CaravelProject(root, { path: json, format: "json" });
    }
    throw new Error(`Neither config.tcl nor config.json found in ${configDir}`);
  }

  get openlaneConfigPath(): string {
    return this.openlaneConfig.path;
  }

  /** Writes a generated RTL file next to the wrapper and returns its path. */
  async writeRtl(fileName: string, text: string): Promise<string> {
    const path = join(this.rtlDir, fileName);
    await writeFile(path, text);
    return path;
  }

  /** Replaces the managed region of the wrapper with `fragment`. */
  async updateWrapper(fragment: string, markers: MarkerPair = verilogMarkers("wb_bus")): Promise<PatchedFile> {
    return this.patch(this.wrapperPath, fragment, markers);
  }

  /**
   * Adds the IP RTL files to `VERILOG_FILES_BLACKBOX`: through the managed
   * region of `config.tcl`, or by merging into the list in `config.json`.
   */
  async updateOpenlaneConfig(files: readonly string[], markers: MarkerPair = hashMarkers("wb_bus")): Promise<PatchedFile> {
    const { path, format } = this.openlaneConfig;
    if (format === "tcl") {
      return this.patch(path, tclBlackboxFragment(files), markers);
    }

    const config: unknown = JSON.parse(await readFile(path, "utf-8"));
    if (typeof config !== "object" || config === null || Array.isArray(config)) {
      throw new Error(`${path} does not hold a JSON object`);
    }
    const current: unknown = Reflect.get(config, "VERILOG_FILES_BLACKBOX");
    let merged: string | string[];
    if (typeof current === "string") {
      const list = current.split(/\s+/).filter(Boolean);
      merged = [...list, ...files.filter((file) => !list.includes(file))].join(" ");
    } else if (current === undefined || isStringList(current)) {
      const list = current ?? [];
      merged = [...list, ...files.filter((file) => !list.includes(file))];
    } else {
      throw new Error(`${path}: VERILOG_FILES_BLACKBOX must be a string or a list of strings`);
    }

    const saved = await backup(path);
    await writeFile(path, `${JSON.stringify({ ...config, VERILOG_FILES_BLACKBOX: merged }, null, 2)}\n`);
    return { path, backup: saved };
  }

  private async patch(path: string, fragment: string, markers: MarkerPair): Promise<PatchedFile> {
    const original = await readFile(path, "utf-8");
    const patched = applyPatch(original, fragment, markers);
    const saved = await backup(path);
    await writeFile(path, patched);
    return { path, backup: saved };
  }
}

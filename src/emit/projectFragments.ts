import type { IPCatalog } from "../catalog/ipCatalog.js";
import type { BusConfig } from "../bus/types.js";
import { DEFAULT_BUS_OPTIONS } from "../bus/types.js";

/**
 * Instantiation of the interconnect inside a Caravel `user_project_wrapper`.
 * The wrapper's pads take an active-low output enable.
 */
export function wrapperInstantiation(moduleName: string = DEFAULT_BUS_OPTIONS.moduleName): string {
  return [
    "wire [`MPRJ_IO_PADS-1:0] internal_io_oen;",
    "",
    `${moduleName} u_${moduleName} (`,
    "    .wb_clk(wb_clk_i),",
    "    .wb_rst(wb_rst_i),",
    "    .wb_adr(wbs_adr_i),",
    "    .wb_dat_i(wbs_dat_i),",
    "    .wb_dat_o(wbs_dat_o),",
    "    .wb_sel(wbs_sel_i),",
    "    .wb_we(wbs_we_i),",
    "    .wb_stb(wbs_stb_i),",
    "    .wb_cyc(wbs_cyc_i),",
    "    .wb_ack(wbs_ack_o),",
    "    .io_in(io_in),",
    "    .io_out(io_out),",
    "    .io_oen(internal_io_oen),",
    "    .user_irq(user_irq)",
    ");",
    "",
    "assign io_oeb = ~internal_io_oen;",
  ].join("\n");
}

/** RTL files of every distinct IP module the config instantiates, in first-use order. */
export function blackboxFiles(config: BusConfig, catalog: IPCatalog, rtlDir = "$::env(DESIGN_DIR)/../../verilog/rtl"): string[] {
  const files: string[] = [];
  for (const slave of config.slaves) {
    const file = `${rtlDir}/${catalog.lookup(slave.typeId).moduleName}.v`;
    if (!files.includes(file)) {
      files.push(file);
    }
  }
  return files;
}

/** Lines for the managed region of an OpenLane `config.tcl`. */
export function tclBlackboxFragment(files: readonly string[]): string {
  return files.map((file) => `lappend ::env(VERILOG_FILES_BLACKBOX) ${file}`).join("\n");
}

export function openlaneBlackboxFragment(config: BusConfig, catalog: IPCatalog): string {
  return tclBlackboxFragment(blackboxFiles(config, catalog));
}

/**
 * Path Resolver - Derives synthesis artifact paths from the layer name
 */

import { join, dirname } from "path";

/**
 * Path configuration
 */
export interface PathConfig {
  toolCommand: string;     // HLS executable invoked in each implementation directory
  solutionName: string;    // Solution directory inside the HLS project
  dataflowRegion: string;  // Name of the dataflow region wrapping the top loop
}

/**
 * Default configuration, overridable through the environment
 */
function defaultConfig(): PathConfig {
  return {
    toolCommand: process.env.HLS_TOOL_COMMAND || "vitis_hls",
    solutionName: process.env.HLS_SOLUTION_NAME || "solution1",
    dataflowRegion: process.env.HLS_DATAFLOW_REGION || "dataflow_in_loop_TOP_LOOP",
  };
}

/**
 * PathResolver maps a layer and an implementation directory to the files
 * the synthesis tool reads and writes
 */
class PathResolver {
  private config: PathConfig;

  constructor(config: Partial<PathConfig> = {}) {
    this.config = { ...defaultConfig(), ...config };
  }

  getToolCommand(): string {
    return this.config.toolCommand;
  }

  /**
   * TCL script that drives synthesis for a layer
   */
  getTclScript(layerName: string): string {
    return `${layerName}.tcl`;
  }

  /**
   * HLS project workspace created by the tool inside the implementation directory
   */
  getProjectDir(implDir: string, layerName: string): string {
    return join(implDir, `${layerName}_prj`);
  }

  /**
   * Report directory as the tool leaves it
   */
  getSolutionReportDir(implDir: string, layerName: string): string {
    return join(this.getProjectDir(implDir, layerName), this.config.solutionName, "syn", "report");
  }

  /**
   * Report directory after archiving
   */
  getArchivedReportDir(implDir: string): string {
    return join(implDir, "report");
  }

  /**
   * Top-level synthesis report (latency and resource estimates)
   */
  getTopLevelReport(implDir: string, layerName: string): string {
    return join(this.getArchivedReportDir(implDir), `${layerName}_top_csynth.xml`);
  }

  /**
   * Report of the dataflow region inside the top loop
   */
  getDataflowReport(implDir: string): string {
    return join(this.getArchivedReportDir(implDir), `${this.config.dataflowRegion}_csynth.rpt`);
  }

  /**
   * Base path (without extension) of a layer's summary files
   */
  getSummaryBasePath(implListPath: string, layerName: string): string {
    return join(dirname(implListPath), `${layerName}_implementations_summary`);
  }
}

// Export singleton instance
export const pathResolver = new PathResolver();

// Export class for custom configurations
export { PathResolver };

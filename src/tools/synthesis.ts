/**
 * Synthesis Tool - Runs Vitis HLS on one layer implementation
 */

import { spawn, ChildProcess } from "child_process";
import { pathResolver as defaultResolver, type PathResolver } from "../files/path-resolver.js";
import { ToolFailure } from "../errors.js";

/**
 * Synthesis result interface
 */
export interface SynthesisResult {
  success: boolean;
  layerName: string;
  implDir: string;
  exitCode: number | null;
}

/**
 * Runs synthesis for a layer inside an implementation directory
 */
export type SynthesisRunner = (layerName: string, implDir: string) => Promise<SynthesisResult>;

/**
 * Synthesize a layer implementation with `<tool> -f <layer>.tcl`, run from
 * the implementation directory. Tool output is discarded and no timeout is
 * applied; the exit code is the only contract.
 */
export function runHlsSynthesis(
  layerName: string,
  implDir: string,
  resolver: PathResolver = defaultResolver
): Promise<SynthesisResult> {
  const command = resolver.getToolCommand();

  return new Promise((resolve, reject) => {
    const child: ChildProcess = spawn(command, ["-f", resolver.getTclScript(layerName)], {
      cwd: implDir,
      stdio: ["ignore", "ignore", "ignore"],
    });

    child.on("close", (code) => {
      resolve({
        success: code === 0,
        layerName,
        implDir,
        exitCode: code,
      });
    });

    child.on("error", (error) => {
      reject(new ToolFailure(`Failed to start ${command} at ${implDir}: ${error.message}`, implDir, null));
    });
  });
}

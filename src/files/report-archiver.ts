/**
 * Report archiving for synthesized implementations
 *
 * The HLS tool leaves several MB of project data per implementation. Only
 * the reports are kept: they are copied to <impl>/report and the project
 * workspace is deleted.
 */

import { cpSync, existsSync, readdirSync, rmSync, statSync } from "fs";
import { join } from "path";
import { pathResolver as defaultResolver, type PathResolver } from "./path-resolver.js";

/**
 * Archive result
 */
export interface ArchiveResult {
  reportDir: string;
  archived: boolean;   // False when there was no workspace left to archive
  bytesFreed: number;
}

/**
 * Copy the solution reports next to the implementation and remove the
 * HLS project workspace. Running it again after a successful archive is a
 * no-op.
 */
export function archiveReports(
  implDir: string,
  layerName: string,
  resolver: PathResolver = defaultResolver
): ArchiveResult {
  const projectDir = resolver.getProjectDir(implDir, layerName);
  const reportDir = resolver.getArchivedReportDir(implDir);

  if (!existsSync(projectDir)) {
    return { reportDir, archived: false, bytesFreed: 0 };
  }

  // A fresh workspace replaces whatever an earlier run archived
  rmSync(reportDir, { recursive: true, force: true });

  const solutionReportDir = resolver.getSolutionReportDir(implDir, layerName);
  if (existsSync(solutionReportDir)) {
    cpSync(solutionReportDir, reportDir, { recursive: true });
  }

  const size = getDirSize(projectDir);
  rmSync(projectDir, { recursive: true, force: true });

  return { reportDir, archived: true, bytesFreed: size };
}

/**
 * Get directory size recursively
 */
export function getDirSize(dir: string): number {
  let size = 0;

  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      size += getDirSize(fullPath);
    } else {
      size += statSync(fullPath).size;
    }
  }

  return size;
}

/**
 * Format bytes for display
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";

  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  return `${(bytes / Math.pow(1024, i)).toFixed(2)} ${units[i]}`;
}

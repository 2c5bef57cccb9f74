/**
 * Variant Analyzer - Turns the reports of one synthesized implementation
 * into an AnalysisResult
 */

import { pathResolver as defaultResolver, type PathResolver } from "../files/path-resolver.js";
import { archiveReports, formatBytes } from "../files/report-archiver.js";
import { readDataflowReport, readTopLevelReport } from "../reports/report-reader.js";
import { calcTrueLatency } from "../reports/latency.js";
import type { AnalysisResult, ImplementationVariant, LayerSpec } from "../types/layer.js";

export interface AnalyzeOptions {
  resolver?: PathResolver;
  log?: (message: string) => void;
}

/**
 * Archive the reports of a synthesized implementation, then read them.
 *
 * The top-level report gives the overall latency and cost; the dataflow
 * region report gives the stage latencies and the interval used to
 * extrapolate the true latency.
 */
export function analyzeVariantReports(
  layer: LayerSpec,
  variant: ImplementationVariant,
  options: AnalyzeOptions = {}
): AnalysisResult {
  const { resolver = defaultResolver, log = console.log } = options;

  const archive = archiveReports(variant.dir, layer.layerName, resolver);
  if (archive.archived) {
    log(`Archived reports to ${archive.reportDir} (${formatBytes(archive.bytesFreed)} freed)`);
  }

  const dataflow = readDataflowReport(resolver.getDataflowReport(variant.dir));
  const top = readTopLevelReport(resolver.getTopLevelReport(variant.dir, layer.layerName));

  return {
    latency: top.worstCaseLatency,
    trueLatency: calcTrueLatency(layer, variant, top.worstCaseLatency, dataflow.initiationInterval),
    cost: top.cost,
    stages: dataflow.stages,
  };
}

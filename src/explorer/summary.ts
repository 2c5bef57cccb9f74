/**
 * Batch Summarizer
 *
 * Formats the analyzed implementations of a layer as a CSV table
 * (ImplementationDir,Latency,Cost) for downstream tooling and as a
 * narrative report for people. Rows keep exploration order; ranking is
 * left to whoever reads the CSV.
 */

import { rmSync, writeFileSync } from "fs";
import type { LayerSpec, SummaryFiles, VariantResult } from "../types/layer.js";

export const CSV_HEADER = "ImplementationDir,Latency,Cost";

const BANNER = "===========================================================";

/**
 * Cycle count with thousands separators
 */
export function formatCycles(cycles: number): string {
  return cycles.toLocaleString("en-US");
}

/**
 * Fractional utilization as a percentage with two decimals
 */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

/**
 * Cost fraction as written to the CSV; whole values keep one decimal
 * (1.0, 0.0) so the column always reads as a float
 */
export function formatCostValue(fraction: number): string {
  return Number.isInteger(fraction) ? fraction.toFixed(1) : String(fraction);
}

export function formatCsvRow({ variant, result }: VariantResult): string {
  return [variant.dir, String(result.trueLatency), formatCostValue(result.cost.total)].join(",");
}

export function formatCsv(results: readonly VariantResult[]): string {
  return [CSV_HEADER, ...results.map(formatCsvRow)].map((line) => `${line}\n`).join("");
}

export function formatNarrativeHeader(layer: LayerSpec): string {
  return `\n${BANNER}\n== Synthesis results for ${layer.layerName} layer implementations\n${BANNER}`;
}

/**
 * One implementation's section of the narrative report
 */
export function formatNarrativeBlock({ variant, result }: VariantResult): string {
  const lines: string[] = [];

  lines.push(`Implementation: ${variant.name}`);
  lines.push(`Directory: ${variant.dir}`);
  lines.push("");
  lines.push(`Total latency (raw)  : ${formatCycles(result.latency)} cycles`);
  lines.push(`Total latency (true) : ${formatCycles(result.trueLatency)} cycles`);
  lines.push("");

  lines.push("Cost info:");
  for (const [category, fraction] of Object.entries(result.cost.categories)) {
    if (category === "total") continue;
    lines.push(`${category}: ${formatPercent(fraction)}`);
  }
  lines.push(`Total cost: ${result.cost.total.toFixed(3)}`);
  lines.push("");

  lines.push("Subfunction latencies:");
  for (const stage of result.stages) {
    lines.push(`${stage.name}: ${stage.latency} cycles`);
  }

  return lines.join("\n") + "\n";
}

export function formatNarrative(layer: LayerSpec, results: readonly VariantResult[]): string {
  return formatNarrativeHeader(layer) + results.map((r) => `\n\n${formatNarrativeBlock(r)}`).join("");
}

export interface SummaryOptions {
  echo?: (text: string) => void;
}

/**
 * Write <base>.csv and <base>.txt, then echo the narrative and the paths
 * of the generated files
 */
export function generateLayerSummary(
  layer: LayerSpec,
  summaryBasePath: string,
  results: readonly VariantResult[],
  options: SummaryOptions = {}
): SummaryFiles {
  const { echo = (text: string) => process.stdout.write(text) } = options;

  const csvPath = `${summaryBasePath}.csv`;
  const textPath = `${summaryBasePath}.txt`;
  const narrative = formatNarrative(layer, results);

  // Both files or neither
  const written: string[] = [];
  try {
    writeFileSync(csvPath, formatCsv(results), "utf-8");
    written.push(csvPath);
    writeFileSync(textPath, narrative, "utf-8");
  } catch (error) {
    for (const path of written) {
      rmSync(path, { force: true });
    }
    throw error;
  }

  echo(narrative);
  echo(`\n\nGenerated above report at ${textPath}\n`);
  echo(`Generated CSV summary at ${csvPath}\n\n`);

  return { csvPath, textPath, narrative };
}

/**
 * Layer Explorer - Synthesizes every listed implementation of a layer,
 * analyzes its reports and summarizes the batch.
 *
 * Variants are handled one at a time, in list order. The first failure
 * aborts the batch and no summary is written: a summary with missing
 * rows could be misread.
 */

import { existsSync, statSync } from "fs";
import { pathResolver as defaultResolver, type PathResolver } from "../files/path-resolver.js";
import { runHlsSynthesis, type SynthesisRunner } from "../tools/synthesis.js";
import { ConfigurationError, ToolFailure } from "../errors.js";
import type { LayerSpec, SummaryFiles, VariantResult } from "../types/layer.js";
import { loadVariantList } from "./variant-list.js";
import { analyzeVariantReports } from "./variant-analyzer.js";
import { generateLayerSummary } from "./summary.js";

export interface ExploreOptions {
  resolver?: PathResolver;
  synthesize?: SynthesisRunner;   // Defaults to running the HLS tool
  skipSynthesis?: boolean;        // Re-analyze reports already on disk
  log?: (message: string) => void;
  echo?: (text: string) => void;
}

export interface ExploreResult extends SummaryFiles {
  results: VariantResult[];
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export async function exploreLayerImplementations(
  layer: LayerSpec,
  implListPath: string,
  options: ExploreOptions = {}
): Promise<ExploreResult> {
  const {
    resolver = defaultResolver,
    synthesize = (layerName: string, implDir: string) => runHlsSynthesis(layerName, implDir, resolver),
    skipSynthesis = false,
    log = console.log,
    echo,
  } = options;

  const variants = loadVariantList(implListPath);
  log(`Exploring ${variants.length} layer implementations for ${layer.layerName}.`);

  const results: VariantResult[] = [];

  for (const variant of variants) {
    if (!isDirectory(variant.dir)) {
      throw new ConfigurationError(`Invalid implementation path at ${variant.dir}`, variant.dir);
    }

    if (!skipSynthesis) {
      log(`Synthesizing layer implementation at ${variant.dir}`);
      const synthesis = await synthesize(layer.layerName, variant.dir);
      if (!synthesis.success) {
        throw new ToolFailure(
          `Vitis HLS failed with exit code ${synthesis.exitCode} at ${variant.dir}`,
          variant.dir,
          synthesis.exitCode
        );
      }
      log("Done.");
    }

    const result = analyzeVariantReports(layer, variant, { resolver, log });
    results.push({ variant, result });
  }

  const summaryBasePath = resolver.getSummaryBasePath(implListPath, layer.layerName);
  const files = generateLayerSummary(layer, summaryBasePath, results, { echo });

  return { ...files, results };
}

#!/usr/bin/env node

/**
 * Command-line entry point: explore the implementations of one layer
 *
 *   hls-explore <layer-spec.json> <impl-list.txt> [--skip-synthesis]
 */

import dotenv from "dotenv";
dotenv.config();

import { exploreLayerImplementations, loadLayerSpec } from "./tools/index.js";

async function main() {
  const args = process.argv.slice(2);
  const skipSynthesis = args.includes("--skip-synthesis");
  const [layerSpecPath, implListPath] = args.filter((arg) => !arg.startsWith("--"));

  if (!layerSpecPath || !implListPath) {
    console.error("Usage: hls-explore <layer-spec.json> <impl-list.txt> [--skip-synthesis]");
    process.exit(1);
  }

  const layer = loadLayerSpec(layerSpecPath);
  await exploreLayerImplementations(layer, implListPath, { skipSynthesis });
}

main().catch((error) => {
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exit(1);
});

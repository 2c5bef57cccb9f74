/**
 * Tools Index - Exports the layer exploration tools for MCP and the CLI
 */

// Synthesis tool
export {
  runHlsSynthesis,
  type SynthesisResult,
  type SynthesisRunner,
} from "./synthesis.js";

// Exploration pipeline
export {
  exploreLayerImplementations,
  analyzeVariantReports,
  parseLayerSpec,
  loadLayerSpec,
  variantSchema,
} from "../explorer/index.js";

export { calcTrueLatency } from "../reports/index.js";

// Re-export path resolver for convenience
export { pathResolver, PathResolver } from "../files/path-resolver.js";

/**
 * Explorer Module Index
 */

export {
  type ExploreOptions,
  type ExploreResult,
  exploreLayerImplementations,
} from "./explorer.js";

export {
  type AnalyzeOptions,
  analyzeVariantReports,
} from "./variant-analyzer.js";

export {
  type SummaryOptions,
  CSV_HEADER,
  formatCycles,
  formatPercent,
  formatCostValue,
  formatCsvRow,
  formatCsv,
  formatNarrativeHeader,
  formatNarrativeBlock,
  formatNarrative,
  generateLayerSummary,
} from "./summary.js";

export {
  variantSchema,
  layerSpecSchema,
  parseVariantList,
  loadVariantList,
  parseLayerSpec,
  loadLayerSpec,
} from "./variant-list.js";

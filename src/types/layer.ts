/**
 * Layer and Implementation Types for the HLS layer explorer
 */

/**
 * LayerSpec describes the computational layer under exploration
 */
export interface LayerSpec {
  readonly layerName: string;
  readonly outputHeight: number;
  readonly outputWidth: number;
  readonly outputChans: number;
  readonly filterSize: number;
  readonly inputChans: number;
}

/**
 * ImplementationVariant identifies one candidate implementation of a layer
 */
export interface ImplementationVariant {
  readonly name: string;
  readonly dir: string;
  readonly ochanScaleFactor: number;  // Output channels processed per top-loop iteration
  readonly readScaleFactor?: number;  // Input words read per cycle
}

/**
 * Fractional resource utilization by category, plus the aggregate cost
 */
export interface CostBreakdown {
  readonly categories: Readonly<Record<string, number>>;
  readonly total: number;
}

/**
 * One pipeline stage inside the top-level dataflow region
 */
export interface StageLatency {
  readonly name: string;
  readonly latency: number;
}

/**
 * Analysis of one synthesized implementation variant
 */
export interface AnalysisResult {
  readonly latency: number;      // Cycles, as measured at reduced scale
  readonly trueLatency: number;  // Cycles, extrapolated to the full layer
  readonly cost: CostBreakdown;
  readonly stages: readonly StageLatency[];
}

/**
 * A variant paired with its analysis, in exploration order
 */
export interface VariantResult {
  readonly variant: ImplementationVariant;
  readonly result: AnalysisResult;
}

/**
 * Files written by the batch summarizer
 */
export interface SummaryFiles {
  csvPath: string;
  textPath: string;
  narrative: string;
}

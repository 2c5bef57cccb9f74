/**
 * True latency extrapolation
 *
 * To keep synthesis times tractable, the top loop of every implementation
 * is synthesized with a small fixed number of iterations per output
 * channel group. Since the top loop is a dataflow pipeline, the latency of
 * the full layer follows from the skipped iterations and the pipeline's
 * initiation interval.
 */

import type { ImplementationVariant, LayerSpec } from "../types/layer.js";

/**
 * Top-loop iterations per output channel group used during synthesis
 */
export const SYNTH_TOP_LOOP_ITERATIONS = 50;

/**
 * Top-loop iterations needed for the full layer
 */
export function trueIterations(layer: LayerSpec, ochanScaleFactor: number): number {
  return (layer.outputHeight * layer.outputWidth * layer.outputChans) / ochanScaleFactor;
}

/**
 * Top-loop iterations the synthesized design actually runs
 */
export function synthIterations(layer: LayerSpec, ochanScaleFactor: number): number {
  return (SYNTH_TOP_LOOP_ITERATIONS * layer.outputChans) / ochanScaleFactor;
}

/**
 * Extrapolate a synthesis-time latency to the full layer, truncated to
 * whole cycles. The correction is negative when the variant was
 * synthesized with more iterations than the layer needs.
 */
export function calcTrueLatency(
  layer: LayerSpec,
  variant: Pick<ImplementationVariant, "ochanScaleFactor">,
  reportLatency: number,
  dataflowII: number
): number {
  const skipped =
    trueIterations(layer, variant.ochanScaleFactor) - synthIterations(layer, variant.ochanScaleFactor);
  return Math.trunc(reportLatency + skipped * dataflowII);
}

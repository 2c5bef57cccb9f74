/**
 * Reports Module Index
 *
 * Reading of Vitis HLS synthesis reports and latency extrapolation
 */

export {
  type TopLevelReport,
  type DataflowReport,
  parseTopLevelReport,
  parseDataflowReport,
  readTopLevelReport,
  readDataflowReport,
} from "./report-reader.js";

export {
  SYNTH_TOP_LOOP_ITERATIONS,
  trueIterations,
  synthIterations,
  calcTrueLatency,
} from "./latency.js";

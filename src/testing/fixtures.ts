/**
 * Synthetic Vitis HLS reports and implementation directories for tests
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { LayerSpec } from "../types/layer.js";

export interface TopReportFixture {
  worstCaseLatency: number | string;
  resources: Record<string, number>;
  available: Record<string, number>;
}

export interface StageFixture {
  instance: string;
  module: string;
  latency: number | string;
}

export const testLayer: LayerSpec = {
  layerName: "tdf3",
  outputHeight: 8,
  outputWidth: 8,
  outputChans: 4,
  filterSize: 3,
  inputChans: 16,
};

function tags(values: Record<string, number>): string {
  return Object.entries(values)
    .map(([key, value]) => `      <${key}>${value}</${key}>`)
    .join("\n");
}

export function topReportXml(fixture: TopReportFixture): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<profile>
  <ReportVersion>
    <Version>2020.2</Version>
  </ReportVersion>
  <UserAssignments>
    <unit>ns</unit>
    <TopModelName>tdf3_top</TopModelName>
    <TargetClockPeriod>3.33</TargetClockPeriod>
  </UserAssignments>
  <PerformanceEstimates>
    <SummaryOfOverallLatency>
      <Best-caseLatency>${fixture.worstCaseLatency}</Best-caseLatency>
      <Average-caseLatency>${fixture.worstCaseLatency}</Average-caseLatency>
      <Worst-caseLatency>${fixture.worstCaseLatency}</Worst-caseLatency>
      <Interval-min>1001</Interval-min>
      <Interval-max>1001</Interval-max>
    </SummaryOfOverallLatency>
  </PerformanceEstimates>
  <AreaEstimates>
    <Resources>
${tags(fixture.resources)}
    </Resources>
    <AvailableResources>
${tags(fixture.available)}
    </AvailableResources>
  </AreaEstimates>
</profile>
`;
}

function pad(cell: string | number, width: number, alignLeft = false): string {
  const text = String(cell);
  return alignLeft ? text.padEnd(width) : text.padStart(width);
}

export function dataflowReportRpt(ii: number | string, stages: StageFixture[]): string {
  const instanceRows = stages
    .map(
      (s) =>
        `        |${pad(s.instance, 27, true)}|${pad(s.module, 24, true)}|${pad(s.latency, 9)}|${pad(s.latency, 9)}|  0.100 us |  0.100 us |${pad(s.latency, 5)}|${pad(s.latency, 5)}|     none|`
    )
    .join("\n");
  const separator =
    "        +---------------------------+------------------------+---------+---------+-----------+-----------+-----+-----+---------+";

  const instanceTable =
    stages.length === 0
      ? "        N/A"
      : [
          separator,
          "        |                           |                        |  Latency (cycles) |   Latency (absolute)  |  Interval | Pipeline|",
          "        |          Instance         |         Module         |   min   |   max   |    min    |    max    | min | max |   Type  |",
          separator,
          instanceRows,
          separator,
        ].join("\n");

  return `================================================================
== Vitis HLS Report for 'dataflow_in_loop_TOP_LOOP'
================================================================
* Version:        2020.2
* Project:        tdf3_prj
* Solution:       solution1 (Vivado IP Flow Target)

================================================================
== Performance Estimates
================================================================
+ Timing:
    * Summary:
    +--------+---------+----------+------------+
    |  Clock |  Target | Estimated| Uncertainty|
    +--------+---------+----------+------------+
    |ap_clk  |  3.33 ns|  2.433 ns|     0.90 ns|
    +--------+---------+----------+------------+

+ Latency:
    * Summary:
    +---------+---------+-----------+-----------+-----+-----+----------+
    |  Latency (cycles) |   Latency (absolute)  |  Interval | Pipeline |
    |   min   |   max   |    min    |    max    | min | max |   Type   |
    +---------+---------+-----------+-----------+-----+-----+----------+
    |       57|       57|   0.190 us|   0.190 us|${pad(ii, 5)}|${pad(ii, 5)}|  dataflow|
    +---------+---------+-----------+-----------+-----+-----+----------+

    + Detail:
        * Instance:
${instanceTable}

        * Loop:
        N/A
`;
}

export const defaultStages: StageFixture[] = [
  { instance: "tdf3_readInputs_U0", module: "tdf3_readInputs", latency: 9 },
  { instance: "tdf3_dot_product_U0", module: "tdf3_dot_product", latency: 10 },
  { instance: "tdf3_writeOutputs_U0", module: "tdf3_writeOutputs_aligned", latency: 4 },
];

export const defaultTopReport: TopReportFixture = {
  worstCaseLatency: 1000,
  resources: { BRAM_18K: 16, DSP: 40, URAM: 8 },
  available: { BRAM_18K: 160, DSP: 400, URAM: 16 },
};

const tempDirs: string[] = [];

export function makeTempDir(prefix = "hls-explorer-"): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/**
 * Delete every directory handed out by makeTempDir; call from afterEach
 */
export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Lay out an implementation directory the way the HLS tool leaves it,
 * with the reports still inside <layer>_prj/solution1/syn/report
 */
export function writeSynthesizedImpl(
  implDir: string,
  layerName: string,
  options: { top?: TopReportFixture; ii?: number; stages?: StageFixture[]; omit?: "top" | "dataflow" } = {}
): void {
  const { top = defaultTopReport, ii = 10, stages = defaultStages, omit } = options;
  const reportDir = join(implDir, `${layerName}_prj`, "solution1", "syn", "report");
  mkdirSync(reportDir, { recursive: true });
  writeFileSync(join(implDir, `${layerName}_prj`, "vitis_hls.log"), "x".repeat(2048));

  if (omit !== "top") {
    writeFileSync(join(reportDir, `${layerName}_top_csynth.xml`), topReportXml(top));
  }
  if (omit !== "dataflow") {
    writeFileSync(join(reportDir, "dataflow_in_loop_TOP_LOOP_csynth.rpt"), dataflowReportRpt(ii, stages));
  }
}

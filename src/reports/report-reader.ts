/**
 * HLS Report Reader
 *
 * Extracts latency, resource cost and dataflow stage information from the
 * reports Vitis HLS writes after C synthesis:
 *
 *  - <layer>_top_csynth.xml: overall latency and resource estimates
 *  - <region>_csynth.rpt: the dataflow region's stage table and interval
 */

import { existsSync, readFileSync } from "fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { CostBreakdown, StageLatency } from "../types/layer.js";
import { MissingArtifactError, ParseError } from "../errors.js";

/**
 * Contents of the top-level synthesis report
 */
export interface TopLevelReport {
  worstCaseLatency: number;
  cost: CostBreakdown;
}

/**
 * Contents of the dataflow region report
 */
export interface DataflowReport {
  stages: StageLatency[];
  initiationInterval: number;
}

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a report file, failing if the synthesis run did not produce it
 */
function readReport(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new MissingArtifactError(`Synthesis report not found at ${filePath}`, filePath);
  }
  return readFileSync(filePath, "utf-8");
}

/**
 * Walk a path of element names, failing on the first one that is absent
 */
function child(node: XmlNode, path: string[], source: string): XmlNode {
  let current: XmlNode = node;
  for (const key of path) {
    const next = current[key];
    if (!isNode(next)) {
      throw new ParseError(`Missing <${key}> element in ${source}`, source);
    }
    current = next;
  }
  return current;
}

function integerField(node: XmlNode, key: string, source: string): number {
  const value = node[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ParseError(
      `Expected an integer in <${key}> of ${source}, found ${value === undefined ? "nothing" : String(value)}`,
      source
    );
  }
  return value;
}

/**
 * Parse the top-level csynth.xml report
 */
export function parseTopLevelReport(xml: string, source: string): TopLevelReport {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseError(`Malformed XML in ${source} (line ${line}): ${msg}`, source);
  }

  const parser = new XMLParser({ ignoreAttributes: true });
  const doc: unknown = parser.parse(xml);
  if (!isNode(doc)) {
    throw new ParseError(`Empty report ${source}`, source);
  }

  const profile = child(doc, ["profile"], source);
  const overall = child(profile, ["PerformanceEstimates", "SummaryOfOverallLatency"], source);
  const worstCaseLatency = integerField(overall, "Worst-caseLatency", source);

  const used = child(profile, ["AreaEstimates", "Resources"], source);
  const available = child(profile, ["AreaEstimates", "AvailableResources"], source);

  const categories: Record<string, number> = {};
  for (const category of Object.keys(used)) {
    if (!(category in available)) continue;
    const capacity = integerField(available, category, source);
    if (capacity <= 0) continue;
    categories[category] = integerField(used, category, source) / capacity;
  }

  const utilizations = Object.values(categories);
  if (utilizations.length === 0) {
    throw new ParseError(`No resource categories with available capacity in ${source}`, source);
  }

  return {
    worstCaseLatency,
    cost: { categories, total: Math.max(...utilizations) },
  };
}

/**
 * Split the rows of the ASCII table that follows a section heading.
 * Separator lines (+----+) are skipped; the table ends at the first line
 * that is neither a separator nor a row. A heading followed by "N/A"
 * yields no rows.
 */
function readTable(lines: string[], heading: number): string[][] {
  const rows: string[][] = [];
  let i = heading + 1;

  while (i < lines.length && lines[i].trim() === "") i++;

  for (; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.startsWith("+-")) continue;
    if (!line.startsWith("|")) break;
    rows.push(line.split("|").slice(1, -1).map((cell) => cell.trim()));
  }

  return rows;
}

function findLine(lines: string[], pattern: RegExp, from: number, source: string): number {
  for (let i = from; i < lines.length; i++) {
    if (pattern.test(lines[i])) return i;
  }
  throw new ParseError(`Missing section ${pattern.source} in ${source}`, source);
}

function cycles(cell: string | undefined, what: string, source: string): number {
  if (cell === undefined || !/^\d+$/.test(cell)) {
    throw new ParseError(`Expected a cycle count for ${what} in ${source}, found "${cell ?? ""}"`, source);
  }
  return parseInt(cell, 10);
}

/**
 * Parse the dataflow region's csynth.rpt report
 */
export function parseDataflowReport(content: string, source: string): DataflowReport {
  const lines = content.split(/\r?\n/);

  // Latency summary: | min | max | abs min | abs max | II min | II max | type |
  const latencyAt = findLine(lines, /^\+ Latency:/, 0, source);
  const summaryAt = findLine(lines, /\* Summary:/, latencyAt, source);
  const summaryRow = readTable(lines, summaryAt).find((row) => /^\d+$/.test(row[0] ?? ""));
  if (!summaryRow) {
    throw new ParseError(`Missing latency summary row in ${source}`, source);
  }
  const initiationInterval = cycles(summaryRow[5], "the dataflow interval", source);

  // Instances: | instance | module | min | max | abs min | abs max | II min | II max | type |
  const instanceAt = findLine(lines, /\* Instance:/, summaryAt, source);
  const stages: StageLatency[] = [];
  for (const row of readTable(lines, instanceAt)) {
    if (row.length < 4 || row[0] === "" || row[0] === "Instance") continue;
    stages.push({ name: row[1], latency: cycles(row[3], row[1], source) });
  }

  if (stages.length === 0) {
    throw new ParseError(`No dataflow stages listed in ${source}`, source);
  }

  return { stages, initiationInterval };
}

/**
 * Read the worst-case latency and cost breakdown of a synthesized layer
 */
export function readTopLevelReport(filePath: string): TopLevelReport {
  return parseTopLevelReport(readReport(filePath), filePath);
}

/**
 * Read the stage latencies and interval of a dataflow region
 */
export function readDataflowReport(filePath: string): DataflowReport {
  return parseDataflowReport(readReport(filePath), filePath);
}

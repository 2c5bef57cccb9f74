#!/usr/bin/env node

/**
 * HLS Layer Explorer - Model Context Protocol server
 *
 * Exposes the layer exploration pipeline (Vitis HLS synthesis, report
 * analysis, summary generation) as MCP tools over stdio.
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";

import {
  exploreLayerImplementations,
  analyzeVariantReports,
  parseLayerSpec,
  variantSchema,
  calcTrueLatency,
} from "./tools/index.js";
import { ConfigurationError, ExplorerError, ParseError } from "./errors.js";

// Helper functions for parameter extraction
function isRecord(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === "object" && obj !== null && !Array.isArray(obj);
}

function getProperty(obj: unknown, key: string): unknown {
  return isRecord(obj) ? obj[key] : undefined;
}

function getBooleanProperty(obj: unknown, key: string, defaultValue = false): boolean {
  const value = getProperty(obj, key);
  return typeof value === "boolean" ? value : defaultValue;
}

function validateRequiredString(obj: unknown, key: string, toolName: string): string {
  const value = getProperty(obj, key);
  if (typeof value !== "string" || !value) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `Missing required parameter '${key}' for tool '${toolName}'`
    );
  }
  return value;
}

function validateRequiredNumber(obj: unknown, key: string, toolName: string): number {
  const value = getProperty(obj, key);
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `Missing required numeric parameter '${key}' for tool '${toolName}'`
    );
  }
  return value;
}

function toolResult(result: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

// stdout carries the protocol, so progress and the narrative go to stderr
const log = (message: string) => console.error(message);
const echo = (text: string) => {
  process.stderr.write(text);
};

// Initialize the MCP server
const server = new Server(
  { name: "hls-layer-explorer", version: "1.0.0" },
  { capabilities: { tools: {} } }
);

const layerSpecProperty = {
  type: "object",
  description: "Layer being explored",
  properties: {
    layer_name: { type: "string", description: "Layer name, used for report and summary file names" },
    output_height: { type: "number" },
    output_width: { type: "number" },
    output_chans: { type: "number" },
    filter_size: { type: "number" },
    input_chans: { type: "number" },
  },
  required: ["layer_name", "output_height", "output_width", "output_chans", "filter_size", "input_chans"],
};

// Tool definitions
const tools = [
  {
    name: "explore_layer_implementations",
    description:
      "Synthesize every implementation listed in a variant list file with Vitis HLS, analyze the reports and write <layer>_implementations_summary.csv/.txt next to the list. Any failure aborts the batch without writing a summary.",
    inputSchema: {
      type: "object" as const,
      properties: {
        layer_spec: layerSpecProperty,
        impl_list_path: {
          type: "string",
          description: "Path to the variant list (one JSON object per line: name, dir, ochan_scale_factor)",
        },
        skip_synthesis: {
          type: "boolean",
          description: "Only re-analyze reports already on disk (default: false)",
        },
      },
      required: ["layer_spec", "impl_list_path"],
    },
  },
  {
    name: "analyze_implementation",
    description:
      "Analyze the synthesis reports of one already-synthesized implementation: raw and true latency, resource cost and dataflow stage latencies.",
    inputSchema: {
      type: "object" as const,
      properties: {
        layer_spec: layerSpecProperty,
        implementation: {
          type: "object",
          description: "Implementation variant",
          properties: {
            name: { type: "string" },
            dir: { type: "string" },
            ochan_scale_factor: { type: "number" },
            read_scale_factor: { type: "number" },
          },
          required: ["name", "dir", "ochan_scale_factor"],
        },
      },
      required: ["layer_spec", "implementation"],
    },
  },
  {
    name: "calculate_true_latency",
    description:
      "Extrapolate a reduced-iteration synthesis latency to the full layer using the dataflow initiation interval.",
    inputSchema: {
      type: "object" as const,
      properties: {
        layer_spec: layerSpecProperty,
        ochan_scale_factor: { type: "number" },
        report_latency: { type: "number", description: "Worst-case latency from the report, in cycles" },
        dataflow_ii: { type: "number", description: "Initiation interval of the dataflow region, in cycles" },
      },
      required: ["layer_spec", "ochan_scale_factor", "report_latency", "dataflow_ii"],
    },
  },
];

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case "explore_layer_implementations": {
        const layer = parseLayerSpec(getProperty(args, "layer_spec"), "layer_spec");
        const implListPath = validateRequiredString(args, "impl_list_path", name);

        const result = await exploreLayerImplementations(layer, implListPath, {
          skipSynthesis: getBooleanProperty(args, "skip_synthesis"),
          log,
          echo,
        });

        return toolResult({
          success: true,
          csv_path: result.csvPath,
          text_path: result.textPath,
          implementations: result.results.length,
          summary: result.narrative,
        });
      }

      case "analyze_implementation": {
        const layer = parseLayerSpec(getProperty(args, "layer_spec"), "layer_spec");
        const parsed = variantSchema.safeParse(getProperty(args, "implementation"));
        if (!parsed.success) {
          throw new McpError(
            ErrorCode.InvalidParams,
            `Invalid 'implementation' for tool '${name}': ${parsed.error.issues.map((i) => i.message).join("; ")}`
          );
        }

        const result = analyzeVariantReports(layer, parsed.data, { log });
        return toolResult({ success: true, implementation: parsed.data, ...result });
      }

      case "calculate_true_latency": {
        const layer = parseLayerSpec(getProperty(args, "layer_spec"), "layer_spec");
        const ochanScaleFactor = validateRequiredNumber(args, "ochan_scale_factor", name);
        if (ochanScaleFactor <= 0) {
          throw new McpError(ErrorCode.InvalidParams, "'ochan_scale_factor' must be positive");
        }
        const reportLatency = validateRequiredNumber(args, "report_latency", name);
        const dataflowII = validateRequiredNumber(args, "dataflow_ii", name);

        return toolResult({
          success: true,
          report_latency: reportLatency,
          true_latency: calcTrueLatency(layer, { ochanScaleFactor }, reportLatency, dataflowII),
        });
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }
  } catch (error) {
    if (error instanceof McpError) throw error;
    if (error instanceof ParseError || error instanceof ConfigurationError) {
      throw new McpError(ErrorCode.InvalidParams, `${error.name}: ${error.message}`);
    }
    const errorMessage =
      error instanceof ExplorerError
        ? `${error.name}: ${error.message}`
        : error instanceof Error
          ? error.message
          : String(error);
    throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
  }
});

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log startup info to stderr (stdout is the MCP transport)
  console.error("=== HLS Layer Explorer v1.0.0 ===");
  console.error(`HLS tool: ${process.env.HLS_TOOL_COMMAND || "vitis_hls"}`);
  console.error("================================");
}

main().catch((error) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});

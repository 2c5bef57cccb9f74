/**
 * Loading of layer specifications and implementation variant lists
 *
 * A variant list holds one JSON object per line:
 *
 *   {"name": "r2_o8", "dir": "layers/tdf3/r2_o8", "ochan_scale_factor": 8, "read_scale_factor": 2}
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { ImplementationVariant, LayerSpec } from "../types/layer.js";
import { ParseError } from "../errors.js";

const positiveInt = z.number().int().positive();

export const variantSchema = z
  .object({
    name: z.string().min(1),
    dir: z.string().min(1),
    ochan_scale_factor: positiveInt,
    read_scale_factor: positiveInt.optional(),
  })
  .transform(
    (v): ImplementationVariant => ({
      name: v.name,
      dir: v.dir,
      ochanScaleFactor: v.ochan_scale_factor,
      readScaleFactor: v.read_scale_factor,
    })
  );

export const layerSpecSchema = z
  .object({
    layer_name: z.string().min(1),
    output_height: positiveInt,
    output_width: positiveInt,
    output_chans: positiveInt,
    filter_size: positiveInt,
    input_chans: positiveInt,
  })
  .transform(
    (l): LayerSpec => ({
      layerName: l.layer_name,
      outputHeight: l.output_height,
      outputWidth: l.output_width,
      outputChans: l.output_chans,
      filterSize: l.filter_size,
      inputChans: l.input_chans,
    })
  );

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function parseJson(text: string, where: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON at ${where}: ${reason}`, source);
  }
}

/**
 * Parse a variant list. Blank lines are ignored; any malformed line fails
 * the whole list.
 */
export function parseVariantList(text: string, source: string): ImplementationVariant[] {
  const variants: ImplementationVariant[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const where = `${source}:${i + 1}`;
    const parsed = variantSchema.safeParse(parseJson(line, where, source));
    if (!parsed.success) {
      throw new ParseError(`Invalid implementation at ${where}: ${describeIssues(parsed.error)}`, source);
    }
    variants.push(parsed.data);
  }

  return variants;
}

/**
 * Read the variant list file
 */
export function loadVariantList(filePath: string): ImplementationVariant[] {
  return parseVariantList(readFileSync(filePath, "utf-8"), filePath);
}

/**
 * Validate a layer specification given as a plain object
 */
export function parseLayerSpec(value: unknown, source: string): LayerSpec {
  const parsed = layerSpecSchema.safeParse(value);
  if (!parsed.success) {
    throw new ParseError(`Invalid layer specification in ${source}: ${describeIssues(parsed.error)}`, source);
  }
  return parsed.data;
}

/**
 * Read a layer specification from a JSON file
 */
export function loadLayerSpec(filePath: string): LayerSpec {
  return parseLayerSpec(parseJson(readFileSync(filePath, "utf-8"), filePath, filePath), filePath);
}

/**
 * Zod schemas for comparison options
 * Defaults are applied here so the engine only ever sees complete options
 */

import { z } from "zod";
import type { ExtractionResult } from "../../types/engine.types";

const LOCATION_PATTERN = /^\s*[A-Za-z0-9 ]{1,4}\s*=\s*-?\d+(\.\d+)?\s*(,\s*[A-Za-z0-9 ]{1,4}\s*=\s*-?\d+(\.\d+)?\s*)*$/;

export const comparisonOptionsSchema = z
  .object({
    tables: z.boolean().default(true),
    glyphs: z.boolean().default(true),
    words: z.boolean().default(true),
    pointSize: z.number().positive().max(1000).default(40),
    location: z
      .string()
      .regex(LOCATION_PATTERN, "expected tag=value pairs, e.g. wght=400,wdth=100")
      .optional(),
    instance: z.string().min(1).optional(),
    wordlistDir: z.string().min(1).optional(),
    scripts: z.array(z.string().min(1)).optional(),
    maxWordsPerScript: z.number().int().positive().optional(),
    minPercent: z.number().min(0).max(100).default(0),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  })
  .strict()
  .refine((options) => options.location === undefined || options.instance === undefined, {
    message: "location and instance are mutually exclusive",
    path: ["instance"],
  });

/** Options as accepted from callers */
export type ComparisonOptionsInput = z.input<typeof comparisonOptionsSchema>;

/** Options with defaults applied */
export type ComparisonOptions = z.output<typeof comparisonOptionsSchema>;

/**
 * Validate caller options. Failures list every issue as `path: message`.
 */
export function parseComparisonOptions(input: unknown = {}): ExtractionResult<ComparisonOptions> {
  const result = comparisonOptionsSchema.safeParse(input ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return { success: false, error: `Invalid options: ${errors.join("; ")}`, warnings: errors };
}

/**
 * Style Request Schemas
 *
 * Zod validation for style requests loaded from JSON (theme files,
 * remote component configuration).
 */

import { z } from "zod";

import { parseColor } from "./colors";
import type { StyleRequest } from "./resolver";
import { COMPONENT_SIZES } from "./spacing";
import { FONT_TOKENS } from "./typography";

const colorSchema = z.string().refine((value) => parseColor(value) !== null, {
  message: "Please enter a valid color (hex, rgb(), rgba() or transparent)",
});

const dimensionSchema = z.number().finite().nonnegative();

export const edgeInsetsSchema = z.object({
  top: dimensionSchema,
  right: dimensionSchema,
  bottom: dimensionSchema,
  left: dimensionSchema,
});

export const styleOverridesSchema = z
  .object({
    backgroundColor: colorSchema,
    foregroundColor: colorSchema,
    borderColor: colorSchema,
    borderWidth: dimensionSchema,
    cornerRadius: dimensionSchema,
    padding: edgeInsetsSchema,
    font: z.enum(FONT_TOKENS),
    shadowRadius: dimensionSchema,
    shadowColor: colorSchema,
  })
  .partial()
  .strict();

// Unknown preset tags are valid here; they degrade to the default preset
// when resolved.
export const styleRequestSchema = z.object({
  presetId: z.string().min(1),
  size: z.enum(COMPONENT_SIZES).optional(),
  overrides: styleOverridesSchema.optional(),
});

export type StyleRequestInput = z.input<typeof styleRequestSchema>;

/**
 * Validate untrusted input as a StyleRequest. Throws a ZodError on
 * malformed input.
 */
export function parseStyleRequest(input: unknown): StyleRequest {
  return styleRequestSchema.parse(input);
}

export function safeParseStyleRequest(input: unknown) {
  return styleRequestSchema.safeParse(input);
}

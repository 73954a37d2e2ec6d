/**
 * @swatchkit/design-tokens - Style Presets
 *
 * One row per preset tag. Each row carries a light and a dark color set
 * plus the scheme-independent layout values.
 */

import { colors, parseColor, type ColorScheme } from "./colors";
import { shadows } from "./shadows";
import { borderRadius, insets, type EdgeInsets } from "./spacing";
import { isFontToken, type FontToken } from "./typography";

// ============================================================================
// Preset Types
// ============================================================================

export const STYLE_PRESET_IDS = ["default", "outline", "subtle", "ghost", "tinted", "filled"] as const;

export type StylePresetId = (typeof STYLE_PRESET_IDS)[number];

/** Unknown tags are accepted and resolve to the default preset. */
export type PresetTag = StylePresetId | (string & {});

export const DEFAULT_PRESET_ID: StylePresetId = "default";

export interface PresetColors {
  background: string;
  foreground: string;
  border: string;
  shadow: string;
}

export interface PresetDefinition {
  colors: Record<ColorScheme, PresetColors>;
  borderWidth: number;
  cornerRadius: number;
  padding: EdgeInsets;
  font: FontToken;
  shadowRadius: number;
}

// ============================================================================
// Preset Table
// ============================================================================

export const stylePresets: Record<StylePresetId, PresetDefinition> = {
  default: {
    colors: {
      light: {
        background: colors.neutral[100],
        foreground: colors.neutral[900],
        border: colors.transparent,
        shadow: shadows.sm.light.color,
      },
      dark: {
        background: colors.neutral[800],
        foreground: colors.neutral[50],
        border: colors.transparent,
        shadow: shadows.sm.dark.color,
      },
    },
    borderWidth: 0,
    cornerRadius: borderRadius.DEFAULT,
    padding: insets(12, 20),
    font: "body",
    shadowRadius: shadows.sm.light.radius,
  },
  outline: {
    colors: {
      light: {
        background: colors.transparent,
        foreground: colors.primary[600],
        border: colors.primary[600],
        shadow: colors.transparent,
      },
      dark: {
        background: colors.transparent,
        foreground: colors.primary[400],
        border: colors.primary[400],
        shadow: colors.transparent,
      },
    },
    borderWidth: 2,
    cornerRadius: borderRadius.DEFAULT,
    padding: insets(12, 24),
    font: "headline",
    shadowRadius: 0,
  },
  subtle: {
    colors: {
      light: {
        background: "rgba(59, 130, 246, 0.1)",
        foreground: colors.primary[700],
        border: colors.transparent,
        shadow: colors.transparent,
      },
      dark: {
        background: "rgba(96, 165, 250, 0.16)",
        foreground: colors.primary[300],
        border: colors.transparent,
        shadow: colors.transparent,
      },
    },
    borderWidth: 0,
    cornerRadius: borderRadius.md,
    padding: insets(8, 16),
    font: "subheadline",
    shadowRadius: 0,
  },
  ghost: {
    colors: {
      light: {
        background: colors.transparent,
        foreground: colors.primary[600],
        border: colors.transparent,
        shadow: colors.transparent,
      },
      dark: {
        background: colors.transparent,
        foreground: colors.primary[400],
        border: colors.transparent,
        shadow: colors.transparent,
      },
    },
    borderWidth: 0,
    cornerRadius: borderRadius.md,
    padding: insets(8, 12),
    font: "body",
    shadowRadius: 0,
  },
  tinted: {
    colors: {
      light: {
        background: "rgba(59, 130, 246, 0.2)",
        foreground: colors.primary[800],
        border: "rgba(59, 130, 246, 0.3)",
        shadow: colors.transparent,
      },
      dark: {
        background: "rgba(96, 165, 250, 0.24)",
        foreground: colors.primary[200],
        border: "rgba(96, 165, 250, 0.4)",
        shadow: colors.transparent,
      },
    },
    borderWidth: 1,
    cornerRadius: borderRadius.lg,
    padding: insets(10, 20),
    font: "callout",
    shadowRadius: 0,
  },
  filled: {
    colors: {
      light: {
        background: colors.primary[600],
        foreground: colors.white,
        border: colors.transparent,
        shadow: shadows.md.light.color,
      },
      dark: {
        background: colors.primary[500],
        foreground: colors.white,
        border: colors.transparent,
        shadow: shadows.md.dark.color,
      },
    },
    borderWidth: 0,
    cornerRadius: borderRadius.lg,
    padding: insets(14, 24),
    font: "headline",
    shadowRadius: shadows.md.light.radius,
  },
};

// ============================================================================
// Table Validation
// ============================================================================

export class PresetTableError extends Error {
  problems: string[];

  constructor(problems: string[]) {
    super(`Invalid style preset table: ${problems.join("; ")}`);
    this.name = "PresetTableError";
    this.problems = problems;
  }
}

const PRESET_COLOR_FIELDS = ["background", "foreground", "border", "shadow"] as const;

function colorProblems(tag: string, scheme: ColorScheme, set: PresetColors | undefined): string[] {
  if (!set) return [`"${tag}" has no ${scheme} colors`];
  return PRESET_COLOR_FIELDS
    .filter((field) => parseColor(set[field]) === null)
    .map((field) => `"${tag}" ${scheme}.${field} is not a color: ${set[field]}`);
}

/**
 * Check that every tag in `ids` has a well-formed row. Throws a
 * PresetTableError listing every problem found.
 */
export function validatePresetTable(
  table: Partial<Record<string, PresetDefinition>>,
  ids: readonly string[] = STYLE_PRESET_IDS
): void {
  const problems: string[] = [];

  for (const tag of ids) {
    const row = table[tag];
    if (!row) {
      problems.push(`"${tag}" has no entry`);
      continue;
    }
    problems.push(...colorProblems(tag, "light", row.colors.light));
    problems.push(...colorProblems(tag, "dark", row.colors.dark));
    if (!isFontToken(row.font)) {
      problems.push(`"${tag}" font is not a font token: ${row.font}`);
    }
    const { top, right, bottom, left } = row.padding;
    if ([top, right, bottom, left, row.cornerRadius, row.borderWidth, row.shadowRadius].some((n) => n < 0)) {
      problems.push(`"${tag}" has a negative dimension`);
    }
  }

  if (problems.length > 0) {
    throw new PresetTableError(problems);
  }
}

validatePresetTable(stylePresets);

// ============================================================================
// Lookup
// ============================================================================

export function isStylePresetId(tag: string): tag is StylePresetId {
  return Object.prototype.hasOwnProperty.call(stylePresets, tag);
}

/**
 * Row for `tag`, or the default row when the tag is unknown.
 */
export function getPresetDefinition(tag: PresetTag): PresetDefinition {
  return isStylePresetId(tag) ? stylePresets[tag] : stylePresets[DEFAULT_PRESET_ID];
}

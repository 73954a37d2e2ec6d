/**
 * @swatchkit/design-tokens - Typography System
 *
 * Semantic font tokens and the dynamic type size categories that scale them
 */

// ============================================================================
// Font Tokens
// ============================================================================

/** Ordered smallest to largest. */
export const FONT_TOKENS = [
  "caption2",
  "caption",
  "footnote",
  "subheadline",
  "callout",
  "body",
  "headline",
  "title3",
  "title2",
  "title",
  "largeTitle",
] as const;

export type FontToken = (typeof FONT_TOKENS)[number];

export interface FontSizeConfig {
  size: number;
  lineHeight: number;
  weight: "regular" | "medium" | "semibold" | "bold";
}

export const fontScale: Record<FontToken, FontSizeConfig> = {
  caption2: { size: 11, lineHeight: 13, weight: "regular" },
  caption: { size: 12, lineHeight: 16, weight: "regular" },
  footnote: { size: 13, lineHeight: 18, weight: "regular" },
  subheadline: { size: 15, lineHeight: 20, weight: "regular" },
  callout: { size: 16, lineHeight: 21, weight: "regular" },
  body: { size: 17, lineHeight: 22, weight: "regular" },
  headline: { size: 17, lineHeight: 22, weight: "semibold" },
  title3: { size: 20, lineHeight: 25, weight: "regular" },
  title2: { size: 22, lineHeight: 28, weight: "bold" },
  title: { size: 28, lineHeight: 34, weight: "bold" },
  largeTitle: { size: 34, lineHeight: 41, weight: "bold" },
};

export function isFontToken(value: string): value is FontToken {
  return (FONT_TOKENS as readonly string[]).includes(value);
}

/**
 * Move a token along the scale, clamped at both ends.
 */
export function stepFontToken(token: FontToken, steps: number): FontToken {
  if (steps === 0) return token;
  const index = FONT_TOKENS.indexOf(token) + steps;
  return FONT_TOKENS[Math.max(0, Math.min(FONT_TOKENS.length - 1, index))];
}

// ============================================================================
// Size Categories (Dynamic Type)
// ============================================================================

export const SIZE_CATEGORIES = [
  "xSmall",
  "small",
  "medium",
  "large",
  "xLarge",
  "xxLarge",
  "xxxLarge",
  "accessibilityMedium",
  "accessibilityLarge",
  "accessibilityExtraLarge",
  "accessibilityExtraExtraLarge",
  "accessibilityExtraExtraExtraLarge",
] as const;

export type SizeCategory = (typeof SIZE_CATEGORIES)[number];

export const DEFAULT_SIZE_CATEGORY: SizeCategory = "large";

export function sizeCategoryRank(category: SizeCategory): number {
  return SIZE_CATEGORIES.indexOf(category);
}

export interface SizeCategoryAdjustment {
  paddingScale: number;
  fontStep: number;
}

const NO_ADJUSTMENT: SizeCategoryAdjustment = { paddingScale: 1, fontStep: 0 };

/**
 * Step table for categories above the default. Both columns are
 * non-decreasing down the table.
 */
const sizeCategoryAdjustments: Partial<Record<SizeCategory, SizeCategoryAdjustment>> = {
  xLarge: { paddingScale: 1.1, fontStep: 1 },
  xxLarge: { paddingScale: 1.2, fontStep: 1 },
  xxxLarge: { paddingScale: 1.3, fontStep: 2 },
  accessibilityMedium: { paddingScale: 1.4, fontStep: 2 },
  accessibilityLarge: { paddingScale: 1.5, fontStep: 3 },
  accessibilityExtraLarge: { paddingScale: 1.6, fontStep: 3 },
  accessibilityExtraExtraLarge: { paddingScale: 1.7, fontStep: 4 },
  accessibilityExtraExtraExtraLarge: { paddingScale: 1.8, fontStep: 4 },
};

/**
 * Padding and font adjustment for a size category. Categories at or
 * below the default never shrink anything.
 */
export function getSizeCategoryAdjustment(category: SizeCategory): SizeCategoryAdjustment {
  if (sizeCategoryRank(category) <= sizeCategoryRank(DEFAULT_SIZE_CATEGORY)) {
    return NO_ADJUSTMENT;
  }
  return sizeCategoryAdjustments[category] ?? NO_ADJUSTMENT;
}

/**
 * @swatchkit/design-tokens - Spacing System
 *
 * Spacing, radius and inset tokens, in points
 */

// ============================================================================
// Base Spacing Scale
// ============================================================================

export const spacing = {
  0: 0,
  0.5: 2,
  1: 4,
  1.5: 6,
  2: 8,
  2.5: 10,
  3: 12,
  3.5: 14,
  4: 16,
  5: 20,
  6: 24,
  8: 32,
  10: 40,
  12: 48,
  16: 64,
} as const;

// ============================================================================
// Edge Insets
// ============================================================================

export interface EdgeInsets {
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
  readonly left: number;
}

export function insets(vertical: number, horizontal: number = vertical): EdgeInsets {
  return { top: vertical, right: horizontal, bottom: vertical, left: horizontal };
}

/**
 * Scale every edge and round to whole points. A factor of 1 returns the
 * insets unchanged.
 */
export function scaleInsets(value: EdgeInsets, factor: number): EdgeInsets {
  if (factor === 1) return value;
  return {
    top: Math.round(value.top * factor),
    right: Math.round(value.right * factor),
    bottom: Math.round(value.bottom * factor),
    left: Math.round(value.left * factor),
  };
}

// ============================================================================
// Border Radius
// ============================================================================

export const borderRadius = {
  none: 0,
  sm: 4,
  md: 8,
  DEFAULT: 10,
  lg: 12,
  xl: 16,
  "2xl": 20,
  full: 9999,
} as const;

// ============================================================================
// Component Sizes
// ============================================================================

export const COMPONENT_SIZES = ["small", "medium", "large"] as const;

export type ComponentSize = (typeof COMPONENT_SIZES)[number];

export interface ComponentSizeAdjustment {
  paddingScale: number;
  fontStep: number;
}

export const componentSizes: Record<ComponentSize, ComponentSizeAdjustment> = {
  small: { paddingScale: 0.75, fontStep: -1 },
  medium: { paddingScale: 1, fontStep: 0 },
  large: { paddingScale: 1.25, fontStep: 1 },
};

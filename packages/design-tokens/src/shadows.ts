/**
 * @swatchkit/design-tokens - Shadow System
 *
 * Shadow radius and color pairs by elevation
 */

import type { ColorScheme } from "./colors";

export interface ShadowToken {
  radius: number;
  color: string;
}

// ============================================================================
// Elevation Levels
// ============================================================================

export const shadows: Record<"none" | "sm" | "md" | "lg", Record<ColorScheme, ShadowToken>> = {
  none: {
    light: { radius: 0, color: "transparent" },
    dark: { radius: 0, color: "transparent" },
  },
  sm: {
    light: { radius: 2, color: "rgba(0, 0, 0, 0.1)" },
    dark: { radius: 2, color: "rgba(0, 0, 0, 0.4)" },
  },
  md: {
    light: { radius: 8, color: "rgba(37, 99, 235, 0.3)" },
    dark: { radius: 8, color: "rgba(0, 0, 0, 0.5)" },
  },
  lg: {
    light: { radius: 16, color: "rgba(0, 0, 0, 0.15)" },
    dark: { radius: 16, color: "rgba(0, 0, 0, 0.6)" },
  },
};

// ============================================================================
// Glow Effects
// ============================================================================

export const glow = {
  radius: 10,
  opacity: 0.6,
} as const;

/**
 * @swatchkit/design-tokens - Color System
 *
 * Palette scales, scheme surfaces and the color helpers the resolver
 * uses for dark-mode substitution and opaque fallbacks.
 *
 * Colors are plain CSS color strings:
 * - `#rgb`, `#rrggbb`, `#rrggbbaa`
 * - `rgb(r, g, b)` / `rgba(r, g, b, a)`
 * - `transparent`
 */

// ============================================================================
// Color Palette Type
// ============================================================================

export interface ColorScale {
  50: string;
  100: string;
  200: string;
  300: string;
  400: string;
  500: string;
  600: string;
  700: string;
  800: string;
  900: string;
  950: string;
}

export type ColorScheme = "light" | "dark";

// ============================================================================
// Core Color Palettes
// ============================================================================

export const colors = {
  // Accent blue
  primary: {
    50: "#eff6ff",
    100: "#dbeafe",
    200: "#bfdbfe",
    300: "#93c5fd",
    400: "#60a5fa",
    500: "#3b82f6",
    600: "#2563eb",
    700: "#1d4ed8",
    800: "#1e40af",
    900: "#1e3a8a",
    950: "#172554",
  },

  // Slate, used for neutral fills and text
  neutral: {
    50: "#f8fafc",
    100: "#f1f5f9",
    200: "#e2e8f0",
    300: "#cbd5e1",
    400: "#94a3b8",
    500: "#64748b",
    600: "#475569",
    700: "#334155",
    800: "#1e293b",
    900: "#0f172a",
    950: "#020617",
  },

  success: {
    50: "#f0fdf4",
    100: "#dcfce7",
    200: "#bbf7d0",
    300: "#86efac",
    400: "#4ade80",
    500: "#22c55e",
    600: "#16a34a",
    700: "#15803d",
    800: "#166534",
    900: "#14532d",
    950: "#052e16",
  },

  warning: {
    50: "#fff7ed",
    100: "#ffedd5",
    200: "#fed7aa",
    300: "#fdba74",
    400: "#fb923c",
    500: "#f97316",
    600: "#ea580c",
    700: "#c2410c",
    800: "#9a3412",
    900: "#7c2d12",
    950: "#431407",
  },

  error: {
    50: "#fef2f2",
    100: "#fee2e2",
    200: "#fecaca",
    300: "#fca5a5",
    400: "#f87171",
    500: "#ef4444",
    600: "#dc2626",
    700: "#b91c1c",
    800: "#991b1b",
    900: "#7f1d1d",
    950: "#450a0a",
  },

  white: "#ffffff",
  black: "#000000",
  transparent: "transparent",
} as const;

// ============================================================================
// Scheme Surfaces
// ============================================================================

/**
 * Backdrop each scheme draws components on. Translucent fills are
 * composited over it when transparency is reduced.
 */
export const surfaceColors: Record<ColorScheme, string> = {
  light: colors.white,
  dark: "#1c1c1e",
};

// ============================================================================
// Color Parsing
// ============================================================================

export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  /** 0..1 */
  a: number;
}

const HEX_PATTERN = /^#([a-f\d]{3}|[a-f\d]{6}|[a-f\d]{8})$/i;
const RGB_PATTERN =
  /^rgba?\(\s*(\d{1,3})\s*(?:,\s*|\s+)(\d{1,3})\s*(?:,\s*|\s+)(\d{1,3})\s*(?:[,/]\s*(\d*\.?\d+)\s*)?\)$/i;

/**
 * Parse a CSS color string. Returns null for anything this module does
 * not understand (named colors other than `transparent`, hsl(), ...).
 */
export function parseColor(value: string): RgbaColor | null {
  const input = value.trim();

  if (input.toLowerCase() === "transparent") {
    return { r: 0, g: 0, b: 0, a: 0 };
  }

  const hex = HEX_PATTERN.exec(input);
  if (hex) {
    const digits = hex[1].length === 3
      ? hex[1].split("").map((c) => c + c).join("")
      : hex[1];
    return {
      r: parseInt(digits.slice(0, 2), 16),
      g: parseInt(digits.slice(2, 4), 16),
      b: parseInt(digits.slice(4, 6), 16),
      a: digits.length === 8 ? roundAlpha(parseInt(digits.slice(6, 8), 16) / 255) : 1,
    };
  }

  const rgb = RGB_PATTERN.exec(input);
  if (rgb) {
    const [r, g, b] = [Number(rgb[1]), Number(rgb[2]), Number(rgb[3])];
    const a = rgb[4] === undefined ? 1 : Number(rgb[4]);
    if (r > 255 || g > 255 || b > 255 || a > 1) {
      return null;
    }
    return { r, g, b, a };
  }

  return null;
}

/**
 * Format as `#rrggbb` when opaque, `rgba(r, g, b, a)` otherwise.
 */
export function formatColor({ r, g, b, a }: RgbaColor): string {
  if (a >= 1) {
    return rgbToHex(r, g, b);
  }
  return `rgba(${r}, ${g}, ${b}, ${roundAlpha(a)})`;
}

export function rgbToHex(r: number, g: number, b: number): string {
  return `#${[r, g, b].map((c) => c.toString(16).padStart(2, "0")).join("")}`;
}

function roundAlpha(alpha: number): number {
  return Math.round(alpha * 1000) / 1000;
}

// ============================================================================
// Color Utilities
// ============================================================================

/**
 * Create color with alpha
 */
export function withAlpha(color: string, alpha: number): string {
  const rgba = parseColor(color);
  if (!rgba) return color;
  return formatColor({ ...rgba, a: rgba.a * alpha });
}

export function isTranslucent(color: string): boolean {
  const rgba = parseColor(color);
  return rgba !== null && rgba.a < 1;
}

/**
 * Composite a translucent color over an opaque backdrop and return the
 * resulting opaque hex. Opaque and unparseable colors pass through.
 */
export function toOpaque(color: string, backdrop: string): string {
  const fg = parseColor(color);
  const bg = parseColor(backdrop);
  if (!fg || !bg || fg.a >= 1) return color;

  const blend = (top: number, bottom: number) => Math.round(top * fg.a + bottom * (1 - fg.a));
  return rgbToHex(blend(fg.r, bg.r), blend(fg.g, bg.g), blend(fg.b, bg.b));
}

/**
 * Get contrasting text color (black or white) for a background
 */
export function getContrastColor(color: string): "black" | "white" {
  const rgba = parseColor(color);
  if (!rgba) return "black";

  const luminance = (0.299 * rgba.r + 0.587 * rgba.g + 0.114 * rgba.b) / 255;
  return luminance > 0.5 ? "black" : "white";
}

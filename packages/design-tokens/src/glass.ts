/**
 * @swatchkit/design-tokens - Glass Presets
 *
 * Frosted-glass surface parameters for cards, sheets and toasts.
 */

import { colors, formatColor, parseColor, surfaceColors, toOpaque } from "./colors";
import type { ThemeContext } from "./context";

export type GlassStyle =
  | { kind: "light" }
  | { kind: "dark" }
  | { kind: "colorful"; color: string }
  | { kind: "frosted" }
  | { kind: "crystal" };

export interface ResolvedGlass {
  readonly tintColor: string;
  /** 0..1, applied on top of the tint's own alpha */
  readonly tintOpacity: number;
  readonly blurRadius: number;
  readonly borderOpacity: number;
}

interface GlassParameters {
  tint: string;
  tintOpacity: number;
  blurRadius: number;
}

function glassParameters(style: GlassStyle): GlassParameters {
  switch (style.kind) {
    case "light":
      return { tint: colors.white, tintOpacity: 0.2, blurRadius: 10 };
    case "dark":
      return { tint: colors.black, tintOpacity: 0.3, blurRadius: 10 };
    case "colorful":
      return { tint: style.color, tintOpacity: 0.15, blurRadius: 15 };
    case "frosted":
      return { tint: colors.white, tintOpacity: 0.4, blurRadius: 20 };
    case "crystal":
      return { tint: colors.transparent, tintOpacity: 0.1, blurRadius: 8 };
  }
}

const GLASS_BORDER_OPACITY = 0.3;

/**
 * With reduced transparency the tint is composited onto the scheme
 * surface and drawn fully opaque, without blur.
 */
export function resolveGlass(style: GlassStyle, context: ThemeContext): ResolvedGlass {
  const { tint, tintOpacity, blurRadius } = glassParameters(style);

  if (!context.reduceTransparency) {
    return Object.freeze({ tintColor: tint, tintOpacity, blurRadius, borderOpacity: GLASS_BORDER_OPACITY });
  }

  const rgba = parseColor(tint);
  const effective = rgba ? formatColor({ ...rgba, a: rgba.a * tintOpacity }) : tint;

  return Object.freeze({
    tintColor: toOpaque(effective, surfaceColors[context.colorScheme]),
    tintOpacity: 1,
    blurRadius: 0,
    borderOpacity: 1,
  });
}

/**
 * @swatchkit/design-tokens - Style Resolver
 *
 * Turns a preset tag, the ambient theme context and per-call overrides
 * into the concrete paint and layout values a component draws with.
 *
 * Precedence, lowest to highest:
 *   preset row < component size < theme context < overrides
 *
 * @example
 * ```ts
 * import { resolveStyle, createThemeContext } from '@swatchkit/design-tokens';
 *
 * const style = resolveStyle(
 *   { presetId: 'outline', overrides: { cornerRadius: 4 } },
 *   createThemeContext({ colorScheme: 'dark' })
 * );
 * ```
 */

import { surfaceColors, toOpaque } from "./colors";
import type { ThemeContext } from "./context";
import { getPresetDefinition, type PresetTag } from "./presets";
import { componentSizes, scaleInsets, type ComponentSize, type EdgeInsets } from "./spacing";
import { getSizeCategoryAdjustment, stepFontToken, type FontToken } from "./typography";

// ============================================================================
// Types
// ============================================================================

export interface ResolvedStyle {
  readonly backgroundColor: string;
  readonly foregroundColor: string;
  readonly borderColor: string;
  readonly borderWidth: number;
  readonly cornerRadius: number;
  readonly padding: EdgeInsets;
  readonly font: FontToken;
  readonly shadowRadius: number;
  readonly shadowColor: string;
}

/** Fields set to `undefined` count as absent. */
export type StyleOverrides = Partial<ResolvedStyle>;

export interface StyleRequest {
  presetId: PresetTag;
  size?: ComponentSize;
  overrides?: StyleOverrides;
}

export const COLOR_FIELDS = ["backgroundColor", "foregroundColor", "borderColor", "shadowColor"] as const;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a style request against a theme context. Pure: the same
 * request and context always produce an equal, frozen result.
 */
export function resolveStyle(request: StyleRequest, context: ThemeContext): ResolvedStyle {
  const preset = getPresetDefinition(request.presetId);
  const palette = preset.colors[context.colorScheme];

  const size = componentSizes[request.size ?? "medium"];
  const category = getSizeCategoryAdjustment(context.sizeCategory);

  const padding = scaleInsets(scaleInsets(preset.padding, size.paddingScale), category.paddingScale);
  const font = stepFontToken(stepFontToken(preset.font, size.fontStep), category.fontStep);

  const backgroundColor = context.reduceTransparency
    ? toOpaque(palette.background, surfaceColors[context.colorScheme])
    : palette.background;

  const base: ResolvedStyle = {
    backgroundColor,
    foregroundColor: palette.foreground,
    borderColor: palette.border,
    borderWidth: preset.borderWidth,
    cornerRadius: preset.cornerRadius,
    padding,
    font,
    shadowRadius: preset.shadowRadius,
    shadowColor: palette.shadow,
  };

  return freezeStyle(applyOverrides(base, request.overrides));
}

function applyOverrides(base: ResolvedStyle, overrides: StyleOverrides | undefined): ResolvedStyle {
  if (!overrides) return base;

  return {
    backgroundColor: overrides.backgroundColor ?? base.backgroundColor,
    foregroundColor: overrides.foregroundColor ?? base.foregroundColor,
    borderColor: overrides.borderColor ?? base.borderColor,
    borderWidth: overrides.borderWidth ?? base.borderWidth,
    cornerRadius: overrides.cornerRadius ?? base.cornerRadius,
    padding: overrides.padding ?? base.padding,
    font: overrides.font ?? base.font,
    shadowRadius: overrides.shadowRadius ?? base.shadowRadius,
    shadowColor: overrides.shadowColor ?? base.shadowColor,
  };
}

function freezeStyle(style: ResolvedStyle): ResolvedStyle {
  return Object.freeze({ ...style, padding: Object.freeze({ ...style.padding }) });
}

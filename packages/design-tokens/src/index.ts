/**
 * @swatchkit/design-tokens
 *
 * Design tokens, style presets, and the style resolver every component
 * calls during render
 *
 * @example
 * ```ts
 * import { resolveStyle, createThemeContextStore } from '@swatchkit/design-tokens';
 *
 * const themeStore = createThemeContextStore();
 * themeStore.getState().setColorScheme('dark');
 *
 * const style = resolveStyle({ presetId: 'filled' }, themeStore.getState().context);
 * ```
 */

// ============================================================================
// Colors
// ============================================================================

export {
  colors,
  surfaceColors,
  parseColor,
  formatColor,
  rgbToHex,
  withAlpha,
  isTranslucent,
  toOpaque,
  getContrastColor,
  type ColorScale,
  type ColorScheme,
  type RgbaColor,
} from "./colors";

// ============================================================================
// Typography
// ============================================================================

export {
  FONT_TOKENS,
  SIZE_CATEGORIES,
  DEFAULT_SIZE_CATEGORY,
  fontScale,
  isFontToken,
  stepFontToken,
  sizeCategoryRank,
  getSizeCategoryAdjustment,
  type FontToken,
  type FontSizeConfig,
  type SizeCategory,
  type SizeCategoryAdjustment,
} from "./typography";

// ============================================================================
// Spacing
// ============================================================================

export {
  spacing,
  borderRadius,
  insets,
  scaleInsets,
  COMPONENT_SIZES,
  componentSizes,
  type EdgeInsets,
  type ComponentSize,
  type ComponentSizeAdjustment,
} from "./spacing";

// ============================================================================
// Motion
// ============================================================================

export {
  duration,
  easing,
  animations,
  getAnimation,
  createTransition,
  shimmerPhase,
  pulseScale,
  glowIntensity,
  type AnimationPreset,
  type AnimationName,
  type LoopOptions,
  type PulseOptions,
  type GlowOptions,
} from "./motion";

// ============================================================================
// Shadows
// ============================================================================

export { shadows, glow, type ShadowToken } from "./shadows";

// ============================================================================
// Theme Context
// ============================================================================

export {
  defaultThemeContext,
  createThemeContext,
  createThemeContextStore,
  type ThemeContext,
  type ThemeContextState,
  type ThemeContextStore,
} from "./context";

// ============================================================================
// Presets & Resolution
// ============================================================================

export {
  STYLE_PRESET_IDS,
  DEFAULT_PRESET_ID,
  stylePresets,
  validatePresetTable,
  isStylePresetId,
  getPresetDefinition,
  PresetTableError,
  type StylePresetId,
  type PresetTag,
  type PresetColors,
  type PresetDefinition,
} from "./presets";

export {
  resolveStyle,
  COLOR_FIELDS,
  type ResolvedStyle,
  type StyleOverrides,
  type StyleRequest,
} from "./resolver";

export {
  styleRequestSchema,
  styleOverridesSchema,
  edgeInsetsSchema,
  parseStyleRequest,
  safeParseStyleRequest,
  type StyleRequestInput,
} from "./schemas";

export { resolveGlass, type GlassStyle, type ResolvedGlass } from "./glass";

export {
  STATUS_KINDS,
  statusIcons,
  statusTints,
  resolveStatusStyle,
  type StatusKind,
  type ResolvedStatusStyle,
} from "./status";

// ============================================================================
// Version
// ============================================================================

export const version = "1.0.0";

/**
 * @swatchkit/design-tokens - Status Styles
 *
 * Toast, snackbar and banner presets keyed by message status.
 */

import { colors, surfaceColors, toOpaque, withAlpha, type ColorScheme } from "./colors";
import type { ThemeContext } from "./context";

export const STATUS_KINDS = ["success", "error", "warning", "info"] as const;

export type StatusKind = (typeof STATUS_KINDS)[number];

export interface ResolvedStatusStyle {
  /** lucide icon name */
  readonly icon: string;
  readonly tintColor: string;
  readonly backgroundColor: string;
}

export const statusIcons: Record<StatusKind, string> = {
  success: "circle-check",
  error: "circle-x",
  warning: "triangle-alert",
  info: "info",
};

export const statusTints: Record<StatusKind, Record<ColorScheme, string>> = {
  success: { light: colors.success[600], dark: colors.success[400] },
  error: { light: colors.error[600], dark: colors.error[400] },
  warning: { light: colors.warning[600], dark: colors.warning[400] },
  info: { light: colors.primary[600], dark: colors.primary[400] },
};

const STATUS_BACKGROUND_ALPHA = 0.12;

export function resolveStatusStyle(status: StatusKind, context: ThemeContext): ResolvedStatusStyle {
  const tintColor = statusTints[status][context.colorScheme];
  const background = withAlpha(tintColor, STATUS_BACKGROUND_ALPHA);

  return Object.freeze({
    icon: statusIcons[status],
    tintColor,
    backgroundColor: context.reduceTransparency
      ? toOpaque(background, surfaceColors[context.colorScheme])
      : background,
  });
}

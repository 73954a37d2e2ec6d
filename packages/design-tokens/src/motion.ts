/**
 * @swatchkit/design-tokens - Motion & Animation System
 *
 * Durations, easings, animation presets, and the looping effects
 * (shimmer, pulse, glow) expressed as pure functions of elapsed time.
 */

import { glow } from "./shadows";

// ============================================================================
// Duration
// ============================================================================

export const duration = {
  instant: "0ms",
  faster: "100ms",
  fast: "150ms",
  normal: "200ms",
  slow: "300ms",
  slowest: "500ms",
  glacial: "1000ms",
} as const;

// ============================================================================
// Easing Functions
// ============================================================================

export const easing = {
  linear: "linear",
  easeIn: "ease-in",
  easeOut: "ease-out",
  easeInOut: "ease-in-out",

  smooth: "cubic-bezier(0.4, 0, 0.2, 1)",
  snappy: "cubic-bezier(0.4, 0, 0, 1)",
  spring: "cubic-bezier(0.175, 0.885, 0.32, 1.275)",
} as const;

// ============================================================================
// Animation Presets
// ============================================================================

export interface AnimationPreset {
  duration: string;
  easing: string;
}

export const animations = {
  press: { duration: duration.faster, easing: easing.easeInOut },
  fadeIn: { duration: duration.normal, easing: easing.easeOut },
  fadeOut: { duration: duration.fast, easing: easing.easeIn },
  scaleIn: { duration: duration.normal, easing: easing.spring },
  toastEnter: { duration: duration.slow, easing: easing.spring },
  toastExit: { duration: duration.normal, easing: easing.easeIn },
  sheetEnter: { duration: duration.slow, easing: easing.smooth },
  skeleton: { duration: duration.glacial, easing: easing.easeInOut },
} as const satisfies Record<string, AnimationPreset>;

export type AnimationName = keyof typeof animations;

/**
 * Get animation preset with reduced motion support
 */
export function getAnimation(preset: AnimationName, reduceMotion = false): AnimationPreset {
  if (reduceMotion) {
    return { duration: duration.instant, easing: easing.linear };
  }
  return animations[preset];
}

/**
 * Get CSS transition string
 */
export function createTransition(
  properties: string | string[],
  preset: AnimationName = "fadeIn",
  reduceMotion = false
): string {
  const { duration: dur, easing: ease } = getAnimation(preset, reduceMotion);
  const props = Array.isArray(properties) ? properties : [properties];
  return props.map((prop) => `${prop} ${dur} ${ease}`).join(", ");
}

// ============================================================================
// Looping Effects
// ============================================================================

export interface LoopOptions {
  /** Length of one cycle in milliseconds. */
  periodMs?: number;
  /** When set, the effect holds its resting value. */
  reduceMotion?: boolean;
}

const DEFAULT_PERIOD_MS = 1500;

/** Fraction of the current cycle in [0, 1). Negative time counts as 0. */
function cycleProgress(elapsedMs: number, periodMs: number): number {
  if (periodMs <= 0 || elapsedMs <= 0) return 0;
  return (elapsedMs % periodMs) / periodMs;
}

/** 0 at the start of the cycle, 1 half way, back to 0 at the end. */
function autoreverse(progress: number): number {
  return (1 - Math.cos(2 * Math.PI * progress)) / 2;
}

/**
 * Horizontal offset of the shimmer highlight, sweeping linearly from -1
 * to 1 once per period without reversing. Rests at -1 (off the leading
 * edge).
 */
export function shimmerPhase(elapsedMs: number, options: LoopOptions = {}): number {
  const { periodMs = DEFAULT_PERIOD_MS, reduceMotion = false } = options;
  if (reduceMotion) return -1;
  return -1 + 2 * cycleProgress(elapsedMs, periodMs);
}

export interface PulseOptions extends LoopOptions {
  from?: number;
  to?: number;
}

/**
 * Scale factor for pulsing loaders, easing from `from` to `to` and back.
 */
export function pulseScale(elapsedMs: number, options: PulseOptions = {}): number {
  const { periodMs = DEFAULT_PERIOD_MS, reduceMotion = false, from = 1, to = 1.3 } = options;
  if (reduceMotion) return from;
  return from + (to - from) * autoreverse(cycleProgress(elapsedMs, periodMs));
}

export interface GlowOptions extends LoopOptions {
  min?: number;
  max?: number;
}

/**
 * Glow shadow opacity, breathing between `min` and `max`.
 */
export function glowIntensity(elapsedMs: number, options: GlowOptions = {}): number {
  const { periodMs = DEFAULT_PERIOD_MS, reduceMotion = false, min = 0, max = glow.opacity } = options;
  if (reduceMotion) return min;
  return min + (max - min) * autoreverse(cycleProgress(elapsedMs, periodMs));
}

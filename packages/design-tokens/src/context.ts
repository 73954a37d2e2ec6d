/**
 * @swatchkit/design-tokens - Theme Context
 *
 * The ambient values a host hands to the resolver on every render pass.
 * Resolution never reads this store; callers take a snapshot and pass it
 * explicitly.
 */

import { createStore } from "zustand/vanilla";

import type { ColorScheme } from "./colors";
import { DEFAULT_SIZE_CATEGORY, type SizeCategory } from "./typography";

// ============================================================================
// Theme Context Types
// ============================================================================

export interface ThemeContext {
  readonly colorScheme: ColorScheme;
  readonly sizeCategory: SizeCategory;
  readonly reduceMotion: boolean;
  readonly reduceTransparency: boolean;
}

export const defaultThemeContext: ThemeContext = Object.freeze<ThemeContext>({
  colorScheme: "light",
  sizeCategory: DEFAULT_SIZE_CATEGORY,
  reduceMotion: false,
  reduceTransparency: false,
});

export function createThemeContext(overrides: Partial<ThemeContext> = {}): ThemeContext {
  return Object.freeze({ ...defaultThemeContext, ...overrides });
}

// ============================================================================
// Host Store
// ============================================================================

export interface ThemeContextState {
  context: ThemeContext;
  setColorScheme: (colorScheme: ColorScheme) => void;
  setSizeCategory: (sizeCategory: SizeCategory) => void;
  setReduceMotion: (reduceMotion: boolean) => void;
  setReduceTransparency: (reduceTransparency: boolean) => void;
  update: (updates: Partial<ThemeContext>) => void;
  reset: () => void;
}

/**
 * Store the host environment writes into when the platform reports a
 * scheme or accessibility change. Every write replaces `context` with a
 * new frozen snapshot, so snapshots already handed out never change.
 */
export function createThemeContextStore(initial: Partial<ThemeContext> = {}) {
  const start = createThemeContext(initial);

  return createStore<ThemeContextState>()((set) => {
    const update = (updates: Partial<ThemeContext>) =>
      set((prev) => ({ context: createThemeContext({ ...prev.context, ...updates }) }));

    return {
      context: start,
      setColorScheme: (colorScheme) => update({ colorScheme }),
      setSizeCategory: (sizeCategory) => update({ sizeCategory }),
      setReduceMotion: (reduceMotion) => update({ reduceMotion }),
      setReduceTransparency: (reduceTransparency) => update({ reduceTransparency }),
      update,
      reset: () => set({ context: start }),
    };
  });
}

export type ThemeContextStore = ReturnType<typeof createThemeContextStore>;

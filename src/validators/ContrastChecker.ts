/**
 * Contrast Checker
 * Decides whether a detected text/background pair is readable and words the warning
 */

import {
  type RGB,
  alphaBlend,
  getContrastRatio,
  getPerceivedBrightness,
  isOpaque,
  parseColor
} from '../contrast.js';

export type WCAGLevel = 'AA' | 'AAA';

export interface ContrastCheckInput {
  textColor?: string | null;
  backgroundColor?: string | null;
}

export interface ContrastCheckOptions {
  level?: WCAGLevel;
  /** Used when no text color was detected */
  fallbackTextColor?: string;
  /**
   * Opaque color assumed behind the block. Stands in for a missing or fully
   * transparent background and sits under a translucent one; without it those
   * cases are not checked.
   */
  fallbackBackgroundColor?: string;
  isLargeText?: boolean;
  /** Font size in px; 24px and up counts as large text unless isLargeText is false */
  fontSize?: number;
  logViolations?: boolean;
}

export interface ContrastCheckResult {
  ratio: number;
  required: number;
  readable: boolean;
  textColor: string;
  backgroundColor: string;
  warning: string | null;
}

export const LARGE_TEXT_FONT_SIZE = 24;

const REQUIRED_RATIOS: Record<WCAGLevel, { normal: number; large: number }> = {
  AA: { normal: 4.5, large: 3 },
  AAA: { normal: 7, large: 4.5 }
};

export const DARKER_BACKGROUND_WARNING =
  'This color combination may be hard for people to read. Try using a darker background color and/or a brighter text color.';

export const BRIGHTER_BACKGROUND_WARNING =
  'This color combination may be hard for people to read. Try using a brighter background color and/or a darker text color.';

function isLarge(options: ContrastCheckOptions): boolean {
  if (options.isLargeText !== undefined) {
    return options.isLargeText;
  }
  return options.fontSize !== undefined && options.fontSize >= LARGE_TEXT_FONT_SIZE;
}

export function getRequiredRatio(options: ContrastCheckOptions = {}): number {
  const ratios = REQUIRED_RATIOS[options.level ?? 'AA'];
  return isLarge(options) ? ratios.large : ratios.normal;
}

function pickBackground(
  detected: string | null | undefined,
  fallback: string | undefined
): { value: string; rgb: RGB } | null {
  const parsed = detected ? parseColor(detected) : null;
  if (detected && parsed && isOpaque(parsed)) {
    return { value: detected, rgb: parsed };
  }

  const base = fallback ? parseColor(fallback) : null;
  if (!fallback || !base || !isOpaque(base)) {
    // nothing opaque is known to be behind the text
    return null;
  }

  if (detected && parsed && parsed.a !== 0) {
    return { value: detected, rgb: alphaBlend(parsed, base) };
  }
  return { value: fallback, rgb: base };
}

/**
 * Check the contrast of a detected color pair.
 * Returns null when there is not enough information to judge it.
 */
export function checkColorContrast(
  input: ContrastCheckInput | null,
  options: ContrastCheckOptions = {}
): ContrastCheckResult | null {
  if (!input) return null;

  const textColor = input.textColor || options.fallbackTextColor;
  if (!textColor) return null;

  const foreground = parseColor(textColor);
  if (!foreground) {
    console.warn('[ContrastChecker] Failed to parse text color:', textColor);
    return null;
  }

  if (input.backgroundColor && !parseColor(input.backgroundColor)) {
    console.warn('[ContrastChecker] Failed to parse background color:', input.backgroundColor);
    return null;
  }

  const background = pickBackground(input.backgroundColor, options.fallbackBackgroundColor);
  if (!background) return null;

  const ratio = getContrastRatio(foreground, background.rgb);
  const required = getRequiredRatio(options);
  const readable = ratio >= required;

  let warning: string | null = null;
  if (!readable) {
    warning = getPerceivedBrightness(background.rgb) < getPerceivedBrightness(foreground)
      ? DARKER_BACKGROUND_WARNING
      : BRIGHTER_BACKGROUND_WARNING;

    if (options.logViolations) {
      console.warn(
        `[ContrastChecker] Contrast ${ratio.toFixed(2)}:1 is below ${required}:1`,
        { textColor, backgroundColor: background.value }
      );
    }
  }

  return {
    ratio,
    required,
    readable,
    textColor,
    backgroundColor: background.value,
    warning
  };
}

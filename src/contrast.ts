export interface RGB {
  r: number;
  g: number;
  b: number;
  a?: number;
}

const NAMED_COLORS = new Map<string, RGB>([
  ['black', { r: 0, g: 0, b: 0, a: 1 }],
  ['white', { r: 255, g: 255, b: 255, a: 1 }],
  ['red', { r: 255, g: 0, b: 0, a: 1 }],
  ['green', { r: 0, g: 128, b: 0, a: 1 }],
  ['blue', { r: 0, g: 0, b: 255, a: 1 }],
  ['yellow', { r: 255, g: 255, b: 0, a: 1 }],
  ['gray', { r: 128, g: 128, b: 128, a: 1 }],
  ['grey', { r: 128, g: 128, b: 128, a: 1 }],
  ['transparent', { r: 0, g: 0, b: 0, a: 0 }]
]);

// rgb(1, 2, 3) / rgba(1, 2, 3, 0.5) as serialised by getComputedStyle
const LEGACY_RGB = /^rgba?\(\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*(?:,\s*([\d.]+%?)\s*)?\)$/i;
// rgb(1 2 3 / 50%)
const MODERN_RGB = /^rgba?\(\s*(\d+)\s+(\d+)\s+(\d+)\s*(?:\/\s*([\d.]+%?)\s*)?\)$/i;
const HEX = /^#([a-f\d]{3,4}|[a-f\d]{6}|[a-f\d]{8})$/i;

export function hexToRgb(hex: string): RGB {
  const match = HEX.exec(hex.startsWith('#') ? hex : `#${hex}`);
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }

  const digits = match[1].length <= 4
    ? [...match[1]].map(digit => digit + digit)
    : match[1].match(/../g) ?? [];
  const [r, g, b, a] = digits.map(pair => parseInt(pair, 16));

  return { r, g, b, a: a === undefined ? 1 : a / 255 };
}

function parseAlpha(value: string | undefined): number {
  if (value === undefined) return 1;
  const alpha = value.endsWith('%') ? parseFloat(value) / 100 : parseFloat(value);
  return Math.min(1, Math.max(0, alpha));
}

/**
 * Parse the colors this package meets: computed style serialisations, hex
 * values from color pickers and a handful of keywords.
 */
export function parseColor(color: string): RGB | null {
  const value = color.trim();
  if (!value) return null;

  if (value.startsWith('#')) {
    try {
      return hexToRgb(value);
    } catch {
      return null;
    }
  }

  const match = LEGACY_RGB.exec(value) ?? MODERN_RGB.exec(value);
  if (match) {
    return {
      r: parseInt(match[1], 10),
      g: parseInt(match[2], 10),
      b: parseInt(match[3], 10),
      a: parseAlpha(match[4])
    };
  }

  return NAMED_COLORS.get(value.toLowerCase()) ?? null;
}

export function isOpaque(rgb: RGB): boolean {
  return rgb.a === undefined || rgb.a >= 1;
}

/**
 * Composite `top` over an opaque `bottom`
 */
export function alphaBlend(top: RGB, bottom: RGB): RGB {
  const alpha = top.a ?? 1;
  const mix = (upper: number, lower: number) => Math.round(upper * alpha + lower * (1 - alpha));

  return {
    r: mix(top.r, bottom.r),
    g: mix(top.g, bottom.g),
    b: mix(top.b, bottom.b),
    a: 1
  };
}

// WCAG 2.x relative luminance
export function getRelativeLuminance({ r, g, b }: RGB): number {
  const [lr, lg, lb] = [r, g, b].map(channel => {
    const srgb = channel / 255;
    return srgb <= 0.03928 ? srgb / 12.92 : ((srgb + 0.055) / 1.055) ** 2.4;
  });

  return 0.2126 * lr + 0.7152 * lg + 0.0722 * lb;
}

/**
 * Contrast ratio between 1 and 21. The background must be opaque; translucent
 * text is composited onto it first.
 */
export function getContrastRatio(foreground: RGB, background: RGB): number {
  const text = isOpaque(foreground) ? foreground : alphaBlend(foreground, background);
  const luminances = [getRelativeLuminance(text), getRelativeLuminance(background)];

  return (Math.max(...luminances) + 0.05) / (Math.min(...luminances) + 0.05);
}

export function getPerceivedBrightness({ r, g, b }: RGB): number {
  return Math.sqrt(0.299 * r * r + 0.587 * g * g + 0.114 * b * b);
}

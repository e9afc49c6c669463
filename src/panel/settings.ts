export interface ColorOption {
  name: string;
  slug: string;
  color: string;
}

export interface GradientOption {
  name: string;
  slug: string;
  gradient: string;
}

/** One picker row: a color and/or gradient the block exposes */
export interface ColorGradientSetting {
  label: string;
  colorValue?: string;
  onColorChange?: (color: string | undefined) => void;
  gradientValue?: string;
  onGradientChange?: (gradient: string | undefined) => void;
}

/**
 * Color and gradient configuration handed to the settings panel as-is.
 * `disableCustomColors` / `disableCustomGradients` restrict the pickers to the palettes.
 */
export interface ColorGradientSettings {
  colors?: ColorOption[];
  gradients?: GradientOption[];
  disableCustomColors?: boolean;
  disableCustomGradients?: boolean;
  settings: ColorGradientSetting[];
}

export {
  detectColors,
  ColorContrastDetector,
  TRANSPARENT_BACKGROUND,
  type DetectionResult,
  type RenderedNode,
  type ResolvedColor,
  type ComputedColors,
  type StyleResolver,
  type NodeResolver,
  type DetectorOptions,
  type ColorContrastDetectorOptions
} from './detection/ColorContrastDetector.js';
export { getBlockDOMNode, createBlockNodeResolver, BLOCK_ID_PREFIX } from './detection/blockNode.js';

export {
  checkColorContrast,
  getRequiredRatio,
  LARGE_TEXT_FONT_SIZE,
  DARKER_BACKGROUND_WARNING,
  BRIGHTER_BACKGROUND_WARNING,
  type WCAGLevel,
  type ContrastCheckInput,
  type ContrastCheckOptions,
  type ContrastCheckResult
} from './validators/ContrastChecker.js';

export {
  parseColor,
  hexToRgb,
  isOpaque,
  getRelativeLuminance,
  getContrastRatio,
  alphaBlend,
  getPerceivedBrightness,
  type RGB
} from './contrast.js';

export {
  ColorPanel,
  DEFAULT_PANEL_TITLE,
  type ColorPanelOptions,
  type ColorPanelUpdate,
  type ColorPanelEvents,
  type ColorPanelView,
  type ColorPanelViewProps
} from './panel/ColorPanel.js';
export { createDomColorPanelView } from './panel/domView.js';
export type {
  ColorOption,
  GradientOption,
  ColorGradientSetting,
  ColorGradientSettings
} from './panel/settings.js';

export { colorPanel, createColorPanel, type ColorPanelActionOptions, type ColorPanelActionReturn } from './actions.js';
export { EventEmitter } from './engine/events.js';

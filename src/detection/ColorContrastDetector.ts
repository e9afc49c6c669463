/**
 * Color Contrast Detector
 * Resolves the text color and the effective background color of a rendered block
 */

/** Serialised color as it comes out of a computed style, e.g. `rgb(0, 0, 0)` */
export type ResolvedColor = string;

/** A rendered element; only its computed style and ancestors are read */
export type RenderedNode = Element;

export interface DetectionResult {
  textColor: ResolvedColor;
  backgroundColor: ResolvedColor;
}

export interface ComputedColors {
  color: string;
  backgroundColor: string;
}

export type StyleResolver = (element: Element) => ComputedColors;

export type NodeResolver = (id: string) => RenderedNode | null | undefined;

export interface DetectorOptions {
  getComputedStyle?: StyleResolver;
  /** Computed background value meaning "no background of its own" */
  transparentColor?: ResolvedColor;
}

export interface ColorContrastDetectorOptions extends DetectorOptions {
  resolveNode?: NodeResolver;
}

export const TRANSPARENT_BACKGROUND: ResolvedColor = 'rgba(0, 0, 0, 0)';

const ELEMENT_NODE = 1;

function isElementNode(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function defaultStyleResolver(element: Element): ComputedColors {
  const view = element.ownerDocument.defaultView ?? window;
  return view.getComputedStyle(element);
}

/**
 * Detect the text color of `node` and the first non-transparent background
 * found walking up from it. The walk stops at the first ancestor that is not
 * an element (document, fragment, shadow root); whatever was read last is
 * returned, transparent or not.
 */
export function detectColors(
  node: RenderedNode | null | undefined,
  enabled: boolean,
  options: DetectorOptions = {}
): DetectionResult | null {
  if (!enabled || !node) {
    return null;
  }

  const getComputedStyle = options.getComputedStyle ?? defaultStyleResolver;
  const transparent = options.transparentColor ?? TRANSPARENT_BACKGROUND;

  const textColor = getComputedStyle(node).color;

  let current: Element = node;
  let backgroundColor = getComputedStyle(current).backgroundColor;
  let parent = current.parentNode;
  while (backgroundColor === transparent && parent && isElementNode(parent)) {
    current = parent;
    backgroundColor = getComputedStyle(current).backgroundColor;
    parent = current.parentNode;
  }

  return { textColor, backgroundColor };
}

export class ColorContrastDetector {
  private options: DetectorOptions;
  private resolveNode: NodeResolver | null;

  constructor(options: ColorContrastDetectorOptions = {}) {
    const { resolveNode, ...detectorOptions } = options;
    this.options = detectorOptions;
    this.resolveNode = resolveNode ?? null;
  }

  detect(node: RenderedNode | null | undefined, enabled: boolean): DetectionResult | null {
    return detectColors(node, enabled, this.options);
  }

  /**
   * Resolve the node for `id` and detect its colors. The resolver is not
   * consulted when detection is disabled.
   */
  detectFor(id: string, enabled: boolean): DetectionResult | null {
    if (!enabled || !this.resolveNode) {
      return null;
    }
    return this.detect(this.resolveNode(id), enabled);
  }
}

/**
 * Color Panel
 * Inspector-side controller: detects the selected block's colors, checks their
 * contrast and hands everything to a view together with the color settings.
 */

import {
  ColorContrastDetector,
  type DetectionResult,
  type NodeResolver,
  type RenderedNode,
  type StyleResolver
} from '../detection/ColorContrastDetector.js';
import { createBlockNodeResolver } from '../detection/blockNode.js';
import {
  checkColorContrast,
  type ContrastCheckOptions,
  type ContrastCheckResult
} from '../validators/ContrastChecker.js';
import { EventEmitter } from '../engine/events.js';
import type { ColorGradientSettings } from './settings.js';

export interface ColorPanelViewProps {
  title: string;
  initialOpen: boolean;
  settings: ColorGradientSettings | undefined;
  detected: DetectionResult | null;
  /** null when contrast checking is off or there was nothing to check */
  contrast: ContrastCheckResult | null;
}

export interface ColorPanelView {
  /** DOM changes made while rendering never trigger detection */
  render(props: ColorPanelViewProps): void;
  destroy?(): void;
  /** Mutations inside this element never trigger detection */
  container?: Element;
}

export interface ColorPanelOptions {
  clientId: string | null;
  settings?: ColorGradientSettings;
  enableContrastChecking?: boolean;
  title?: string;
  initialOpen?: boolean;
  resolveNode?: NodeResolver;
  getComputedStyle?: StyleResolver;
  contrast?: ContrastCheckOptions;
  logViolations?: boolean;
  /** Log blocks that could not be resolved */
  debug?: boolean;
  /**
   * Re-detect when styles or children change under `root`, which defaults to
   * the document of the resolved block. Fixed when the panel is created.
   */
  observeMutations?: boolean;
  /** Fixed when the panel is created */
  root?: Node;
  /** Delay in ms used to coalesce mutation-triggered detection; 0 runs it right away */
  debounce?: number;
  view?: ColorPanelView;
}

/** Options that can change after creation; `observeMutations`, `root` and `view` cannot */
export type ColorPanelUpdate = Partial<Omit<ColorPanelOptions, 'observeMutations' | 'root' | 'view'>>;

export type ColorPanelEvents = {
  detect: DetectionResult | null;
  contrast: ContrastCheckResult | null;
};

interface ResolvedPanelOptions {
  clientId: string | null;
  settings: ColorGradientSettings | undefined;
  enableContrastChecking: boolean;
  title: string;
  initialOpen: boolean;
  resolveNode: NodeResolver;
  getComputedStyle: StyleResolver | undefined;
  contrast: ContrastCheckOptions;
  logViolations: boolean;
  debug: boolean;
  debounce: number;
}

export const DEFAULT_PANEL_TITLE = 'Color settings';

export class ColorPanel {
  private options: ResolvedPanelOptions;
  private detector: ColorContrastDetector;
  private view: ColorPanelView | null;
  private root: Node | null;
  private observeMutations: boolean;
  private observer: MutationObserver | null = null;
  private observed: Node | null = null;
  private detectionTimer: number | null = null;
  private detected: DetectionResult | null = null;
  private contrast: ContrastCheckResult | null = null;
  private attached = false;
  private events = new EventEmitter<ColorPanelEvents>();

  constructor(options: ColorPanelOptions) {
    this.options = resolveOptions(options, {
      clientId: options.clientId,
      settings: undefined,
      enableContrastChecking: true,
      title: DEFAULT_PANEL_TITLE,
      initialOpen: false,
      resolveNode: createBlockNodeResolver(document),
      getComputedStyle: undefined,
      contrast: {},
      logViolations: false,
      debug: false,
      debounce: 0
    });

    this.view = options.view ?? null;
    this.root = options.root ?? null;
    this.observeMutations = options.observeMutations ?? true;
    this.detector = this.createDetector();
  }

  /**
   * Run the first detection and start watching for style changes
   */
  attach(): void {
    if (this.attached) return;
    this.attached = true;

    this.runDetection();
  }

  /**
   * Merge new options. Detection only re-runs when the selected block or the
   * contrast switch changed; anything else re-renders with the last detection.
   */
  update(options: ColorPanelUpdate): void {
    const previous = this.options;
    this.options = resolveOptions(options, previous);

    const resolversChanged =
      this.options.resolveNode !== previous.resolveNode ||
      this.options.getComputedStyle !== previous.getComputedStyle;
    if (this.options.getComputedStyle !== previous.getComputedStyle) {
      this.detector = this.createDetector();
    }

    if (!this.attached) return;

    if (
      resolversChanged ||
      this.options.clientId !== previous.clientId ||
      this.options.enableContrastChecking !== previous.enableContrastChecking
    ) {
      this.runDetection();
    } else {
      const pending = this.observer?.takeRecords() ?? [];
      this.evaluate();
      if (pending.length > 0) {
        this.handleMutations(pending);
      }
    }
  }

  /**
   * Force a detection pass, e.g. after the block re-rendered
   */
  refresh(): void {
    this.runDetection();
  }

  getDetectedColors(): DetectionResult | null {
    return this.detected;
  }

  getContrast(): ContrastCheckResult | null {
    return this.contrast;
  }

  on<K extends keyof ColorPanelEvents>(event: K, handler: (payload: ColorPanelEvents[K]) => void): void {
    this.events.on(event, handler);
  }

  off<K extends keyof ColorPanelEvents>(event: K, handler: (payload: ColorPanelEvents[K]) => void): void {
    this.events.off(event, handler);
  }

  destroy(): void {
    if (this.detectionTimer !== null) {
      window.clearTimeout(this.detectionTimer);
      this.detectionTimer = null;
    }
    this.observer?.disconnect();
    this.observer = null;
    this.observed = null;
    this.view?.destroy?.();
    this.view = null;
    this.events.removeAllListeners();
    this.attached = false;
  }

  private createDetector(): ColorContrastDetector {
    return new ColorContrastDetector({ getComputedStyle: this.options.getComputedStyle });
  }

  /**
   * Watch `root`, or the document the block lives in; blocks rendered in an
   * iframe canvas move the observer into that document.
   */
  private observe(node: RenderedNode | null): void {
    if (!this.observeMutations || !this.attached) return;

    const target = this.root ?? node?.ownerDocument.documentElement ?? this.observed ?? document.documentElement;
    if (target === this.observed) return;

    const Observer = target.ownerDocument?.defaultView?.MutationObserver ??
      (typeof MutationObserver !== 'undefined' ? MutationObserver : null);
    if (!Observer) return;

    this.observer?.disconnect();
    this.observer = new Observer(mutations => this.handleMutations(mutations));
    this.observer.observe(target, {
      attributes: true,
      attributeFilter: ['style', 'class'],
      childList: true,
      subtree: true
    });
    this.observed = target;
  }

  private handleMutations(mutations: MutationRecord[]): void {
    const container = this.view?.container;
    const relevant = mutations.some(mutation => !container || !container.contains(mutation.target));
    if (!relevant) return;

    if (this.options.debounce > 0) {
      if (this.detectionTimer !== null) window.clearTimeout(this.detectionTimer);
      this.detectionTimer = window.setTimeout(() => {
        this.detectionTimer = null;
        this.runDetection();
      }, this.options.debounce);
    } else {
      this.runDetection();
    }
  }

  private runDetection(): void {
    const { clientId, enableContrastChecking, resolveNode } = this.options;

    // anything queued so far is covered by this pass
    this.observer?.takeRecords();

    const node = enableContrastChecking && clientId ? resolveNode(clientId) ?? null : null;
    // previous result is dropped, never merged
    this.detected = this.detector.detect(node, enableContrastChecking);
    this.observe(node);

    if (this.options.debug && enableContrastChecking && clientId && !this.detected) {
      console.debug('[ColorPanel] No rendered node for block', clientId);
    }

    this.events.emit('detect', this.detected);
    this.evaluate();
  }

  private evaluate(): void {
    const { enableContrastChecking, contrast, logViolations } = this.options;

    this.contrast = enableContrastChecking
      ? checkColorContrast(this.detected, { logViolations, ...contrast })
      : null;

    this.events.emit('contrast', this.contrast);

    this.view?.render({
      title: this.options.title,
      initialOpen: this.options.initialOpen,
      settings: this.options.settings,
      detected: this.detected,
      contrast: this.contrast
    });

    // records produced by the render itself
    this.observer?.takeRecords();
  }
}

function resolveOptions(options: ColorPanelUpdate, base: ResolvedPanelOptions): ResolvedPanelOptions {
  return {
    clientId: 'clientId' in options ? options.clientId ?? null : base.clientId,
    settings: 'settings' in options ? options.settings : base.settings,
    enableContrastChecking: options.enableContrastChecking ?? base.enableContrastChecking,
    title: options.title ?? base.title,
    initialOpen: options.initialOpen ?? base.initialOpen,
    resolveNode: options.resolveNode ?? base.resolveNode,
    getComputedStyle: options.getComputedStyle ?? base.getComputedStyle,
    contrast: options.contrast ?? base.contrast,
    logViolations: options.logViolations ?? base.logViolations,
    debug: options.debug ?? base.debug,
    debounce: options.debounce ?? base.debounce
  };
}

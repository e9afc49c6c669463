import type { Action } from 'svelte/action';
import { ColorPanel, type ColorPanelOptions } from './panel/ColorPanel.js';
import { createDomColorPanelView } from './panel/domView.js';

/**
 * Svelte hands the whole parameter to `update` on every change; `root` and
 * `observeMutations` are read once, when the action mounts, and ignored after.
 */
export type ColorPanelActionOptions = Omit<ColorPanelOptions, 'view'>;

export interface ColorPanelActionReturn {
  update(options: ColorPanelActionOptions): void;
  destroy(): void;
}

export function createColorPanel(
  node: HTMLElement,
  options: ColorPanelActionOptions
): ColorPanelActionReturn {
  const panel = new ColorPanel({
    ...options,
    view: createDomColorPanelView(node)
  });
  panel.attach();

  return {
    update(newOptions: ColorPanelActionOptions) {
      const { root: _root, observeMutations: _observeMutations, ...changes } = newOptions;
      panel.update(changes);
    },
    destroy() {
      panel.destroy();
    }
  };
}

/**
 * `use:colorPanel={{ clientId, settings }}` renders the color panel into the
 * node and keeps the contrast notice in sync with the selected block.
 */
export const colorPanel: Action<HTMLElement, ColorPanelActionOptions> = createColorPanel;

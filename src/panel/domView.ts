import type { ColorPanelView, ColorPanelViewProps } from './ColorPanel.js';

/**
 * Plain DOM rendering of the color panel: a title, one color input per
 * setting and the contrast notice when the pair is hard to read.
 */
export function createDomColorPanelView(container: HTMLElement): ColorPanelView {
  const doc = container.ownerDocument;

  const panel = doc.createElement('div');
  panel.className = 'color-panel';
  container.appendChild(panel);

  const render = ({ title, initialOpen, settings, contrast }: ColorPanelViewProps) => {
    panel.replaceChildren();
    panel.classList.toggle('is-opened', initialOpen);

    const heading = doc.createElement('h2');
    heading.className = 'color-panel__title';
    heading.textContent = title;
    panel.appendChild(heading);

    settings?.settings.forEach((setting, index) => {
      const label = doc.createElement('label');
      label.className = 'color-panel__setting';
      label.textContent = setting.label;

      const input = doc.createElement('input');
      input.type = 'color';
      input.name = `color-setting-${index}`;
      if (setting.colorValue) input.value = setting.colorValue;
      input.addEventListener('input', () => setting.onColorChange?.(input.value));

      label.appendChild(input);
      panel.appendChild(label);
    });

    if (contrast?.warning) {
      const notice = doc.createElement('div');
      notice.className = 'color-panel__contrast-warning';
      notice.setAttribute('role', 'alert');
      notice.textContent = contrast.warning;
      panel.appendChild(notice);
    }
  };

  return {
    container: panel,
    render,
    destroy() {
      panel.remove();
    }
  };
}

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { ColorPanel, type ColorPanelOptions } from '../../src/panel/ColorPanel.js';
import type { ColorGradientSettings } from '../../src/panel/settings.js';
import { createBlockNodeResolver } from '../../src/detection/blockNode.js';
import { BRIGHTER_BACKGROUND_WARNING } from '../../src/validators/ContrastChecker.js';
import { createStyleTable, flushMutations } from '../helpers/styles.js';

describe('ColorPanel', () => {
  let canvas: HTMLDivElement;
  let first: HTMLParagraphElement;
  let second: HTMLParagraphElement;
  let table: ReturnType<typeof createStyleTable>;
  let resolveNode: Mock<[string], HTMLElement | null>;
  let view: { render: Mock; destroy: Mock; container?: Element };
  let panel: ColorPanel;

  const settings: ColorGradientSettings = {
    disableCustomColors: true,
    settings: [{ label: 'Text color', colorValue: '#000000' }]
  };

  const createPanel = (options: Partial<ColorPanelOptions> = {}) => {
    panel = new ColorPanel({
      clientId: 'first',
      settings,
      resolveNode,
      getComputedStyle: table.getComputedStyle,
      root: canvas,
      view,
      ...options
    });
    return panel;
  };

  beforeEach(() => {
    table = createStyleTable();

    canvas = document.createElement('div');
    first = document.createElement('p');
    first.id = 'block-first';
    second = document.createElement('p');
    second.id = 'block-second';
    canvas.append(first, second);
    document.body.appendChild(canvas);

    table.set(canvas, { backgroundColor: 'rgb(255, 255, 255)' });
    table.set(first, { color: 'rgb(0, 0, 0)' });
    table.set(second, { color: 'rgb(119, 119, 119)' });

    resolveNode = vi.fn((id: string) => document.getElementById(`block-${id}`));
    view = { render: vi.fn(), destroy: vi.fn() };
  });

  afterEach(() => {
    panel?.destroy();
    canvas.remove();
  });

  it('should detect and render on attach', () => {
    createPanel().attach();

    expect(resolveNode).toHaveBeenCalledTimes(1);
    expect(panel.getDetectedColors()).toEqual({
      textColor: 'rgb(0, 0, 0)',
      backgroundColor: 'rgb(255, 255, 255)'
    });
    expect(view.render).toHaveBeenCalledTimes(1);

    const props = view.render.mock.calls[0][0];
    expect(props.title).toBe('Color settings');
    expect(props.initialOpen).toBe(false);
    expect(props.settings).toBe(settings);
    expect(props.contrast.readable).toBe(true);
    expect(props.contrast.warning).toBeNull();
  });

  it('should neither resolve nor check when contrast checking is off', () => {
    createPanel({ enableContrastChecking: false }).attach();

    expect(resolveNode).not.toHaveBeenCalled();
    expect(panel.getDetectedColors()).toBeNull();
    expect(panel.getContrast()).toBeNull();
    expect(view.render).toHaveBeenCalledWith(expect.objectContaining({ contrast: null, settings }));
  });

  it('should render without contrast when the block is not mounted', () => {
    createPanel({ clientId: 'unmounted' }).attach();

    expect(resolveNode).toHaveBeenCalledWith('unmounted');
    expect(panel.getDetectedColors()).toBeNull();
    expect(view.render).toHaveBeenLastCalledWith(expect.objectContaining({ contrast: null }));
  });

  it('should skip resolution without a selected block', () => {
    createPanel({ clientId: null }).attach();

    expect(resolveNode).not.toHaveBeenCalled();
    expect(panel.getContrast()).toBeNull();
  });

  describe('Re-detection', () => {
    it('should re-detect when the selection moves to another block', () => {
      createPanel().attach();

      panel.update({ clientId: 'second' });

      expect(resolveNode).toHaveBeenCalledTimes(2);
      expect(resolveNode).toHaveBeenLastCalledWith('second');
      expect(panel.getDetectedColors()?.textColor).toBe('rgb(119, 119, 119)');
      expect(panel.getContrast()?.warning).toBe(BRIGHTER_BACKGROUND_WARNING);
    });

    it('should only re-render when unrelated options change', () => {
      createPanel().attach();
      const nextSettings: ColorGradientSettings = { settings: [] };

      panel.update({ settings: nextSettings, title: 'Colors' });

      expect(resolveNode).toHaveBeenCalledTimes(1);
      expect(view.render).toHaveBeenCalledTimes(2);
      expect(view.render).toHaveBeenLastCalledWith(
        expect.objectContaining({ settings: nextSettings, title: 'Colors' })
      );
    });

    it('should re-check contrast with new checker options without re-detecting', () => {
      createPanel({ clientId: 'second' }).attach();
      expect(panel.getContrast()?.readable).toBe(false);

      panel.update({ contrast: { isLargeText: true } });

      expect(resolveNode).toHaveBeenCalledTimes(1);
      expect(panel.getContrast()?.readable).toBe(true);
    });

    it('should re-detect when contrast checking is switched back on', () => {
      createPanel({ enableContrastChecking: false }).attach();

      panel.update({ enableContrastChecking: true });

      expect(resolveNode).toHaveBeenCalledTimes(1);
      expect(panel.getContrast()?.readable).toBe(true);
    });

    it('should re-detect on refresh', () => {
      createPanel().attach();
      table.set(first, { color: 'rgb(119, 119, 119)' });

      panel.refresh();

      expect(resolveNode).toHaveBeenCalledTimes(2);
      expect(panel.getDetectedColors()?.textColor).toBe('rgb(119, 119, 119)');
    });

    it('should re-detect after a style change under the root', async () => {
      createPanel().attach();
      table.set(canvas, { backgroundColor: 'rgb(20, 20, 20)' });

      canvas.setAttribute('style', 'background-color: rgb(20, 20, 20)');
      await flushMutations();

      expect(resolveNode).toHaveBeenCalledTimes(2);
      expect(panel.getDetectedColors()?.backgroundColor).toBe('rgb(20, 20, 20)');
    });

    it('should ignore mutations inside the view container', async () => {
      const container = document.createElement('div');
      canvas.appendChild(container);
      view.container = container;
      createPanel().attach();

      container.setAttribute('class', 'is-opened');
      await flushMutations();

      expect(resolveNode).toHaveBeenCalledTimes(1);
    });

    it('should coalesce mutations when debounced', async () => {
      createPanel({ debounce: 20 }).attach();

      canvas.setAttribute('class', 'a');
      await flushMutations();
      canvas.setAttribute('class', 'b');
      await flushMutations();
      expect(resolveNode).toHaveBeenCalledTimes(1);

      await new Promise(resolve => setTimeout(resolve, 50));
      expect(resolveNode).toHaveBeenCalledTimes(2);
    });

    it('should not loop when a view without a container renders into the root', async () => {
      view = {
        render: vi.fn(() => {
          canvas.appendChild(document.createElement('span'));
        }),
        destroy: vi.fn()
      };
      createPanel().attach();
      await flushMutations();

      expect(resolveNode).toHaveBeenCalledTimes(1);

      canvas.setAttribute('class', 'is-dark');
      await flushMutations();
      await flushMutations();

      expect(resolveNode).toHaveBeenCalledTimes(2);
      expect(view.render).toHaveBeenCalledTimes(2);
    });

    it('should follow a block rendered inside an iframe canvas', async () => {
      const frame = document.createElement('iframe');
      document.body.appendChild(frame);
      const frameDoc = frame.contentDocument;
      if (!frameDoc) throw new Error('iframe has no document');

      const framed = frameDoc.createElement('p');
      framed.id = 'block-framed';
      frameDoc.body.appendChild(framed);
      table.set(frameDoc.body, { backgroundColor: 'rgb(255, 255, 255)' });

      const resolveFramed = vi.fn(createBlockNodeResolver(frameDoc));
      createPanel({ clientId: 'framed', resolveNode: resolveFramed, root: undefined }).attach();
      expect(panel.getDetectedColors()?.backgroundColor).toBe('rgb(255, 255, 255)');

      table.set(frameDoc.body, { backgroundColor: 'rgb(10, 10, 10)' });
      framed.setAttribute('style', 'font-weight: bold');
      await flushMutations();

      expect(resolveFramed).toHaveBeenCalledTimes(2);
      expect(panel.getDetectedColors()?.backgroundColor).toBe('rgb(10, 10, 10)');
      frame.remove();
    });

    it('should not observe when mutation observing is off', async () => {
      createPanel({ observeMutations: false }).attach();

      canvas.setAttribute('class', 'a');
      await flushMutations();

      expect(resolveNode).toHaveBeenCalledTimes(1);
    });
  });

  it('should emit detection and contrast events', () => {
    const onDetect = vi.fn();
    const onContrast = vi.fn();
    createPanel();
    panel.on('detect', onDetect);
    panel.on('contrast', onContrast);

    panel.attach();

    expect(onDetect).toHaveBeenCalledWith({
      textColor: 'rgb(0, 0, 0)',
      backgroundColor: 'rgb(255, 255, 255)'
    });
    expect(onContrast).toHaveBeenCalledWith(expect.objectContaining({ readable: true }));
  });

  it('should log a missing block in debug mode', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createPanel({ clientId: 'unmounted', debug: true }).attach();

    expect(debug).toHaveBeenCalledWith('[ColorPanel] No rendered node for block', 'unmounted');
    debug.mockRestore();
  });

  it('should stop observing and release the view on destroy', async () => {
    createPanel().attach();

    panel.destroy();
    canvas.setAttribute('class', 'after');
    await flushMutations();

    expect(view.destroy).toHaveBeenCalledTimes(1);
    expect(resolveNode).toHaveBeenCalledTimes(1);
  });
});

import { describe, expect, it } from 'vitest';
import { parsePanelConfig, type FocusStatus, type OutputDescriptor } from '@edgebar/shared';

import { DEFAULT_DARK_BACKGROUND } from '../container/themeColors';
import { HeadlessCompositor } from '../headless';
import { PanelInstance } from './panelInstance';
import { smootherstep, VisibilityController } from './visibilityController';

const OUTPUT: OutputDescriptor = { name: 'DP-1', width: 1920, height: 1080 };
const FOCUSED: FocusStatus = { kind: 'focused' };
const AWAY: FocusStatus = { kind: 'last_focused', at: 0 };

function createAutohidePanel() {
  const compositor = new HeadlessCompositor([OUTPUT]);
  const config = parsePanelConfig({
    name: 'bar',
    autohide: { waitTime: 1000, transitionTime: 200, handleSize: 4 },
  });
  const surface = compositor.createSurface({
    namespace: config.name,
    output: OUTPUT.name,
    anchor: config.anchor,
    layer: config.layer,
    keyboardInteractivity: config.keyboardInteractivity,
  });
  const instance = new PanelInstance({
    config,
    output: OUTPUT,
    surface,
    backgroundColor: DEFAULT_DARK_BACKGROUND,
    now: 0,
  });
  instance.state.pendingDimensions = null;
  instance.state.dimensions = { width: 1920, height: 40 };
  instance.visibility = { kind: 'visible' };
  return { instance, surface, compositor };
}

describe('smootherstep', () => {
  it('eases in and out', () => {
    expect(smootherstep(0)).toBe(0);
    expect(smootherstep(0.25)).toBe(0.15625);
    expect(smootherstep(0.5)).toBe(0.5);
    expect(smootherstep(1)).toBe(1);
  });

  it('clamps its input', () => {
    expect(smootherstep(-1)).toBe(0);
    expect(smootherstep(3)).toBe(1);
  });
});

describe('VisibilityController', () => {
  const controller = new VisibilityController();

  it('keeps a panel without autohide visible', () => {
    const { instance } = createAutohidePanel();
    instance.config = parsePanelConfig({ name: 'bar' });
    instance.visibility = { kind: 'hidden' };
    controller.update(instance, AWAY, 5000);
    expect(instance.visibility).toEqual({ kind: 'visible' });
  });

  it('waits before hiding', () => {
    const { instance } = createAutohidePanel();
    controller.update(instance, AWAY, 999);
    expect(instance.visibility.kind).toBe('visible');
    controller.update(instance, AWAY, 1000);
    expect(instance.visibility).toEqual({
      kind: 'transition_to_hidden',
      since: 1000,
      elapsed: 0,
      prevMargin: 0,
    });
  });

  it('slides the panel off its edge', () => {
    const { instance, surface } = createAutohidePanel();
    controller.update(instance, AWAY, 1000);

    controller.update(instance, AWAY, 1100);
    expect(instance.state.revealMargin).toBe(-18);
    expect(surface.margins).toEqual({ top: -18, right: 4, bottom: 0, left: 4 });
    expect(surface.exclusiveZone).toBe(58);

    controller.update(instance, AWAY, 1200);
    expect(instance.visibility).toEqual({ kind: 'hidden' });
    expect(surface.margins?.top).toBe(-36);
    expect(surface.exclusiveZone).toBe(44);
  });

  it('eases the first part of the slide', () => {
    const { instance } = createAutohidePanel();
    controller.update(instance, AWAY, 1000);
    controller.update(instance, AWAY, 1050);
    expect(instance.state.revealMargin).toBe(-5);
  });

  it('skips the commit when the margin did not move', () => {
    const { instance, surface } = createAutohidePanel();
    controller.update(instance, AWAY, 1000);
    controller.update(instance, AWAY, 1001);
    expect(surface.commits).toBe(0);
  });

  it('reveals a hidden panel on focus', () => {
    const { instance, surface } = createAutohidePanel();
    instance.visibility = { kind: 'hidden' };

    controller.update(instance, FOCUSED, 3000);
    expect(instance.visibility).toEqual({
      kind: 'transition_to_visible',
      since: 3000,
      elapsed: 0,
      prevMargin: -36,
    });

    controller.update(instance, FOCUSED, 3100);
    expect(instance.state.revealMargin).toBe(-18);

    controller.update(instance, FOCUSED, 3200);
    expect(instance.visibility).toEqual({ kind: 'visible' });
    expect(surface.margins?.top).toBe(0);
    expect(surface.exclusiveZone).toBe(40);
  });

  it('reverses a hide from where it was', () => {
    const { instance } = createAutohidePanel();
    controller.update(instance, AWAY, 1000);
    controller.update(instance, FOCUSED, 1080);
    expect(instance.visibility).toEqual({
      kind: 'transition_to_visible',
      since: 1080,
      elapsed: 120,
      prevMargin: 0,
    });

    controller.update(instance, FOCUSED, 1130);
    expect(instance.state.revealMargin).toBe(-2);

    controller.update(instance, FOCUSED, 1160);
    expect(instance.visibility).toEqual({ kind: 'visible' });
  });

  it('reverses a reveal from where it was', () => {
    const { instance, surface, compositor } = createAutohidePanel();
    instance.visibility = { kind: 'hidden' };
    controller.update(instance, FOCUSED, 3000);
    instance.toggleOverflow(compositor, null, { x: 0, y: 0, width: 10, height: 10 });
    const [popup] = compositor.getPopups();

    controller.update(instance, AWAY, 3080);
    expect(instance.visibility).toEqual({
      kind: 'transition_to_hidden',
      since: 3080,
      elapsed: 120,
      prevMargin: -36,
    });
    expect(popup?.closed).toBe(true);
    expect(instance.popups).toEqual([]);

    controller.update(instance, AWAY, 3130);
    expect(instance.state.revealMargin).toBe(-33);

    controller.update(instance, AWAY, 3160);
    expect(instance.visibility).toEqual({ kind: 'hidden' });
    expect(surface.margins?.top).toBe(-36);
  });

  it('moves the margin one way during a slide', () => {
    const { instance } = createAutohidePanel();
    controller.update(instance, AWAY, 1000);
    const margins = [1025, 1050, 1100, 1150].map((now) => {
      controller.update(instance, AWAY, now);
      return instance.state.revealMargin;
    });
    expect(margins).toEqual([-1, -5, -18, -30]);
  });

  it('closes popups while hiding', () => {
    const { instance, compositor } = createAutohidePanel();
    instance.toggleOverflow(compositor, null, { x: 0, y: 0, width: 10, height: 10 });
    const [popup] = compositor.getPopups();

    controller.update(instance, AWAY, 1000);
    controller.update(instance, AWAY, 1100);
    expect(popup?.closed).toBe(true);
    expect(instance.popups).toEqual([]);
  });
});

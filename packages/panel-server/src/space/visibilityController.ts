import type { FocusStatus } from '@edgebar/shared';

import { withPrefix, type Logger } from '../logger';
import type { PanelInstance } from './panelInstance';
import { marginsForAnchor } from './surface';

/**
 * `3t² − 2t³` with `t` clamped to `[0, 1]`.
 */
export function smootherstep(t: number): number {
  const x = Math.min(Math.max(t, 0), 1);
  return x * x * (3 - 2 * x);
}

export interface VisibilityControllerOptions {
  logger?: Logger;
}

/**
 * Autohide state machine. Slides the panel off its edge through the anchored-edge margin,
 * leaving `handleSize` pixels on screen.
 */
export class VisibilityController {
  private readonly logger: Logger;

  constructor(options: VisibilityControllerOptions = {}) {
    this.logger = withPrefix('visibility', options.logger);
  }

  update(instance: PanelInstance, focus: FocusStatus, now: number): void {
    const autohide = instance.config.autohide;
    if (!autohide) {
      instance.visibility = { kind: 'visible' };
      return;
    }

    const { surface } = instance.requireSurface();
    const config = instance.config;
    const handle = autohide.handleSize;
    const total = autohide.transitionTime;
    const panelSize = instance.thicknessOf(instance.state.dimensions) + instance.gap();
    const hiddenMargin = handle - panelSize;

    const applyMargin = (offset: number, zone: number): void => {
      if (config.exclusiveZone) {
        surface.setExclusiveZone(zone);
      }
      surface.setMargin(marginsForAnchor(config.anchor, config.margin, offset));
      surface.commit();
      instance.state.revealMargin = offset;
    };

    const state = instance.visibility;
    switch (state.kind) {
      case 'hidden': {
        if (focus.kind === 'focused') {
          this.logger.debug?.(`${instance.key} revealing`);
          instance.visibility = {
            kind: 'transition_to_visible',
            since: now,
            elapsed: 0,
            prevMargin: hiddenMargin,
          };
        }
        return;
      }
      case 'visible': {
        if (focus.kind === 'last_focused' && now - focus.at >= autohide.waitTime) {
          this.logger.debug?.(`${instance.key} hiding`);
          instance.visibility = {
            kind: 'transition_to_hidden',
            since: now,
            elapsed: 0,
            prevMargin: 0,
          };
        }
        return;
      }
      case 'transition_to_hidden': {
        const delta = now - state.since;
        if (delta < 0) {
          return;
        }
        const elapsed = state.elapsed + delta;
        if (focus.kind === 'focused') {
          instance.visibility = {
            kind: 'transition_to_visible',
            since: now,
            elapsed: Math.max(total - elapsed, 0),
            prevMargin: state.prevMargin,
          };
          return;
        }
        if (elapsed >= total) {
          applyMargin(hiddenMargin, panelSize + handle);
          instance.visibility = { kind: 'hidden' };
          return;
        }
        const current = Math.trunc(smootherstep(elapsed / total) * hiddenMargin);
        if (current !== state.prevMargin) {
          applyMargin(current, panelSize - current);
        }
        instance.closePopups();
        instance.visibility = {
          kind: 'transition_to_hidden',
          since: now,
          elapsed,
          prevMargin: current,
        };
        return;
      }
      case 'transition_to_visible': {
        const delta = now - state.since;
        if (delta < 0) {
          return;
        }
        const elapsed = state.elapsed + delta;
        if (focus.kind === 'last_focused') {
          instance.closePopups();
          instance.visibility = {
            kind: 'transition_to_hidden',
            since: now,
            elapsed: Math.max(total - elapsed, 0),
            prevMargin: state.prevMargin,
          };
          return;
        }
        if (elapsed >= total) {
          applyMargin(0, panelSize);
          instance.visibility = { kind: 'visible' };
          return;
        }
        const current = Math.trunc((1 - smootherstep(elapsed / total)) * hiddenMargin);
        if (current !== state.prevMargin) {
          applyMargin(current, panelSize - current);
        }
        instance.visibility = {
          kind: 'transition_to_visible',
          since: now,
          elapsed,
          prevMargin: current,
        };
        return;
      }
    }
  }
}

import type { MinimizeTarget } from '@edgebar/shared';

import { withPrefix, type Logger } from '../logger';
import { resolveFocus, type FocusTracker } from './focus';
import type { InputRegionManager } from './inputRegion';
import type { LayoutEngine, LayoutOutcome } from './layoutEngine';
import type { PanelInstance } from './panelInstance';
import type { ResizeNegotiator } from './resizeNegotiator';
import type { PopupHost } from './surface';
import type { VisibilityController } from './visibilityController';

export interface PanelTickContext {
  layoutEngine: LayoutEngine;
  resizeNegotiator: ResizeNegotiator;
  inputRegions: InputRegionManager;
  visibility: VisibilityController;
  focus: FocusTracker;
  popupHost?: PopupHost;
  onMinimizeTarget?: (target: MinimizeTarget) => void;
  onLayout?: (instance: PanelInstance, outcome: LayoutOutcome) => void;
  logger?: Logger;
}

export type PanelTickResult =
  | 'awaiting_configure'
  | 'flushed'
  | 'resize_pending'
  | 'laid_out'
  | 'idle';

function drainEvents(instance: PanelInstance, context: PanelTickContext, logger: Logger): void {
  for (const event of instance.drainEvents()) {
    switch (event.kind) {
      case 'configure':
        context.resizeNegotiator.acknowledge(instance, {
          width: event.width,
          height: event.height,
        });
        break;
      case 'toggle_overflow':
        if (!context.popupHost) {
          logger.warn(`${instance.key} cannot open overflow popup without a popup host`);
          break;
        }
        instance.toggleOverflow(context.popupHost, event.windowId, event.anchorRect);
        break;
      case 'popup_done':
        instance.removePopup(event.surfaceId);
        break;
      case 'close_popups':
        instance.closePopups();
        break;
    }
  }
}

/**
 * One frame for one instance. Stages run in order: queued events, a pending resize flush,
 * layout with resize negotiation and input region, then visibility. Waiting on a configure
 * or requesting a resize ends the frame early.
 */
export function tickPanel(
  instance: PanelInstance,
  now: number,
  context: PanelTickContext,
): PanelTickResult {
  const logger = withPrefix('tick', context.logger);
  drainEvents(instance, context, logger);

  const runVisibility = (): void => {
    const focus = resolveFocus(context.focus.signals(), instance.surfaceIds(), instance.createdAt);
    context.visibility.update(instance, focus, now);
  };

  if (instance.state.awaitingConfigure) {
    runVisibility();
    return 'awaiting_configure';
  }

  if (context.resizeNegotiator.flush(instance)) {
    return 'flushed';
  }

  let result: PanelTickResult = 'idle';
  if (instance.isDirty) {
    const outcome = context.layoutEngine.layout(instance);
    context.onLayout?.(instance, outcome);
    if (outcome.kind === 'resize') {
      if (context.resizeNegotiator.request(instance, outcome.desired) === 'pending') {
        return 'resize_pending';
      }
    } else {
      instance.isDirty = false;
      for (const target of outcome.minimizeTargets) {
        context.onMinimizeTarget?.(target);
      }
      context.inputRegions.update(instance);
      result = 'laid_out';
    }
  }

  runVisibility();
  return result;
}

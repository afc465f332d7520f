import { isHorizontal, sizeEquals, type Size } from '@edgebar/shared';

import { withPrefix, type Logger } from '../logger';
import type { PanelInstance } from './panelInstance';
import { marginsForAnchor } from './surface';

export type ResizeOutcome = 'accepted' | 'pending';

export interface ResizeNegotiatorOptions {
  logger?: Logger;
}

/**
 * Size handshake with the compositor. A size is requested, sent once, and only trusted
 * after the compositor answers with a configure.
 */
export class ResizeNegotiator {
  private readonly logger: Logger;

  constructor(options: ResizeNegotiatorOptions = {}) {
    this.logger = withPrefix('resize', options.logger);
  }

  /**
   * `desired` is the full surface size, anchor gap included.
   */
  request(instance: PanelInstance, desired: Size): ResizeOutcome {
    const { pendingDimensions, awaitingConfigure } = instance.state;
    if (
      pendingDimensions === null &&
      awaitingConfigure === null &&
      sizeEquals(desired, instance.surfaceSize())
    ) {
      return 'accepted';
    }

    instance.isDirty = true;
    if (
      (pendingDimensions !== null && sizeEquals(pendingDimensions, desired)) ||
      (awaitingConfigure !== null && sizeEquals(awaitingConfigure, desired))
    ) {
      return 'pending';
    }

    instance.state.pendingDimensions = { ...desired };
    this.logger.debug?.(`${instance.key} requesting ${desired.width}x${desired.height}`);
    return 'pending';
  }

  /**
   * Sends the pending size, leaving the compositor to pick the length. Returns false when
   * nothing was pending.
   */
  flush(instance: PanelInstance): boolean {
    const pending = instance.state.pendingDimensions;
    if (!pending) {
      return false;
    }
    const { surface } = instance.requireSurface();
    if (isHorizontal(instance.config)) {
      surface.setSize(0, pending.height);
    } else {
      surface.setSize(pending.width, 0);
    }
    surface.commit();
    instance.state.awaitingConfigure = pending;
    instance.state.pendingDimensions = null;
    return true;
  }

  acknowledge(instance: PanelInstance, proposed: Size): Size {
    const { surface } = instance.requireSurface();
    const config = instance.config;
    const horizontal = isHorizontal(config);
    const fallback = instance.state.awaitingConfigure ?? instance.surfaceSize();

    let width = fallback.width;
    let height = fallback.height;
    if (proposed.width !== 0) {
      width = proposed.width;
      if (horizontal) {
        instance.state.suggestedLength = proposed.width;
      }
    }
    if (proposed.height !== 0) {
      height = proposed.height;
      if (!horizontal) {
        instance.state.suggestedLength = proposed.height;
      }
    }
    width = Math.max(width, 1);
    height = Math.max(height, 1);

    const gap = instance.gap();
    const withoutGap: Size = horizontal
      ? { width, height: height - gap }
      : { width: width - gap, height };
    const dimensions = instance.constrain(withoutGap);
    instance.state.dimensions = dimensions;
    const requested = instance.state.awaitingConfigure;
    if (requested !== null) {
      const configured = instance.surfaceSize();
      instance.state.answeredRequest = sizeEquals(requested, configured)
        ? null
        : { requested: { ...requested }, configured };
    }

    const thickness = instance.thicknessOf(dimensions) + gap;
    const autohide = config.autohide;
    if (autohide) {
      const hideMargin = autohide.handleSize - thickness;
      instance.state.hideMargin = hideMargin;
      if (config.exclusiveZone) {
        surface.setExclusiveZone(thickness + autohide.handleSize);
      }
      if (instance.visibility.kind === 'hidden') {
        instance.state.revealMargin = hideMargin;
        surface.setMargin(marginsForAnchor(config.anchor, config.margin, hideMargin));
      } else if (instance.visibility.kind === 'visible') {
        instance.state.revealMargin = 0;
        surface.setMargin(marginsForAnchor(config.anchor, config.margin, 0));
      }
    } else {
      instance.state.hideMargin = 0;
      instance.state.revealMargin = 0;
      if (config.exclusiveZone) {
        surface.setExclusiveZone(thickness);
      }
      if (config.margin > 0) {
        surface.setMargin(marginsForAnchor(config.anchor, config.margin, 0));
      }
    }

    instance.state.pendingDimensions = null;
    instance.state.awaitingConfigure = null;
    instance.isDirty = true;
    instance.panelChanged = true;
    surface.commit();
    this.logger.info(
      `${instance.key} configured ${dimensions.width}x${dimensions.height} (gap ${gap})`,
    );
    return dimensions;
  }
}

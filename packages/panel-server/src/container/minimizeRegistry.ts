import { rectangleEquals, type MinimizeTarget } from '@edgebar/shared';

import { withPrefix, type Logger } from '../logger';

/**
 * Receives the rectangle toplevels on an output should minimize into.
 */
export interface MinimizeRectangleSink {
  setRectangle(target: MinimizeTarget): void;
}

export interface MinimizeRegistryOptions {
  sink?: MinimizeRectangleSink;
  isSurfaceAlive: (surfaceId: string) => boolean;
  logger?: Logger;
}

/**
 * One minimize target per output. A report replaces the current one when it is the first
 * for the output, moves the current target, outranks it, or the current surface is gone.
 */
export class MinimizeRegistry {
  private readonly targets = new Map<string, MinimizeTarget>();
  private readonly sink: MinimizeRectangleSink | undefined;
  private readonly isSurfaceAlive: (surfaceId: string) => boolean;
  private readonly logger: Logger;

  constructor(options: MinimizeRegistryOptions) {
    this.sink = options.sink;
    this.isSurfaceAlive = options.isSurfaceAlive;
    this.logger = withPrefix('minimize', options.logger);
  }

  report(target: MinimizeTarget): boolean {
    const current = this.targets.get(target.output);
    const replace =
      !current ||
      (current.surfaceId === target.surfaceId && !rectangleEquals(current.rect, target.rect)) ||
      current.priority < target.priority ||
      !this.isSurfaceAlive(current.surfaceId);

    if (!replace) {
      return false;
    }

    this.targets.set(target.output, { ...target, rect: { ...target.rect } });
    this.logger.debug?.(
      `${target.output} minimizes to ${target.rect.width}x${target.rect.height}+${target.rect.x}+${target.rect.y}`,
    );
    this.sink?.setRectangle(target);
    return true;
  }

  get(output: string): MinimizeTarget | undefined {
    return this.targets.get(output);
  }

  forgetOutput(output: string): void {
    this.targets.delete(output);
  }
}

import { z } from 'zod';

import type { Rectangle } from './geometry';

export const OutputDescriptorSchema = z.object({
  name: z.string().min(1),
  /** Current mode dimensions in logical pixels. */
  width: z.number().int().min(0),
  height: z.number().int().min(0),
  scale: z.number().positive().optional(),
});

export type OutputDescriptor = z.infer<typeof OutputDescriptorSchema>;

/**
 * Compositor proposal for a layer surface. A zero field lets the client pick that axis.
 */
export interface ConfigureEvent {
  surfaceId: string;
  width: number;
  height: number;
}

export type FocusStatus = { kind: 'focused' } | { kind: 'last_focused'; at: number };

export interface FocusSignal {
  surfaceId: string;
  status: FocusStatus;
}

export interface MinimizeTarget {
  output: string;
  rect: Rectangle;
  /** Docks report priority 1, bars 0. */
  priority: number;
  surfaceId: string;
}

export interface Margins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

import { z } from 'zod';

import type { Range, Size } from './geometry';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

export const PanelAnchorSchema = z.enum(['left', 'right', 'top', 'bottom']);
export type PanelAnchor = z.infer<typeof PanelAnchorSchema>;

export const PanelSizeSchema = z.enum(['XS', 'S', 'M', 'L', 'XL']);
export type PanelSize = z.infer<typeof PanelSizeSchema>;

export const PanelLayerSchema = z.enum(['background', 'bottom', 'top', 'overlay']);
export type PanelLayer = z.infer<typeof PanelLayerSchema>;

export const KeyboardInteractivitySchema = z.enum(['none', 'exclusive', 'on_demand']);
export type KeyboardInteractivity = z.infer<typeof KeyboardInteractivitySchema>;

const ColorChannelSchema = z.number().min(0).max(1);

export const PanelBackgroundSchema = z.union([
  z.enum(['theme_default', 'dark', 'light']),
  z
    .object({
      color: z.tuple([ColorChannelSchema, ColorChannelSchema, ColorChannelSchema]),
    })
    .strict(),
]);
export type PanelBackground = z.infer<typeof PanelBackgroundSchema>;

export const AutoHideSchema = z
  .object({
    /** Milliseconds without pointer focus before hiding. */
    waitTime: z.number().int().min(0).default(1000),
    /** Milliseconds a hide or show transition lasts. */
    transitionTime: z.number().int().min(1).default(200),
    /** Pixels of the panel left on screen while hidden. */
    handleSize: z.number().int().min(1).default(4),
  })
  .strict();
export type AutoHide = z.infer<typeof AutoHideSchema>;

export const PanelOutputSchema = z.union([
  z.literal('all'),
  z.literal('active'),
  z.object({ name: NonEmptyTrimmedStringSchema }).strict(),
]);
export type PanelOutput = z.infer<typeof PanelOutputSchema>;

export const PluginWingsSchema = z
  .object({
    left: z.array(NonEmptyTrimmedStringSchema),
    right: z.array(NonEmptyTrimmedStringSchema),
  })
  .strict();
export type PluginWings = z.infer<typeof PluginWingsSchema>;

const THICKNESS_START = 8;

const THICKNESS_END: Record<PanelSize, number> = {
  XS: 61,
  S: 81,
  M: 101,
  L: 121,
  XL: 141,
};

const APPLET_ICON_SIZE: Record<PanelSize, number> = {
  XS: 18,
  S: 24,
  M: 36,
  L: 48,
  XL: 64,
};

const PanelConfigObjectSchema = z
  .object({
    /** Profile name, unique within a container config. */
    name: NonEmptyTrimmedStringSchema,
    anchor: PanelAnchorSchema.default('top'),
    /** Keep `margin` pixels between the panel and the anchored edge. */
    anchorGap: z.boolean().default(false),
    layer: PanelLayerSchema.default('top'),
    keyboardInteractivity: KeyboardInteractivitySchema.default('none'),
    size: PanelSizeSchema.default('M'),
    output: PanelOutputSchema.default('all'),
    background: PanelBackgroundSchema.default('theme_default'),
    pluginsWings: PluginWingsSchema.nullable().default(null),
    pluginsCenter: z.array(NonEmptyTrimmedStringSchema).nullable().default(null),
    expandToEdges: z.boolean().default(true),
    padding: z.number().int().min(0).default(4),
    spacing: z.number().int().min(0).default(4),
    borderRadius: z.number().int().min(0).default(8),
    exclusiveZone: z.boolean().default(true),
    autohide: AutoHideSchema.nullable().default(null),
    margin: z.number().int().min(0).max(65_535).default(4),
    opacity: z.number().min(0).max(1).default(0.8),
  })
  .strict();

export const PanelConfigSchema = PanelConfigObjectSchema.superRefine((value, ctx) => {
  if (2 * value.padding >= THICKNESS_END[value.size]) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['padding'],
      message: `padding ${value.padding} is too large for size ${value.size}`,
    });
  }
});

export type PanelConfig = z.output<typeof PanelConfigSchema>;
export type PanelConfigInput = z.input<typeof PanelConfigSchema>;

export const PanelContainerConfigSchema = z
  .object({
    panels: z.array(PanelConfigSchema).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.panels.forEach((panel, index) => {
      if (seen.has(panel.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['panels', index, 'name'],
          message: `duplicate panel name "${panel.name}"`,
        });
      }
      seen.add(panel.name);
    });
  });

export type PanelContainerConfig = z.output<typeof PanelContainerConfigSchema>;

export function parsePanelConfig(input: unknown): PanelConfig {
  return PanelConfigSchema.parse(input);
}

export function isHorizontal(config: Pick<PanelConfig, 'anchor'>): boolean {
  return config.anchor === 'top' || config.anchor === 'bottom';
}

export function oppositeAnchor(anchor: PanelAnchor): PanelAnchor {
  switch (anchor) {
    case 'top':
      return 'bottom';
    case 'bottom':
      return 'top';
    case 'left':
      return 'right';
    case 'right':
      return 'left';
  }
}

/**
 * Ordering score used when co-anchored panels are recreated. Higher priority panels are
 * created first and win contested edge space. Not used by layout.
 */
export function getPriority(config: PanelConfig): number {
  let priority = config.expandToEdges ? 1000 : 0;
  if (config.margin === 0) {
    priority += 200;
  }
  if (!config.anchorGap) {
    priority += 100;
  }
  if (config.name.toLowerCase().includes('panel')) {
    priority += 10;
  }
  return priority;
}

export function getEffectiveAnchorGap(config: PanelConfig): number {
  return config.anchorGap ? config.margin : 0;
}

export function getAppletIconSize(config: PanelConfig): number {
  return APPLET_ICON_SIZE[config.size];
}

/**
 * Thickness range of the size class with the padding on both sides removed.
 */
export function getThicknessRange(config: PanelConfig): Range {
  if (2 * config.padding >= THICKNESS_END[config.size]) {
    throw new Error(`padding ${config.padding} is too large for size ${config.size}`);
  }
  return { start: THICKNESS_START, end: THICKNESS_END[config.size] - 2 * config.padding };
}

/**
 * Width and height constraints for the panel surface. The lengthwise axis is pinned to
 * the suggested length, or to the output mode when the compositor has not suggested one.
 */
export function getDimensions(
  config: PanelConfig,
  outputDims: Size | null,
  suggestedLength: number | null,
): { width: Range; height: Range } {
  const thickness = getThicknessRange(config);
  const outputHeight = suggestedLength ?? outputDims?.height ?? 0;
  const outputWidth = suggestedLength ?? outputDims?.width ?? 0;

  if (isHorizontal(config)) {
    return { width: { start: outputWidth, end: outputWidth + 1 }, height: thickness };
  }
  return { width: thickness, height: { start: outputHeight, end: outputHeight + 1 } };
}

export function pluginsLeft(config: PanelConfig): string[] | null {
  if (config.expandToEdges && config.pluginsWings) {
    return [...config.pluginsWings.left];
  }
  return null;
}

export function pluginsRight(config: PanelConfig): string[] | null {
  if (config.expandToEdges && config.pluginsWings) {
    return [...config.pluginsWings.right];
  }
  return null;
}

/**
 * A dock has no wings: its left and right plugins are folded into the center list.
 */
export function pluginsCenter(config: PanelConfig): string[] | null {
  if (config.expandToEdges || !config.pluginsWings) {
    return config.pluginsCenter ? [...config.pluginsCenter] : null;
  }
  const { left, right } = config.pluginsWings;
  if (config.pluginsCenter) {
    return [...left, ...config.pluginsCenter, ...right];
  }
  return [...left, ...right];
}

export function outputTargets(output: PanelOutput, outputName: string): boolean {
  if (output === 'all') {
    return true;
  }
  if (output === 'active') {
    return false;
  }
  return output.name === outputName;
}

export function configsForOutput(
  container: PanelContainerConfig,
  outputName: string,
): PanelConfig[] {
  return container.panels.filter((panel) => outputTargets(panel.output, outputName));
}

export function outputsEqual(a: PanelOutput, b: PanelOutput): boolean {
  if (typeof a === 'string' || typeof b === 'string') {
    return a === b;
  }
  return a.name === b.name;
}

export function formatPanelOutput(output: PanelOutput): string {
  if (output === 'all') {
    return 'All';
  }
  if (output === 'active') {
    return 'Active';
  }
  return `Name(${output.name})`;
}

export function parsePanelOutput(value: string): PanelOutput {
  const trimmed = value.trim();
  if (trimmed === 'All') {
    return 'all';
  }
  if (trimmed === 'Active') {
    return 'active';
  }
  const match = /^Name\((.+)\)$/.exec(trimmed);
  if (match && match[1]) {
    return { name: match[1] };
  }
  throw new Error(`Failed to parse output "${value}"`);
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (a !== null && b !== null && typeof a === 'object' && typeof b === 'object') {
    const aEntries = Object.entries(a);
    const bEntries = new Map(Object.entries(b));
    if (aEntries.length !== bEntries.size) {
      return false;
    }
    return aEntries.every(
      ([key, value]) => bEntries.has(key) && valuesEqual(value, bEntries.get(key)),
    );
  }
  return false;
}

export function panelConfigsEqual(a: PanelConfig, b: PanelConfig): boolean {
  return valuesEqual(a, b);
}

export function backgroundsEqual(a: PanelBackground, b: PanelBackground): boolean {
  return valuesEqual(a, b);
}

export function pluginListsEqual(a: string[] | null, b: string[] | null): boolean {
  return valuesEqual(a, b);
}

export function pluginWingsEqual(a: PluginWings | null, b: PluginWings | null): boolean {
  return valuesEqual(a, b);
}

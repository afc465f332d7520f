import fs from 'node:fs';

import { z } from 'zod';
import type {
  Margins,
  MinimizeTarget,
  OutputDescriptor,
  PanelContainerConfig,
  Rectangle,
  Size,
} from '@edgebar/shared';
import {
  HeadlessCompositor,
  InstanceOrchestrator,
  PanelError,
  formatZodIssues,
  silentLogger,
  type Logger,
  type PanelRectSettings,
  type WindowPlacement,
} from '@edgebar/panel-server';

export const AppletSpecSchema = z.object({
  id: z.string().min(1).optional(),
  plugin: z.string().min(1),
  width: z.number().int().min(0),
  height: z.number().int().min(0),
  minimize: z.boolean().optional(),
});

export const AppletListSchema = z.array(AppletSpecSchema);

export type AppletSpec = z.infer<typeof AppletSpecSchema>;

export function loadAppletList(filePath: string): AppletSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Unable to read applet list ${filePath}: ${message}`);
  }
  const result = AppletListSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid applet list in ${filePath}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

export interface LayoutSimulationOptions {
  container: PanelContainerConfig;
  panelName: string;
  output: OutputDescriptor;
  applets: AppletSpec[];
  /** Upper bound on simulated frames before giving up. */
  maxFrames?: number;
  frameMs?: number;
  logger?: Logger;
}

export interface LayoutSimulationResult {
  panel: string;
  output: string;
  settled: boolean;
  frames: number;
  surfaceSize: Size | null;
  exclusiveZone: number | null;
  margins: Margins | null;
  actualSize: Size;
  containerLength: number;
  containerPosition: number;
  placements: WindowPlacement[];
  /** Applets whose plugin no region lists. */
  unplaced: string[];
  inputRegion: Rectangle[];
  panelRect: PanelRectSettings | null;
  minimizeTarget: MinimizeTarget | null;
}

/**
 * Runs one panel against an in-process compositor until its layout settles and reports
 * what the compositor was told.
 */
export function runLayoutSimulation(options: LayoutSimulationOptions): LayoutSimulationResult {
  const config = options.container.panels.find((panel) => panel.name === options.panelName);
  if (!config) {
    throw new PanelError('unknown_instance', `No panel named ${options.panelName}`);
  }
  const maxFrames = options.maxFrames ?? 32;
  const frameMs = options.frameMs ?? 16;

  let clock = 0;
  const compositor = new HeadlessCompositor([options.output]);
  const orchestrator = new InstanceOrchestrator({
    shell: compositor,
    popupHost: compositor,
    logger: options.logger ?? silentLogger,
    now: () => clock,
  });
  orchestrator.addOutput(options.output);
  orchestrator.apply({ ...config, output: { name: options.output.name } });

  const unplaced: string[] = [];
  options.applets.forEach((applet, index) => {
    const window = orchestrator.mapWindow(config.name, options.output.name, {
      id: applet.id ?? `${applet.plugin}-${index}`,
      pluginName: applet.plugin,
      size: { width: applet.width, height: applet.height },
      isMinimizeTarget: applet.minimize ?? false,
    });
    if (!window) {
      unplaced.push(applet.id ?? `${applet.plugin}-${index}`);
    }
  });

  let frames = 0;
  let laidOut = false;
  let settled = false;
  while (frames < maxFrames) {
    clock = frames * frameMs;
    frames += 1;
    const [report] = orchestrator.tick(clock);
    for (const event of compositor.takeConfigures()) {
      orchestrator.handleConfigure(event);
    }
    if (!report || report.result === 'failed') {
      break;
    }
    if (report.result === 'laid_out') {
      laidOut = true;
    } else if (report.result === 'idle' && laidOut) {
      settled = true;
      break;
    }
  }

  const instance = orchestrator.findInstance(config.name, options.output.name);
  const surface = instance?.surface ? compositor.getSurface(instance.surface.id) : undefined;
  const result: LayoutSimulationResult = {
    panel: config.name,
    output: options.output.name,
    settled,
    frames,
    surfaceSize: instance ? instance.surfaceSize() : null,
    exclusiveZone: surface?.exclusiveZone ?? null,
    margins: surface?.margins ?? null,
    actualSize: instance ? { ...instance.state.actualSize } : { width: 0, height: 0 },
    containerLength: instance?.state.containerLength ?? 0,
    containerPosition: instance?.state.containerPosition ?? 0,
    placements: instance ? [...instance.lastPlacements] : [],
    unplaced,
    inputRegion: surface?.inputRegion ?? [],
    panelRect: instance?.panelRect ?? null,
    minimizeTarget: orchestrator.getMinimizeTarget(options.output.name) ?? null,
  };
  orchestrator.destroyAll();
  return result;
}

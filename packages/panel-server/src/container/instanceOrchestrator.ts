import {
  backgroundsEqual,
  configsForOutput,
  getPriority,
  isHorizontal,
  oppositeAnchor,
  outputTargets,
  outputsEqual,
  panelConfigsEqual,
  pluginListsEqual,
  pluginWingsEqual,
  type ConfigureEvent,
  type FocusSignal,
  type MinimizeTarget,
  type OutputDescriptor,
  type PanelAnchor,
  type PanelConfig,
  type PanelContainerConfig,
  type Size,
} from '@edgebar/shared';

import { PanelError } from '../errors';
import { withPrefix, type Logger } from '../logger';
import type { AppletWindow, AppletWindowInput } from '../space/appletWindows';
import { FocusTracker, type FocusChannel } from '../space/focus';
import { InputRegionManager } from '../space/inputRegion';
import { LayoutEngine, type LayoutOutcome } from '../space/layoutEngine';
import {
  instanceKey,
  PanelInstance,
  type PanelInstanceEvent,
} from '../space/panelInstance';
import { tickPanel, type PanelTickContext, type PanelTickResult } from '../space/panelTick';
import { ResizeNegotiator } from '../space/resizeNegotiator';
import type { LayerShell, PopupHost } from '../space/surface';
import { VisibilityController } from '../space/visibilityController';
import { MinimizeRegistry, type MinimizeRectangleSink } from './minimizeRegistry';
import {
  DEFAULT_DARK_BACKGROUND,
  DEFAULT_LIGHT_BACKGROUND,
  deriveBackgroundColor,
  followsThemeColor,
  type Rgba,
  type ThemeColors,
} from './themeColors';

export type ApplyOutcome =
  | { kind: 'noop' }
  | { kind: 'updated'; instances: PanelInstance[] }
  | { kind: 'recreated'; created: PanelInstance[] };

export interface InstanceTickReport {
  key: string;
  result: PanelTickResult | 'failed';
}

export interface InstanceOrchestratorOptions {
  shell: LayerShell;
  popupHost?: PopupHost;
  minimizeSink?: MinimizeRectangleSink;
  isDark?: boolean;
  darkColor?: Rgba;
  lightColor?: Rgba;
  logger?: Logger;
  debugLayout?: boolean;
  /** Monotonic clock in milliseconds, used for instance creation times. */
  now?: () => number;
  onLayout?: (instance: PanelInstance, outcome: LayoutOutcome) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns every live panel instance, one per panel config and output, and turns config,
 * output and theme changes into in-place updates or ordered recreation.
 */
export class InstanceOrchestrator {
  readonly focus = new FocusTracker();
  private configs: PanelConfig[] = [];
  private outputs: OutputDescriptor[] = [];
  private instances: PanelInstance[] = [];
  private readonly theme: ThemeColors;
  private readonly shell: LayerShell;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly inputRegions = new InputRegionManager();
  private readonly minimize: MinimizeRegistry;
  private readonly context: PanelTickContext;

  constructor(options: InstanceOrchestratorOptions) {
    this.shell = options.shell;
    this.logger = withPrefix('orchestrator', options.logger);
    this.now = options.now ?? (() => performance.now());
    this.theme = {
      isDark: options.isDark ?? true,
      dark: options.darkColor ?? DEFAULT_DARK_BACKGROUND,
      light: options.lightColor ?? DEFAULT_LIGHT_BACKGROUND,
    };
    this.minimize = new MinimizeRegistry({
      sink: options.minimizeSink,
      isSurfaceAlive: (surfaceId) =>
        this.instances.some((instance) => instance.surface?.id === surfaceId),
      logger: options.logger,
    });
    this.context = {
      layoutEngine: new LayoutEngine({
        logger: options.logger,
        debug: options.debugLayout ?? false,
      }),
      resizeNegotiator: new ResizeNegotiator({ logger: options.logger }),
      inputRegions: this.inputRegions,
      visibility: new VisibilityController({ logger: options.logger }),
      focus: this.focus,
      popupHost: options.popupHost,
      onMinimizeTarget: (target) => {
        this.minimize.report(target);
      },
      onLayout: options.onLayout,
      logger: options.logger,
    };
  }

  getInstances(): readonly PanelInstance[] {
    return this.instances;
  }

  getConfigs(): readonly PanelConfig[] {
    return this.configs;
  }

  getOutputs(): readonly OutputDescriptor[] {
    return this.outputs;
  }

  findInstance(name: string, outputName: string | null): PanelInstance | undefined {
    const key = instanceKey(name, outputName);
    return this.instances.find((instance) => instance.key === key);
  }

  getMinimizeTarget(output: string): MinimizeTarget | undefined {
    return this.minimize.get(output);
  }

  loadContainer(container: PanelContainerConfig): ApplyOutcome[] {
    return container.panels.map((panel) => this.apply(panel));
  }

  /**
   * Applies a new or changed panel config. With `forceOutput`, the instances on that output
   * are recreated unconditionally and the others are left alone.
   */
  apply(entry: PanelConfig, forceOutput?: string): ApplyOutcome {
    const stored = this.configs.find((config) => config.name === entry.name) ?? null;
    const existing = this.instancesNamed(entry.name);

    if (
      forceOutput === undefined &&
      stored &&
      panelConfigsEqual(stored, entry) &&
      existing.length === this.expectedInstanceCount(entry)
    ) {
      this.logger.info(`config ${entry.name} unchanged, skipping`);
      return { kind: 'noop' };
    }

    const mustRecreate =
      forceOutput !== undefined || this.requiresRecreation(stored, entry, existing.length);
    const oldPriority = stored ? getPriority(stored) : 0;
    const oldAnchor = stored ? stored.anchor : entry.anchor;
    this.storeConfig(entry);

    if (!mustRecreate) {
      const backgroundColor = deriveBackgroundColor(entry, this.theme);
      for (const instance of existing) {
        instance.updateConfig({ ...entry, output: instance.config.output }, backgroundColor);
      }
      this.logger.info(`config ${entry.name} updated in place (${existing.length} instances)`);
      return { kind: 'updated', instances: existing };
    }

    const created = this.recreate(entry, oldPriority, oldAnchor, forceOutput);
    this.logger.info(
      `config ${entry.name} recreated: ${created.map((instance) => instance.key).join(', ') || 'none'}`,
    );
    return { kind: 'recreated', created };
  }

  remove(name: string): boolean {
    const known = this.configs.some((config) => config.name === name);
    const removed = this.destroyWhere((instance) => instance.name === name);
    this.configs = this.configs.filter((config) => config.name !== name);
    if (!known && removed === 0) {
      this.logger.warn(`remove: unknown panel ${name}`);
      return false;
    }
    this.logger.info(`removed panel ${name} (${removed} instances)`);
    return true;
  }

  addOutput(output: OutputDescriptor): PanelInstance[] {
    const index = this.outputs.findIndex((existing) => existing.name === output.name);
    if (index >= 0) {
      this.outputs[index] = output;
      for (const instance of this.instances) {
        if (instance.outputName === output.name) {
          instance.setOutput(output);
        }
      }
      return [];
    }

    this.outputs.push(output);
    const created: PanelInstance[] = [];
    for (const config of this.sortedConfigsFor(output.name)) {
      if (this.findInstance(config.name, output.name)) {
        continue;
      }
      created.push(this.createInstance({ ...config, output: { name: output.name } }, output));
    }
    this.logger.info(`output ${output.name} added, ${created.length} instances created`);
    return created;
  }

  removeOutput(name: string): boolean {
    const known = this.outputs.some((output) => output.name === name);
    this.outputs = this.outputs.filter((output) => output.name !== name);
    const removed = this.destroyWhere((instance) => instance.outputName === name);
    this.minimize.forgetOutput(name);
    if (known) {
      this.logger.info(`output ${name} removed, dropped ${removed} instances`);
    }
    return known;
  }

  setThemeMode(isDark: boolean): void {
    const changed = this.theme.isDark !== isDark;
    this.theme.isDark = isDark;
    if (!changed) {
      return;
    }
    for (const instance of this.instances) {
      if (instance.config.background === 'theme_default') {
        instance.setBackgroundColor(deriveBackgroundColor(instance.config, this.theme));
      }
    }
  }

  setDarkColor(color: Rgba): void {
    this.theme.dark = [...color];
    this.refreshThemeColor('dark');
  }

  setLightColor(color: Rgba): void {
    this.theme.light = [...color];
    this.refreshThemeColor('light');
  }

  get isDark(): boolean {
    return this.theme.isDark;
  }

  mapWindow(
    panelName: string,
    outputName: string | null,
    input: AppletWindowInput,
  ): AppletWindow | null {
    const instance = this.findInstance(panelName, outputName);
    if (!instance) {
      throw new PanelError(
        'unknown_instance',
        `No panel instance ${instanceKey(panelName, outputName)}`,
      );
    }
    const window = instance.mapWindow(input);
    if (!window) {
      this.logger.warn(`${instance.key} has no region for plugin ${input.pluginName}`);
    }
    return window;
  }

  resizeWindow(windowId: string, size: Size): boolean {
    for (const instance of this.instances) {
      if (instance.windows.has(windowId)) {
        return instance.resizeWindow(windowId, size);
      }
    }
    return false;
  }

  /**
   * Drops a window and the popups it owns from whichever instance holds it.
   */
  removeWindow(windowId: string): boolean {
    for (const instance of this.instances) {
      if (instance.unmapWindow(windowId)) {
        return true;
      }
    }
    return false;
  }

  handleConfigure(event: ConfigureEvent): boolean {
    return this.sendEvent(event.surfaceId, {
      kind: 'configure',
      width: event.width,
      height: event.height,
    });
  }

  handleFocus(signal: FocusSignal, channel: FocusChannel = 'pointer'): void {
    this.focus.record(signal, channel);
  }

  /**
   * Queues an event on the instance owning `surfaceId`, a panel surface or one of its
   * popups.
   */
  sendEvent(surfaceId: string, event: PanelInstanceEvent): boolean {
    const instance = this.instances.find((candidate) => candidate.ownsSurface(surfaceId));
    if (!instance) {
      this.logger.warn(`event ${event.kind} for unknown surface ${surfaceId}`);
      return false;
    }
    instance.enqueue(event);
    return true;
  }

  tick(now: number): InstanceTickReport[] {
    const reports: InstanceTickReport[] = [];
    for (const instance of [...this.instances]) {
      if (instance.isDestroyed) {
        continue;
      }
      try {
        reports.push({ key: instance.key, result: tickPanel(instance, now, this.context) });
      } catch (err) {
        this.logger.error(`tick failed for ${instance.key}: ${errorMessage(err)}`);
        reports.push({ key: instance.key, result: 'failed' });
      }
    }
    // Popups closed during the frame leave focus entries behind.
    this.focus.retain((surfaceId) =>
      this.instances.some((instance) => instance.ownsSurface(surfaceId)),
    );
    return reports;
  }

  destroyAll(): void {
    this.destroyWhere(() => true);
  }

  private expectedInstanceCount(entry: PanelConfig): number {
    if (entry.output === 'active') {
      return 1;
    }
    return this.outputs.filter((output) => outputTargets(entry.output, output.name)).length;
  }

  private requiresRecreation(
    stored: PanelConfig | null,
    entry: PanelConfig,
    instanceCount: number,
  ): boolean {
    let countMismatch: boolean;
    if (entry.output === 'all') {
      countMismatch = instanceCount !== this.outputs.length;
    } else if (entry.output === 'active') {
      countMismatch = true;
    } else {
      countMismatch = instanceCount !== 1;
    }
    if (countMismatch) {
      return true;
    }
    if (!stored) {
      return false;
    }
    return (
      stored.size !== entry.size ||
      (entry.output !== 'all' && !outputsEqual(stored.output, entry.output)) ||
      entry.anchor === oppositeAnchor(stored.anchor) ||
      isHorizontal(stored) !== isHorizontal(entry) ||
      !backgroundsEqual(stored.background, entry.background) ||
      !pluginListsEqual(stored.pluginsCenter, entry.pluginsCenter) ||
      !pluginWingsEqual(stored.pluginsWings, entry.pluginsWings)
    );
  }

  private recreate(
    entry: PanelConfig,
    oldPriority: number,
    oldAnchor: PanelAnchor,
    forceOutput: string | undefined,
  ): PanelInstance[] {
    this.destroyWhere(
      (instance) =>
        instance.name === entry.name &&
        (forceOutput === undefined || instance.outputName === forceOutput),
    );

    if (entry.output === 'active') {
      return [this.createInstance(entry, null)];
    }

    const newPriority = getPriority(entry);
    const excludedAnchor = oldAnchor !== entry.anchor ? oppositeAnchor(entry.anchor) : null;
    const created: PanelInstance[] = [];

    for (const output of this.outputs) {
      if (!outputTargets(entry.output, output.name)) {
        continue;
      }
      if (forceOutput !== undefined && output.name !== forceOutput) {
        continue;
      }
      for (const config of this.sortedConfigsFor(output.name)) {
        const priority = getPriority(config);
        const between =
          (priority < newPriority && priority > oldPriority) ||
          (priority > newPriority && priority < oldPriority);
        const affected =
          config.name === entry.name || (config.anchor !== excludedAnchor && between);
        if (!affected) {
          continue;
        }
        this.destroyWhere(
          (instance) => instance.name === config.name && instance.outputName === output.name,
        );
        created.push(this.createInstance({ ...config, output: { name: output.name } }, output));
      }
    }
    return created;
  }

  private sortedConfigsFor(outputName: string): PanelConfig[] {
    return configsForOutput({ panels: this.configs }, outputName).sort(
      (a, b) => getPriority(b) - getPriority(a),
    );
  }

  private storeConfig(entry: PanelConfig): void {
    const index = this.configs.findIndex((config) => config.name === entry.name);
    if (index >= 0) {
      this.configs[index] = entry;
    } else {
      this.configs.push(entry);
    }
  }

  private instancesNamed(name: string): PanelInstance[] {
    return this.instances.filter((instance) => instance.name === name);
  }

  private createInstance(config: PanelConfig, output: OutputDescriptor | null): PanelInstance {
    const key = instanceKey(config.name, output?.name ?? null);
    if (this.instances.some((instance) => instance.key === key)) {
      throw new PanelError('duplicate_instance', `Panel instance ${key} already exists`);
    }
    const surface = this.shell.createSurface({
      namespace: config.name,
      output: output?.name ?? null,
      anchor: config.anchor,
      layer: config.layer,
      keyboardInteractivity: config.keyboardInteractivity,
    });
    const instance = new PanelInstance({
      config,
      output,
      surface,
      backgroundColor: deriveBackgroundColor(config, this.theme),
      now: this.now(),
    });
    this.instances.push(instance);
    this.logger.debug?.(`created ${key}`);
    return instance;
  }

  private destroyWhere(predicate: (instance: PanelInstance) => boolean): number {
    const doomed = this.instances.filter(predicate);
    if (doomed.length === 0) {
      return 0;
    }
    this.instances = this.instances.filter((instance) => !predicate(instance));
    for (const instance of doomed) {
      for (const surfaceId of instance.surfaceIds()) {
        this.focus.forget(surfaceId);
      }
      this.inputRegions.forget(instance);
      instance.destroy();
    }
    return doomed.length;
  }

  private refreshThemeColor(mode: 'dark' | 'light'): void {
    for (const instance of this.instances) {
      if (followsThemeColor(instance.config, mode, this.theme.isDark)) {
        instance.setBackgroundColor(deriveBackgroundColor(instance.config, this.theme));
      }
    }
  }
}

import dotenv from 'dotenv';
import type { ConfigureEvent, OutputDescriptor } from '@edgebar/shared';

import { ConfigWatcher } from './configWatcher';
import { InstanceOrchestrator } from './container/instanceOrchestrator';
import type { MinimizeRectangleSink } from './container/minimizeRegistry';
import { loadEnvConfig, type EnvConfig } from './envConfig';
import { PanelEventLoop } from './eventLoop';
import type { Logger } from './logger';
import type { LayerShell, PopupHost } from './space/surface';

export interface ConfigureSource {
  takeConfigures(): ConfigureEvent[];
}

export interface PanelServerOptions {
  shell: LayerShell;
  popupHost?: PopupHost;
  /** Polled once per frame for configure events the shell does not deliver itself. */
  configureSource?: ConfigureSource;
  minimizeSink?: MinimizeRectangleSink;
  outputs?: OutputDescriptor[];
  /** Skips reading the process environment when given. */
  env?: EnvConfig;
  logger?: Logger;
}

export interface PanelServer {
  env: EnvConfig;
  orchestrator: InstanceOrchestrator;
  watcher: ConfigWatcher;
  eventLoop: PanelEventLoop;
  stop(): Promise<void>;
}

export function startPanelServer(options: PanelServerOptions): PanelServer {
  if (!options.env) {
    dotenv.config();
  }
  const env = options.env ?? loadEnvConfig();
  const logger = options.logger ?? console;

  const orchestrator = new InstanceOrchestrator({
    shell: options.shell,
    popupHost: options.popupHost,
    minimizeSink: options.minimizeSink,
    isDark: env.darkMode,
    debugLayout: env.debugLayout,
    logger,
  });
  for (const output of options.outputs ?? []) {
    orchestrator.addOutput(output);
  }

  const watcher = new ConfigWatcher({ configPath: env.configPath, target: orchestrator, logger });
  watcher.start();

  const configureSource = options.configureSource;
  const eventLoop = new PanelEventLoop({
    target: {
      tick: (now) => {
        orchestrator.tick(now);
        for (const event of configureSource?.takeConfigures() ?? []) {
          orchestrator.handleConfigure(event);
        }
      },
    },
    tickMs: env.tickMs,
    logger,
  });
  eventLoop.start();

  return {
    env,
    orchestrator,
    watcher,
    eventLoop,
    stop: async () => {
      eventLoop.stop();
      orchestrator.destroyAll();
      await watcher.stop();
    },
  };
}

import path from 'node:path';

export interface EnvConfig {
  /**
   * Container config file (JSON or YAML).
   */
  configPath: string;
  /**
   * Frame tick interval in milliseconds.
   */
  tickMs: number;
  /**
   * Enable debug logging of layout passes.
   */
  debugLayout: boolean;
  darkMode: boolean;
}

const DEFAULT_TICK_MS = 16;

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return fallback;
}

export function loadEnvConfig(): EnvConfig {
  const configPathEnv = process.env['EDGEBAR_CONFIG_PATH'];
  const configPath =
    configPathEnv && configPathEnv.trim().length > 0
      ? path.resolve(configPathEnv.trim())
      : path.resolve(process.cwd(), 'edgebar.config.json');

  const tickEnv = process.env['EDGEBAR_TICK_MS'];
  const parsedTick = tickEnv !== undefined ? Number(tickEnv) : Number.NaN;
  const tickMs =
    Number.isFinite(parsedTick) && parsedTick > 0 ? Math.round(parsedTick) : DEFAULT_TICK_MS;

  const debugLayout = parseFlag(process.env['EDGEBAR_DEBUG_LAYOUT'], false);
  const darkMode = parseFlag(process.env['EDGEBAR_DARK_MODE'], true);

  return {
    configPath,
    tickMs,
    debugLayout,
    darkMode,
  };
}

import {
  configsForOutput,
  formatPanelOutput,
  getPriority,
  outputsEqual,
  type PanelContainerConfig,
  type PanelOutput,
} from '@edgebar/shared';

export interface PriorityEntry {
  name: string;
  priority: number;
  anchor: string;
  output: string;
}

/**
 * Panels in recreation order, highest priority first. With `outputName`, only the panels
 * that would appear on that output; with `target`, only the panels configured with exactly
 * that output target.
 */
export function runPriority(
  config: PanelContainerConfig,
  outputName?: string,
  target?: PanelOutput,
): PriorityEntry[] {
  const panels = outputName === undefined ? [...config.panels] : configsForOutput(config, outputName);
  return panels
    .filter((panel) => target === undefined || outputsEqual(panel.output, target))
    .sort((a, b) => getPriority(b) - getPriority(a))
    .map((panel) => ({
      name: panel.name,
      priority: getPriority(panel),
      anchor: panel.anchor,
      output: formatPanelOutput(panel.output),
    }));
}

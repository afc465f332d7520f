import { formatPanelOutput, getAppletIconSize, getPriority } from '@edgebar/shared';
import { loadContainerConfig } from '@edgebar/panel-server';

export interface ValidatedPanel {
  name: string;
  anchor: string;
  size: string;
  /** Icon size applets get for the panel's size class. */
  iconSize: number;
  output: string;
  priority: number;
  autohide: boolean;
}

export interface ValidateResult {
  valid: true;
  path: string;
  panels: ValidatedPanel[];
}

export function runValidate(configPath: string): ValidateResult {
  const config = loadContainerConfig(configPath);
  return {
    valid: true,
    path: configPath,
    panels: config.panels.map((panel) => ({
      name: panel.name,
      anchor: panel.anchor,
      size: panel.size,
      iconSize: getAppletIconSize(panel),
      output: formatPanelOutput(panel.output),
      priority: getPriority(panel),
      autohide: panel.autohide !== null,
    })),
  };
}

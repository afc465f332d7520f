import fs from 'node:fs';
import path from 'node:path';

import { PanelContainerConfigSchema, type PanelContainerConfig } from '@edgebar/shared';
import yaml from 'yaml';
import type { ZodError } from 'zod';

import { PanelError } from './errors';

function substituteEnvVars(value: string): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, name: string) => {
    const envValue = process.env[name];
    return envValue ?? '';
  });
}

/**
 * Recursively walk a value and substitute environment variables in all strings.
 */
export function deepSubstitute(value: unknown): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => deepSubstitute(item));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = deepSubstitute(val);
    }
    return result;
  }

  return value;
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}

function isYamlPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Validates an already parsed container config document.
 */
export function parseContainerConfig(value: unknown, source = 'config'): PanelContainerConfig {
  const result = PanelContainerConfigSchema.safeParse(deepSubstitute(value));
  if (!result.success) {
    throw new PanelError(
      'invalid_config',
      `Invalid panel configuration in ${source}: ${formatZodIssues(result.error)}`,
    );
  }
  return result.data;
}

export function loadContainerConfig(configPath: string): PanelContainerConfig {
  const resolvedPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, 'utf8');
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new PanelError('config_not_found', `Configuration file not found at ${resolvedPath}`);
    }
    throw new PanelError(
      'invalid_config',
      `Failed to read configuration file at ${resolvedPath}: ${errorMessage(err)}`,
    );
  }

  let parsed: unknown;
  if (isYamlPath(resolvedPath)) {
    try {
      parsed = yaml.parse(raw) ?? {};
    } catch (err) {
      throw new PanelError(
        'invalid_config',
        `Configuration file at ${resolvedPath} is not valid YAML: ${errorMessage(err)}`,
      );
    }
  } else {
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new PanelError(
        'invalid_config',
        `Configuration file at ${resolvedPath} is not valid JSON: ${errorMessage(err)}`,
      );
    }
  }

  return parseContainerConfig(parsed, resolvedPath);
}

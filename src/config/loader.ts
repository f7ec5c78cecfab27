// Settings loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { NetworkSettings, SettingsLoader } from './types';
import { validateAndNormalizeSettings } from './validator';

export const DEFAULT_SETTINGS_PATHS = [
  './network.yml',
  './network.yaml',
  './network.json'
];

/**
 * Settings loader that supports YAML and JSON files with environment variable substitution
 */
export class NetworkSettingsLoader implements SettingsLoader {

  /**
   * Load, substitute and validate a settings file
   * @param path - Path to the settings file (YAML or JSON)
   */
  async load(path: string): Promise<NetworkSettings> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Settings file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawSettings: unknown;
      if (path.endsWith('.json')) {
        rawSettings = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawSettings = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      return validateAndNormalizeSettings(this.resolveEnvironmentVariables(rawSettings));
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load settings from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load settings from ${path}: ${String(error)}`);
    }
  }

  /**
   * Load the first settings file that exists among `searchPaths`.
   * Falls back to the default settings when none exists.
   */
  async loadFirstExisting(searchPaths: string[]): Promise<NetworkSettings> {
    const path = searchPaths.find(candidate => existsSync(candidate));
    if (!path) {
      return validateAndNormalizeSettings({});
    }
    return this.load(path);
  }

  /**
   * Recursively resolve environment variables in a parsed settings value
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  /**
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax.
   * An unset variable without a default keeps its placeholder.
   */
  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      return match;
    });
  }
}

export function createSettingsLoader(): NetworkSettingsLoader {
  return new NetworkSettingsLoader();
}

/**
 * Load settings from an explicit path, or from the standard locations
 * (network.yml, network.yaml, network.json in the current directory)
 */
export async function loadSettings(path?: string): Promise<NetworkSettings> {
  const loader = createSettingsLoader();
  return path ? loader.load(path) : loader.loadFirstExisting(DEFAULT_SETTINGS_PATHS);
}

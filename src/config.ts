/**
 * Configuration management for ocs-link-mcp
 */

import type { Config, InstallFamily } from './types.js';
import { DEFAULT_FAMILY_ORDER } from './install-types/families.js';
import { isInstallFamily } from './install-types/registry.js';

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringArray(value: string | undefined, defaultValue: readonly string[]): string[] {
  if (value === undefined || value.trim() === '') return [...defaultValue];
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function loadConfig(): Config {
  return {
    checkInstallTypes: parseBoolean(process.env['OCS_CHECK_INSTALL_TYPES'], false),
    installTypePriority: parseStringArray(process.env['INSTALL_TYPE_PRIORITY'], DEFAULT_FAMILY_ORDER),
    pageSize: parseNumber(process.env['PAGE_SIZE'], 50),
    logToolCalls: parseBoolean(process.env['LOG_TOOL_CALLS'], false),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

/**
 * Family probe order from config; unknown names are dropped
 */
export function getInstallTypePriority(config: Config): InstallFamily[] {
  return config.installTypePriority.filter(isInstallFamily);
}

// Validate configuration
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.pageSize < 1 || config.pageSize > 500) {
    errors.push('PAGE_SIZE must be between 1 and 500');
  }

  if (config.installTypePriority.length === 0) {
    errors.push('INSTALL_TYPE_PRIORITY must name at least one family');
  }
  const seen = new Set<string>();
  for (const family of config.installTypePriority) {
    if (!isInstallFamily(family)) {
      errors.push(
        `INSTALL_TYPE_PRIORITY contains unknown family "${family}" (expected one of: ${DEFAULT_FAMILY_ORDER.join(', ')})`
      );
    } else if (seen.has(family)) {
      errors.push(`INSTALL_TYPE_PRIORITY lists "${family}" more than once`);
    }
    seen.add(family);
  }

  return errors;
}

/**
 * Config Helpers
 *
 * Helpers for reading the layered YAML files and for typed access to a
 * resolved DeploymentConfiguration.
 */

import * as fs from 'fs';
import yaml from 'js-yaml';

import type { ConfigLayer, ConfigValue, DeploymentConfiguration } from '../types/index.js';
import { ConfigurationError } from './errors.js';

// ============================================================
// YAML LOADING
// ============================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a YAML mapping. Missing files return null; a file that is not a
 * mapping or fails to parse is a ConfigurationError.
 */
export function loadYamlFile(filePath: string): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Error parsing ${filePath}: ${message}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a YAML mapping`);
  }
  return parsed;
}

/**
 * Flatten nested maps into dotted keys.
 *
 * { services: { ollama: { port: 11434 } } } -> { 'services.ollama.port': 11434 }
 *
 * Arrays become comma-separated strings; nulls are dropped so the key falls
 * through to a lower layer.
 */
export function flattenConfig(source: Record<string, unknown>, prefix = ''): ConfigLayer {
  const flat: ConfigLayer = {};

  for (const [key, value] of Object.entries(source)) {
    const dotted = prefix ? `${prefix}.${key}` : key;

    if (isPlainObject(value)) {
      Object.assign(flat, flattenConfig(value, dotted));
    } else if (Array.isArray(value)) {
      flat[dotted] = value.map((v) => String(v)).join(',');
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[dotted] = value;
    } else if (value instanceof Date) {
      flat[dotted] = value.toISOString();
    }
  }

  return flat;
}

/**
 * Select one top-level section of a YAML mapping and flatten it
 */
export function flattenSection(source: Record<string, unknown> | null, section: string): ConfigLayer {
  const value = source?.[section];
  return isPlainObject(value) ? flattenConfig(value) : {};
}

// ============================================================
// TYPED ACCESS
// ============================================================

export function hasKey(config: DeploymentConfiguration, key: string): boolean {
  const value = config[key];
  return value !== undefined && value !== '';
}

export function getOptionalString(config: DeploymentConfiguration, key: string): string | undefined {
  const value = config[key];
  if (value === undefined || value === '') return undefined;
  return String(value);
}

export function getString(config: DeploymentConfiguration, key: string, fallback?: string): string {
  const value = getOptionalString(config, key);
  if (value !== undefined) return value;
  if (fallback !== undefined) return fallback;
  throw new ConfigurationError(`Missing configuration key: ${key}`, [key]);
}

export function getNumber(config: DeploymentConfiguration, key: string, fallback?: number): number {
  const value = config[key];
  if (value === undefined || value === '') {
    if (fallback !== undefined) return fallback;
    throw new ConfigurationError(`Missing configuration key: ${key}`, [key]);
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (typeof value === 'boolean' || Number.isNaN(parsed)) {
    throw new ConfigurationError(`Configuration key ${key} must be a number (got '${String(value)}')`, [key]);
  }
  return parsed;
}

const TRUE_VALUES = ['true', 'yes', '1', 'on'];
const FALSE_VALUES = ['false', 'no', '0', 'off'];

export function getBoolean(config: DeploymentConfiguration, key: string, fallback = false): boolean {
  const value = config[key];
  if (value === undefined || value === '') return fallback;
  if (typeof value === 'boolean') return value;

  const normalized = String(value).trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new ConfigurationError(`Configuration key ${key} must be true or false (got '${String(value)}')`, [key]);
}

/**
 * Merge layers lowest precedence first. A key present in a later layer wins.
 */
export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Drop undefined entries so absent flags fall through to lower layers
 */
export function compactLayer(source: Record<string, ConfigValue | undefined>): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      layer[key] = value;
    }
  }
  return layer;
}

// ============================================================
// DISPLAY
// ============================================================

/**
 * Printable summary of the settings people usually want to double check
 */
export function summarizeConfig(config: DeploymentConfiguration): string {
  const line = (label: string, key: string): string =>
    `  ${label.padEnd(18)}${getOptionalString(config, key) ?? '(unset)'}`;

  return [
    'Configuration Summary:',
    line('Stack Name:', 'stack.name'),
    line('Environment:', 'environment.name'),
    line('Deployment Type:', 'deployment.type'),
    line('AWS Region:', 'aws.region'),
    line('Instance Type:', 'instance.type'),
    line('Spot Max Price:', 'spot.max_price'),
    '',
    'Features:',
    line('ALB:', 'features.alb'),
    line('CloudFront:', 'features.cloudfront'),
    line('Latest Images:', 'images.use_latest'),
    line('EFS:', 'storage.efs_enabled'),
    line('Monitoring:', 'monitoring.enabled'),
    line('Cleanup on fail:', 'cleanup.on_failure'),
  ].join('\n');
}

/**
 * {{dotted.key}} placeholder substitution.
 *
 * Shell-style ${VAR} references are left alone; they are filled in on the
 * instance.
 */

import type { DeploymentConfiguration } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;

/**
 * Keys referenced by a template, in order of first use
 */
export function listPlaceholders(template: string): string[] {
  const keys: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const key = match[1];
    if (key && !keys.includes(key)) keys.push(key);
  }
  return keys;
}

/**
 * @throws ConfigurationError listing every placeholder with no value
 */
export function renderTemplate(template: string, config: DeploymentConfiguration, source = 'template'): string {
  const missing = listPlaceholders(template).filter((key) => {
    const value = config[key];
    return value === undefined || value === '';
  });
  if (missing.length > 0) {
    throw new ConfigurationError(`Unresolved placeholders in ${source}: ${missing.join(', ')}`, missing);
  }

  return template.replace(PLACEHOLDER, (_match, key: string) => String(config[key]));
}

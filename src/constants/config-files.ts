/**
 * Config file names used across the toolkit.
 * Single source of truth for the layered YAML files and templates.
 */

import * as fs from 'fs';
import * as path from 'path';

/** Global defaults */
export const DEFAULTS_FILENAME = 'defaults.yml';

/** Per deployment-type overrides (spot / ondemand / simple) */
export const DEPLOYMENT_TYPES_FILENAME = 'deployment-types.yml';

/** Directory of per-environment overrides (<env>.yml) */
export const ENVIRONMENTS_DIRNAME = 'environments';

/** .env template rendered for each deployment */
export const ENV_TEMPLATE_FILENAME = 'env.template';

/**
 * Walk up from a directory until a package.json is found.
 * Works from both src/ (tests) and dist/src/ (built CLI).
 */
export function findPackageRoot(startDir: string = __dirname): string {
  let current = startDir;
  for (;;) {
    if (fs.existsSync(path.join(current, 'package.json'))) return current;
    const parent = path.dirname(current);
    if (parent === current) return startDir;
    current = parent;
  }
}

/**
 * Config directory shipped with the package (built-in layers)
 */
export function getBuiltinConfigDir(): string {
  return path.join(findPackageRoot(), 'config');
}

/**
 * Templates shipped with the package
 */
export function getTemplatesDir(): string {
  return path.join(findPackageRoot(), 'templates');
}

/**
 * Project config directory, <rootDir>/config unless overridden
 */
export function getProjectConfigDir(rootDir: string, configDir?: string): string {
  return configDir ? path.resolve(rootDir, configDir) : path.join(rootDir, 'config');
}

export function getEnvironmentConfigPath(configDir: string, environment: string): string {
  return path.join(configDir, ENVIRONMENTS_DIRNAME, `${environment}.yml`);
}

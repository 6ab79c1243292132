/**
 * .env rendering from templates/env.template
 */

import * as fs from 'fs';
import * as path from 'path';

import type { DeploymentConfiguration } from '../types/index.js';
import { ENV_TEMPLATE_FILENAME, getTemplatesDir } from '../constants/config-files.js';
import { ConfigurationError } from '../utils/errors.js';
import { renderTemplate } from './template.js';

export function getEnvTemplatePath(): string {
  return path.join(getTemplatesDir(), ENV_TEMPLATE_FILENAME);
}

/**
 * Render the .env file for a stack.
 *
 * @param templatePath - Defaults to the packaged env.template
 * @throws ConfigurationError when the template is missing or a placeholder has no value
 */
export function renderEnvFile(config: DeploymentConfiguration, templatePath: string = getEnvTemplatePath()): string {
  if (!fs.existsSync(templatePath)) {
    throw new ConfigurationError(`Environment template not found: ${templatePath}`);
  }
  const template = fs.readFileSync(templatePath, 'utf8');
  return renderTemplate(template, config, path.basename(templatePath));
}

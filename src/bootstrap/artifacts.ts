/**
 * Deployment artifacts written next to the project for inspection
 * (and for `aistack render`).
 */

import * as fs from 'fs';
import * as path from 'path';

import type { DeploymentConfiguration } from '../types/index.js';
import { getString } from '../utils/config-helpers.js';
import { renderDockerCompose } from './compose.js';
import { renderEnvFile } from './env-file.js';

export interface RenderedArtifacts {
  composeFile: string;
  envFile: string;
}

export interface WrittenArtifacts {
  composePath: string;
  envPath: string;
}

export function renderArtifacts(config: DeploymentConfiguration, templatePath?: string): RenderedArtifacts {
  return {
    composeFile: renderDockerCompose(config),
    envFile: renderEnvFile(config, templatePath),
  };
}

export function artifactFileNames(stackName: string): { compose: string; env: string } {
  return {
    compose: `docker-compose.${stackName}.yml`,
    env: `.env.${stackName}`,
  };
}

/**
 * Write docker-compose.<stack>.yml and .env.<stack> into outputDir
 */
export function writeDeploymentArtifacts(
  config: DeploymentConfiguration,
  outputDir: string,
  rendered: RenderedArtifacts = renderArtifacts(config)
): WrittenArtifacts {
  const names = artifactFileNames(getString(config, 'stack.name'));
  fs.mkdirSync(outputDir, { recursive: true });

  const composePath = path.join(outputDir, names.compose);
  const envPath = path.join(outputDir, names.env);

  fs.writeFileSync(composePath, rendered.composeFile);
  fs.writeFileSync(envPath, rendered.envFile, { mode: 0o600 });

  console.log(`[OK] Wrote ${composePath}`);
  console.log(`[OK] Wrote ${envPath}`);

  return { composePath, envPath };
}

/**
 * Render Command
 *
 * Writes docker-compose.<stack>.yml, .env.<stack> and user-data.<stack>.sh
 * so they can be reviewed before a deploy.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { CommandResult, RenderOptions } from '../types/index.js';
import { renderArtifacts, writeDeploymentArtifacts } from '../bootstrap/artifacts.js';
import { generateUserData } from '../bootstrap/user-data.js';
import { errorMessage } from '../utils/errors.js';
import { resolveCommandConfig, type CommandContext } from './context.js';

export function render(stackName: string, options: RenderOptions = {}, context: CommandContext = {}): CommandResult {
  try {
    const config = resolveCommandConfig(
      options.deploymentType,
      options.environment,
      {
        'stack.name': stackName,
        'aws.region': options.region,
        'images.use_latest': options.usePinnedImages ? false : undefined,
      },
      options,
      context,
      true
    );

    const outputDir = path.resolve(options.rootDir ?? process.cwd(), options.output ?? '.');
    const artifacts = renderArtifacts(config);
    writeDeploymentArtifacts(config, outputDir, artifacts);

    const userDataPath = path.join(outputDir, `user-data.${stackName}.sh`);
    fs.writeFileSync(userDataPath, generateUserData(config, artifacts), { mode: 0o700 });
    console.log(`[OK] Wrote ${userDataPath}`);

    return { success: true };
  } catch (e) {
    const message = errorMessage(e);
    console.log(`[ERROR] ${message}`);
    return { success: false, error: message };
  }
}

export default render;

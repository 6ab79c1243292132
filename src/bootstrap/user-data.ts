/**
 * User Data Builder
 *
 * Renders the bash script EC2 runs on first boot: wait for cloud-init and
 * the apt locks, install Docker with the Compose plugin, optionally mount
 * EFS, write the Compose and .env files, generate secrets, start the stack
 * and drop a completion marker.
 */

import type { DeploymentConfiguration } from '../types/index.js';
import { getString } from '../utils/config-helpers.js';

export const HEREDOC_DELIMITER = 'AISTACK_EOF';
export const READY_MARKER = '/var/lib/cloud/instance/aistack-ready';
export const USER_DATA_LOG = '/var/log/aistack-user-data.log';

/** Placeholders in the rendered .env that are filled on the instance */
export const GENERATED_SECRETS = ['POSTGRES_PASSWORD', 'N8N_ENCRYPTION_KEY', 'N8N_USER_MANAGEMENT_JWT_SECRET'];

export interface UserDataArtifacts {
  composeFile: string;
  envFile: string;
  /** Mount this EFS file system at /mnt/efs before starting the stack */
  efsFileSystemId?: string;
}

export class UserDataBuilder {
  private readonly directory: string;
  private readonly region: string;
  private readonly gpu: boolean;

  constructor(config: DeploymentConfiguration) {
    this.directory = getString(config, 'compose.directory', '/opt/aistack');
    this.region = getString(config, 'aws.region');
    this.gpu = getString(config, 'compose.profile', 'cpu') === 'gpu';
  }

  build(artifacts: UserDataArtifacts): string {
    const commands = [
      '#!/bin/bash',
      'set -euo pipefail',
      `exec > >(tee -a ${USER_DATA_LOG}) 2>&1`,
      'echo "[INFO] Starting aistack bootstrap..."',
      ...this.buildWaits(),
      ...this.buildDockerInstall(),
      ...(this.gpu ? this.buildGpuRuntime() : []),
      ...this.buildDockerWait(),
      ...(artifacts.efsFileSystemId ? this.buildEfsMount(artifacts.efsFileSystemId) : []),
      ...this.buildFiles(artifacts),
      ...this.buildSecrets(),
      ...this.buildStartup(),
      `touch ${READY_MARKER}`,
      'echo "[INFO] Bootstrap completed successfully"',
    ];
    return commands.join('\n') + '\n';
  }

  private buildWaits(): string[] {
    return [
      'cloud-init status --wait >/dev/null 2>&1 || true',
      'while fuser /var/lib/dpkg/lock-frontend /var/lib/apt/lists/lock >/dev/null 2>&1; do',
      '  echo "[INFO] Waiting for apt locks..."',
      '  sleep 5',
      'done',
      'export DEBIAN_FRONTEND=noninteractive',
    ];
  }

  private buildDockerInstall(): string[] {
    return [
      'if ! command -v docker >/dev/null 2>&1; then',
      '  apt-get update -y',
      '  apt-get install -y ca-certificates curl',
      '  curl -fsSL https://get.docker.com | sh',
      'fi',
      'if ! docker compose version >/dev/null 2>&1; then',
      '  apt-get install -y docker-compose-plugin',
      'fi',
      'systemctl enable --now docker',
      'usermod -aG docker ubuntu || true',
    ];
  }

  private buildGpuRuntime(): string[] {
    return [
      'if command -v nvidia-ctk >/dev/null 2>&1; then',
      '  nvidia-ctk runtime configure --runtime=docker',
      '  systemctl restart docker',
      'else',
      '  echo "[WARN] nvidia-ctk not found, GPU containers may not start"',
      'fi',
    ];
  }

  private buildDockerWait(): string[] {
    return [
      'for attempt in $(seq 1 30); do',
      '  if docker info >/dev/null 2>&1; then break; fi',
      '  echo "[INFO] Waiting for Docker daemon ($attempt/30)..."',
      '  sleep 2',
      'done',
      'docker info >/dev/null',
    ];
  }

  private buildEfsMount(fileSystemId: string): string[] {
    const target = `${fileSystemId}.efs.${this.region}.amazonaws.com:/`;
    const options = 'nfsvers=4.1,rsize=1048576,wsize=1048576,hard,timeo=600,retrans=2,noresvport';
    return [
      'apt-get install -y nfs-common',
      'mkdir -p /mnt/efs',
      `mount -t nfs4 -o ${options} ${target} /mnt/efs`,
      `grep -q "${target}" /etc/fstab || echo "${target} /mnt/efs nfs4 ${options},_netdev 0 0" >> /etc/fstab`,
    ];
  }

  private buildFiles(artifacts: UserDataArtifacts): string[] {
    return [
      `mkdir -p ${this.directory}`,
      `cat <<'${HEREDOC_DELIMITER}' > ${this.directory}/docker-compose.yml`,
      artifacts.composeFile.trimEnd(),
      HEREDOC_DELIMITER,
      `cat <<'${HEREDOC_DELIMITER}' > ${this.directory}/.env`,
      artifacts.envFile.trimEnd(),
      HEREDOC_DELIMITER,
      `chmod 600 ${this.directory}/.env`,
    ];
  }

  private buildSecrets(): string[] {
    return GENERATED_SECRETS.flatMap((name) => [
      `${name}=$(openssl rand -hex 32)`,
      `sed -i "s|\\\${${name}}|$${name}|g" ${this.directory}/.env`,
    ]);
  }

  private buildStartup(): string[] {
    return [
      `cd ${this.directory}`,
      'docker compose --env-file .env -f docker-compose.yml pull',
      'docker compose --env-file .env -f docker-compose.yml up -d',
    ];
  }
}

/**
 * Render the first-boot script for a stack
 */
export function generateUserData(config: DeploymentConfiguration, artifacts: UserDataArtifacts): string {
  return new UserDataBuilder(config).build(artifacts);
}

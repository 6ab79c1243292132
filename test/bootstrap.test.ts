/**
 * Tests for Compose, .env and user-data rendering
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import yaml from 'js-yaml';

import {
  buildComposeDocument,
  generateUserData,
  listPlaceholders,
  renderDockerCompose,
  renderEnvFile,
  renderTemplate,
  serviceImage,
  writeDeploymentArtifacts,
} from '../src/bootstrap/index';
import type { ConfigValue, DeploymentConfiguration } from '../src/types/index';
import { resolve } from '../src/utils/config-resolver';
import { ConfigurationError } from '../src/utils/errors';

function testConfig(type = 'spot', overrides: Record<string, ConfigValue> = {}): DeploymentConfiguration {
  return resolve(type, 'development', { 'stack.name': 'demo', ...overrides }, { env: {} });
}

describe('renderTemplate', () => {
  test('fills dotted placeholders and leaves shell variables alone', () => {
    expect(renderTemplate('Hello {{ stack.name }} from ${HOME}', { 'stack.name': 'demo' })).toBe(
      'Hello demo from ${HOME}'
    );
  });

  test('lists every missing placeholder', () => {
    let caught: unknown;
    try {
      renderTemplate('{{a.b}} {{c}} {{a.b}} {{ok}}', { ok: 1 }, 'env.template');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.message).toBe(
      'Unresolved placeholders in env.template: a.b, c'
    );
    expect(caught instanceof ConfigurationError && caught.keys).toEqual(['a.b', 'c']);
  });

  test('lists placeholders once in order of first use', () => {
    expect(listPlaceholders('{{b}} {{a}} {{ b }}')).toEqual(['b', 'a']);
  });
});

describe('Compose document', () => {
  test('gives Ollama the GPUs for GPU profiles', () => {
    const doc = buildComposeDocument(testConfig('spot'));

    expect(Object.keys(doc.services)).toEqual(['postgres', 'n8n', 'ollama', 'qdrant', 'crawl4ai']);
    expect(doc.services.ollama?.deploy?.resources.reservations.devices).toEqual([
      { driver: 'nvidia', count: 'all', capabilities: ['gpu'] },
    ]);
    expect(doc.services.n8n?.ports).toEqual(['5678:5678']);
    expect(doc.services.postgres?.ports).toBeUndefined();
  });

  test('has no GPU reservation for simple deployments', () => {
    const doc = buildComposeDocument(testConfig('simple'));
    expect(doc.services.ollama?.deploy).toBeUndefined();
  });

  test('maps a configured host port onto the container port', () => {
    const doc = buildComposeDocument(testConfig('spot', { 'services.n8n.port': 8080 }));
    expect(doc.services.n8n?.ports).toEqual(['8080:5678']);
  });

  test('uses pinned images when latest is turned off', () => {
    expect(serviceImage(testConfig('spot'), 'n8n')).toBe('n8nio/n8n:latest');
    expect(serviceImage(testConfig('spot', { 'images.use_latest': false }), 'n8n')).toBe('n8nio/n8n:1.64.0');
  });

  test('dumps YAML that loads back to the same document', () => {
    const config = testConfig('spot');
    expect(yaml.load(renderDockerCompose(config))).toEqual(buildComposeDocument(config));
  });
});

describe('renderEnvFile', () => {
  test('renders the packaged template', () => {
    const lines = renderEnvFile(testConfig('spot')).split('\n');

    expect(lines).toContain('STACK_NAME=demo');
    expect(lines).toContain('DEPLOYMENT_TYPE=spot');
    expect(lines).toContain('INSTANCE_TYPE=g4dn.xlarge');
    expect(lines).toContain('N8N_LOG_LEVEL=debug');
    expect(lines).toContain('CRAWL4AI_DEFAULT_LIMIT=1000/minute');
    expect(lines).toContain('POSTGRES_PASSWORD=${POSTGRES_PASSWORD}');
  });

  test('fails when the template is missing', () => {
    expect(() => renderEnvFile(testConfig('spot'), '/nonexistent/env.template')).toThrow(
      'Environment template not found: /nonexistent/env.template'
    );
  });
});

describe('generateUserData', () => {
  const artifacts = { composeFile: 'services: {}\n', envFile: 'A=1\n' };

  test('writes the files and starts the stack', () => {
    const script = generateUserData(testConfig('spot'), artifacts);
    const lines = script.split('\n');

    expect(lines.slice(0, 2)).toEqual(['#!/bin/bash', 'set -euo pipefail']);
    expect(script).toContain(
      "cat <<'AISTACK_EOF' > /opt/aistack/docker-compose.yml\nservices: {}\nAISTACK_EOF\n"
    );
    expect(script).toContain("cat <<'AISTACK_EOF' > /opt/aistack/.env\nA=1\nAISTACK_EOF\n");
    expect(lines).toContain('sed -i "s|\\${POSTGRES_PASSWORD}|$POSTGRES_PASSWORD|g" /opt/aistack/.env');
    expect(lines).toContain('docker compose --env-file .env -f docker-compose.yml up -d');
    expect(lines).toContain('nvidia-ctk runtime configure --runtime=docker');
    expect(lines.slice(-3)).toEqual([
      'touch /var/lib/cloud/instance/aistack-ready',
      'echo "[INFO] Bootstrap completed successfully"',
      '',
    ]);
  });

  test('skips the GPU runtime for simple deployments', () => {
    expect(generateUserData(testConfig('simple'), artifacts)).not.toContain('nvidia-ctk');
  });

  test('mounts EFS when a file system is given', () => {
    const lines = generateUserData(testConfig('spot'), { ...artifacts, efsFileSystemId: 'fs-123' }).split('\n');
    expect(lines).toContain(
      'mount -t nfs4 -o nfsvers=4.1,rsize=1048576,wsize=1048576,hard,timeo=600,retrans=2,noresvport fs-123.efs.us-east-1.amazonaws.com:/ /mnt/efs'
    );
  });
});

describe('writeDeploymentArtifacts', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aistack-artifacts-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  test('writes per-stack file names with a private .env', () => {
    const written = writeDeploymentArtifacts(testConfig('spot'), outputDir, {
      composeFile: 'compose',
      envFile: 'env',
    });

    expect(written).toEqual({
      composePath: path.join(outputDir, 'docker-compose.demo.yml'),
      envPath: path.join(outputDir, '.env.demo'),
    });
    expect(fs.readFileSync(written.composePath, 'utf8')).toBe('compose');
    expect(fs.statSync(written.envPath).mode & 0o777).toBe(0o600);
  });
});

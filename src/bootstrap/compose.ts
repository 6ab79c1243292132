/**
 * Docker Compose Generator
 *
 * Builds the Compose document for the AI stack (postgres, n8n, ollama,
 * qdrant, crawl4ai) as a plain object and dumps it with js-yaml. Ports and
 * images come from the resolved configuration.
 */

import yaml from 'js-yaml';

import type { DeploymentConfiguration } from '../types/index.js';
import { getBoolean, getNumber, getString } from '../utils/config-helpers.js';

export type ServiceName = 'postgres' | 'n8n' | 'ollama' | 'qdrant' | 'crawl4ai';

export const STACK_SERVICES: readonly ServiceName[] = ['postgres', 'n8n', 'ollama', 'qdrant', 'crawl4ai'];

/** Port each image listens on inside its container */
const CONTAINER_PORTS: Record<ServiceName, number> = {
  postgres: 5432,
  n8n: 5678,
  ollama: 11434,
  qdrant: 6333,
  crawl4ai: 11235,
};

export interface ComposeDeviceReservation {
  driver: string;
  count: number | 'all';
  capabilities: string[];
}

export interface ComposeService {
  image: string;
  container_name: string;
  restart: string;
  ports?: string[];
  env_file?: string[];
  environment?: Record<string, string>;
  volumes?: string[];
  depends_on?: Record<string, { condition: string }>;
  healthcheck?: {
    test: string[];
    interval: string;
    timeout: string;
    retries: number;
  };
  deploy?: {
    resources: {
      reservations: {
        devices: ComposeDeviceReservation[];
      };
    };
  };
  shm_size?: string;
}

export interface ComposeDocument {
  name: string;
  services: Record<string, ComposeService>;
  volumes: Record<string, Record<string, never>>;
}

/**
 * Image for a service: the floating tag, or the pinned one when
 * images.use_latest is false
 */
export function serviceImage(config: DeploymentConfiguration, service: ServiceName): string {
  const useLatest = getBoolean(config, 'images.use_latest', true);
  const latest = getString(config, `services.${service}.image`);
  return useLatest ? latest : getString(config, `services.${service}.pinned_image`, latest);
}

export function servicePort(config: DeploymentConfiguration, service: ServiceName): number {
  return getNumber(config, `services.${service}.port`, CONTAINER_PORTS[service]);
}

function portMapping(config: DeploymentConfiguration, service: ServiceName): string[] {
  return [`${servicePort(config, service)}:${CONTAINER_PORTS[service]}`];
}

function gpuReservation(): ComposeService['deploy'] {
  return {
    resources: {
      reservations: {
        devices: [{ driver: 'nvidia', count: 'all', capabilities: ['gpu'] }],
      },
    },
  };
}

/**
 * Build the Compose document. compose.profile = gpu gives Ollama the GPUs.
 */
export function buildComposeDocument(config: DeploymentConfiguration): ComposeDocument {
  const project = getString(config, 'compose.project_name', 'aistack');
  const gpu = getString(config, 'compose.profile', 'cpu') === 'gpu';
  const container = (service: ServiceName): string => `${project}-${service}`;

  const ollama: ComposeService = {
    image: serviceImage(config, 'ollama'),
    container_name: container('ollama'),
    restart: 'unless-stopped',
    ports: portMapping(config, 'ollama'),
    env_file: ['.env'],
    environment: {
      OLLAMA_HOST: '0.0.0.0',
    },
    volumes: ['ollama_data:/root/.ollama'],
  };
  if (gpu) {
    ollama.deploy = gpuReservation();
  }

  return {
    name: project,
    services: {
      postgres: {
        image: serviceImage(config, 'postgres'),
        container_name: container('postgres'),
        restart: 'unless-stopped',
        env_file: ['.env'],
        environment: {
          POSTGRES_DB: getString(config, 'postgres.database', 'n8n'),
          POSTGRES_USER: getString(config, 'postgres.user', 'postgres'),
          POSTGRES_PASSWORD: '${POSTGRES_PASSWORD}',
        },
        volumes: ['postgres_data:/var/lib/postgresql/data'],
        healthcheck: {
          test: ['CMD-SHELL', 'pg_isready -U ${POSTGRES_USER}'],
          interval: '10s',
          timeout: '5s',
          retries: 5,
        },
      },
      n8n: {
        image: serviceImage(config, 'n8n'),
        container_name: container('n8n'),
        restart: 'unless-stopped',
        ports: portMapping(config, 'n8n'),
        env_file: ['.env'],
        environment: {
          DB_TYPE: 'postgresdb',
          DB_POSTGRESDB_HOST: 'postgres',
          DB_POSTGRESDB_PORT: String(CONTAINER_PORTS.postgres),
          DB_POSTGRESDB_DATABASE: '${POSTGRES_DB}',
          DB_POSTGRESDB_USER: '${POSTGRES_USER}',
          DB_POSTGRESDB_PASSWORD: '${POSTGRES_PASSWORD}',
          OLLAMA_BASE_URL: `http://ollama:${CONTAINER_PORTS.ollama}`,
          QDRANT_URL: `http://qdrant:${CONTAINER_PORTS.qdrant}`,
        },
        volumes: ['n8n_data:/home/node/.n8n'],
        depends_on: {
          postgres: { condition: 'service_healthy' },
        },
      },
      ollama,
      qdrant: {
        image: serviceImage(config, 'qdrant'),
        container_name: container('qdrant'),
        restart: 'unless-stopped',
        ports: portMapping(config, 'qdrant'),
        env_file: ['.env'],
        volumes: ['qdrant_data:/qdrant/storage'],
      },
      crawl4ai: {
        image: serviceImage(config, 'crawl4ai'),
        container_name: container('crawl4ai'),
        restart: 'unless-stopped',
        ports: portMapping(config, 'crawl4ai'),
        env_file: ['.env'],
        shm_size: '1g',
      },
    },
    volumes: {
      postgres_data: {},
      n8n_data: {},
      ollama_data: {},
      qdrant_data: {},
    },
  };
}

export function renderDockerCompose(config: DeploymentConfiguration): string {
  return yaml.dump(buildComposeDocument(config), { lineWidth: -1, noRefs: true });
}

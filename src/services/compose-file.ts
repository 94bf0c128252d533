import fs from 'fs-extra';
import yaml from 'js-yaml';
import { join } from 'node:path';

import { ADMIN_PORT_OFFSET, CONTAINER_PORTS } from '../config/ports.js';
import { AdminCredentials, COMPOSE_FILE, CONTENT_DIR, DATABASE } from '../config/settings.js';

export interface HealthCheck {
  interval: string;
  retries: number;
  test: string[];
  timeout: string;
}

export interface ComposeServiceDefinition {
  build?: { context: string; dockerfile: string };
  command?: string[];
  depends_on?: Record<string, { condition: 'service_healthy' | 'service_started' }>;
  entrypoint?: string[];
  environment?: Record<string, string>;
  healthcheck?: HealthCheck;
  image?: string;
  networks?: string[];
  platform?: string;
  ports?: string[];
  restart?: string;
  volumes?: string[];
}

export interface ComposeDefinition {
  name: string;
  networks: Record<string, null>;
  services: {
    db: ComposeServiceDefinition;
    phpmyadmin: ComposeServiceDefinition;
    wordpress: ComposeServiceDefinition;
  };
  volumes: Record<string, null>;
}

export interface ComposeOptions {
  admin: AdminCredentials;
  instance: string;
  primaryPort: number;
  siteTitle: string;
}

/** Port entry as found in a compose file: short string syntax or long object syntax. */
export type ComposePortEntry = number | string | { published?: number | string; target?: number | string };

export interface ParsedComposeFile {
  services: Record<string, { ports: ComposePortEntry[] }>;
}

export interface DeclaredPorts {
  admin?: number;
  primary?: number;
}

const NETWORK = 'wordpress_net';

// Apache runs in the background while the installer completes the first-time
// setup. `$$` escapes compose variable interpolation.
const WORDPRESS_STARTUP = [
  'apache2-foreground &',
  'APACHE_PID=$$!',
  'sleep 5',
  '/usr/local/bin/wp-installer.sh',
  'wait $$APACHE_PID',
].join('\n');

export function adminPortFor(primaryPort: number): number {
  return primaryPort + ADMIN_PORT_OFFSET;
}

export function buildComposeDefinition(options: ComposeOptions): ComposeDefinition {
  const siteUrl = `http://localhost:${options.primaryPort}`;

  return {
    name: options.instance,
    networks: { [NETWORK]: null },
    services: {
      db: {
        environment: {
          MYSQL_DATABASE: DATABASE.NAME,
          MYSQL_PASSWORD: DATABASE.PASSWORD,
          MYSQL_ROOT_PASSWORD: DATABASE.ROOT_PASSWORD,
          MYSQL_USER: DATABASE.USER,
        },
        healthcheck: {
          interval: '5s',
          retries: 5,
          test: ['CMD', 'mysqladmin', 'ping', '-h', 'localhost'],
          timeout: '20s',
        },
        image: 'mysql:5.7',
        networks: [NETWORK],
        platform: 'linux/amd64',
        restart: 'unless-stopped',
        volumes: ['db_data:/var/lib/mysql'],
      },
      phpmyadmin: {
        depends_on: { db: { condition: 'service_healthy' } },
        environment: {
          PMA_HOST: DATABASE.HOST,
          PMA_PASSWORD: DATABASE.PASSWORD,
          PMA_USER: DATABASE.USER,
        },
        image: 'phpmyadmin:latest',
        networks: [NETWORK],
        ports: [`${adminPortFor(options.primaryPort)}:${CONTAINER_PORTS.HTTP}`],
        restart: 'unless-stopped',
      },
      wordpress: {
        build: { context: '.', dockerfile: 'Dockerfile' },
        command: [WORDPRESS_STARTUP],
        depends_on: { db: { condition: 'service_healthy' } },
        entrypoint: ['/bin/bash', '-c'],
        environment: {
          WORDPRESS_ADMIN_EMAIL: options.admin.email,
          WORDPRESS_ADMIN_PASSWORD: options.admin.password,
          WORDPRESS_ADMIN_USER: options.admin.user,
          WORDPRESS_DB_HOST: DATABASE.HOST,
          WORDPRESS_DB_NAME: DATABASE.NAME,
          WORDPRESS_DB_PASSWORD: DATABASE.PASSWORD,
          WORDPRESS_DB_USER: DATABASE.USER,
          WORDPRESS_SITE_TITLE: options.siteTitle,
          WORDPRESS_SITE_URL: siteUrl,
        },
        image: `${options.instance}-wordpress`,
        networks: [NETWORK],
        platform: 'linux/amd64',
        ports: [`${options.primaryPort}:${CONTAINER_PORTS.HTTP}`],
        restart: 'unless-stopped',
        volumes: ['wp_data:/var/www/html', `./${CONTENT_DIR}:/var/www/html/${CONTENT_DIR}`],
      },
    },
    volumes: { db_data: null, wp_data: null },
  };
}

export function serializeComposeDefinition(definition: ComposeDefinition): string {
  return yaml.dump(definition, { lineWidth: -1, noRefs: true });
}

export async function writeComposeFile(directory: string, definition: ComposeDefinition): Promise<string> {
  const file = join(directory, COMPOSE_FILE);
  await fs.writeFile(file, serializeComposeDefinition(definition), 'utf8');
  return file;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPortEntry(value: unknown): value is ComposePortEntry {
  return typeof value === 'number' || typeof value === 'string' || isRecord(value);
}

/**
 * Loads a compose document and keeps the parts the tool reads back.
 * Throws when the document is not a mapping with a `services` mapping.
 */
export function parseComposeFile(text: string): ParsedComposeFile {
  const document: unknown = yaml.load(text);
  if (!isRecord(document) || !isRecord(document.services)) {
    throw new Error('Compose file has no services mapping');
  }

  const services: ParsedComposeFile['services'] = {};
  for (const [name, service] of Object.entries(document.services)) {
    const ports = isRecord(service) && Array.isArray(service.ports) ? service.ports.filter(isPortEntry) : [];
    services[name] = { ports };
  }

  return { services };
}

function toPort(value: number | string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const port = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isInteger(port) ? port : undefined;
}

/**
 * Host port published for `containerPort` by one port entry, if any.
 * Accepts `8080:80`, `127.0.0.1:8080:80`, `8080:80/tcp` and the long syntax.
 */
export function hostPortOf(entry: ComposePortEntry, containerPort: number): number | undefined {
  if (typeof entry === 'number') {
    return undefined;
  }

  if (typeof entry === 'string') {
    const parts = entry.replace(/\/(tcp|udp)$/, '').split(':');
    if (parts.length < 2) {
      return undefined;
    }

    const target = toPort(parts.at(-1));
    return target === containerPort ? toPort(parts.at(-2)) : undefined;
  }

  return toPort(entry.target) === containerPort ? toPort(entry.published) : undefined;
}

export function declaredHostPort(
  compose: ParsedComposeFile,
  service: string,
  containerPort: number = CONTAINER_PORTS.HTTP,
): number | undefined {
  for (const entry of compose.services[service]?.ports ?? []) {
    const port = hostPortOf(entry, containerPort);
    if (port !== undefined) {
      return port;
    }
  }

  return undefined;
}

/**
 * Reads the WordPress and phpMyAdmin host ports of an instance directory.
 * Missing or unreadable files yield no ports.
 */
export async function readDeclaredPorts(directory: string): Promise<DeclaredPorts> {
  let text: string;
  try {
    text = await fs.readFile(join(directory, COMPOSE_FILE), 'utf8');
  } catch {
    return {};
  }

  try {
    const compose = parseComposeFile(text);
    return {
      admin: declaredHostPort(compose, 'phpmyadmin'),
      primary: declaredHostPort(compose, 'wordpress'),
    };
  } catch {
    return {};
  }
}

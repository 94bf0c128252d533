import fs from 'fs-extra';
import { join } from 'node:path';

import { COMPOSE_FILE, INSTANCE_PREFIX } from '../config/settings.js';
import { InstanceNotFoundError } from '../errors.js';
import { readDeclaredPorts } from './compose-file.js';
import { IComposeService } from './docker-interface.js';

export type InstanceState = 'failed' | 'not-created' | 'provisioning' | 'ready' | 'removed';

export type RuntimeStatus = 'Error' | 'Running' | 'Stopped';

export interface InstanceInfo {
  adminPort?: number;
  directory: string;
  name: string;
  primaryPort?: number;
}

/**
 * Replaces anything outside [a-zA-Z0-9] with `-`, collapses repeats and
 * trims the ends.
 */
export function sanitizeName(raw: string): string {
  return raw
    .replaceAll(/[^a-zA-Z0-9]/g, '-')
    .replaceAll(/-+/g, '-')
    .replaceAll(/^-|-$/g, '');
}

export function instanceName(raw: string): string {
  const bare = raw.startsWith(INSTANCE_PREFIX) ? raw.slice(INSTANCE_PREFIX.length) : raw;
  const sanitized = sanitizeName(bare);
  if (!sanitized) {
    throw new Error(`"${raw}" does not contain any usable characters for a site name`);
  }

  return `${INSTANCE_PREFIX}${sanitized}`;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `wp-test-YYYYMMDD-HHMMSS` in local time. */
export function timestampName(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${INSTANCE_PREFIX}${day}-${time}`;
}

/**
 * The set of instance directories in one workspace.
 */
export class InstanceRegistry {
  readonly workspace: string;

  constructor(workspace: string) {
    this.workspace = workspace;
  }

  /**
   * Primary ports declared by every instance, optionally skipping one.
   */
  async declaredPorts(excluding?: string): Promise<Map<number, string>> {
    const ports = new Map<number, string>();
    for (const instance of await this.listInstances()) {
      if (instance.name !== excluding && instance.primaryPort !== undefined && !ports.has(instance.primaryPort)) {
        ports.set(instance.primaryPort, instance.name);
      }
    }

    return ports;
  }

  directoryFor(name: string): string {
    return join(this.workspace, name);
  }

  async findInstance(nameOrSite: string): Promise<InstanceInfo> {
    const candidates = nameOrSite.startsWith(INSTANCE_PREFIX) ? [nameOrSite] : [nameOrSite, instanceName(nameOrSite)];
    const instances = await this.listInstances();
    const match = instances.find((instance) => candidates.includes(instance.name));
    if (!match) {
      throw new InstanceNotFoundError(nameOrSite);
    }

    return match;
  }

  async listInstances(): Promise<InstanceInfo[]> {
    if (!(await fs.pathExists(this.workspace))) {
      return [];
    }

    const entries = await fs.readdir(this.workspace, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isDirectory() && entry.name.startsWith(INSTANCE_PREFIX))
      .map((entry) => entry.name)
      .sort();

    const instances = await Promise.all(
      names.map(async (name): Promise<InstanceInfo | undefined> => {
        const directory = this.directoryFor(name);
        if (!(await fs.pathExists(join(directory, COMPOSE_FILE)))) {
          return undefined;
        }

        const ports = await readDeclaredPorts(directory);
        return { adminPort: ports.admin, directory, name, primaryPort: ports.primary };
      }),
    );

    return instances.filter((instance): instance is InstanceInfo => instance !== undefined);
  }
}

/**
 * Running when services run and one reports `Up`, Error when services are
 * listed as running but none is up, Stopped otherwise.
 */
export async function runtimeStatus(compose: IComposeService): Promise<RuntimeStatus> {
  try {
    const running = await compose.runningServices();
    if (running.length === 0) {
      return 'Stopped';
    }

    const ps = await compose.ps();
    return /\bUp\b|\brunning\b/.test(ps) ? 'Running' : 'Error';
  } catch {
    return 'Stopped';
  }
}

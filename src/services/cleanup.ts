import fs from 'fs-extra';

import { CONTENT_DIR, INSTANCE_PREFIX } from '../config/settings.js';
import { Reporter, silentReporter } from '../lib/reporter.js';
import { ComposeFactory, IDockerHost } from './docker-interface.js';
import { InstanceInfo, InstanceRegistry } from './instances.js';
import { WORDPRESS_SERVICE } from './wp-cli.js';

export type Confirm = (question: string) => Promise<boolean>;

export interface InstanceCleanerOptions {
  composeFactory: ComposeFactory;
  confirm: Confirm;
  dockerHost: IDockerHost;
  owner?: { gid: number; uid: number };
  registry: InstanceRegistry;
  reporter?: Reporter;
}

export interface CleanupSummary {
  orphans: string[];
  removed: string[];
  skipped: string[];
}

const ORPHAN_VOLUME = new RegExp(`^(${INSTANCE_PREFIX}.*)_(wp_data|db_data)$`);
const ORPHAN_NETWORK = new RegExp(`^(${INSTANCE_PREFIX}.*)_wordpress_net$`);

/**
 * Tears instances down completely: containers, volumes, directory.
 */
export class InstanceCleaner {
  private readonly options: InstanceCleanerOptions;
  private readonly owner: { gid: number; uid: number };
  private readonly reporter: Reporter;

  constructor(options: InstanceCleanerOptions) {
    this.options = options;
    this.owner = options.owner ?? { gid: process.getgid?.() ?? 0, uid: process.getuid?.() ?? 0 };
    this.reporter = options.reporter ?? silentReporter;
  }

  /**
   * Removes every instance in the workspace, then orphaned volumes and
   * networks. Running instances need confirmation unless forced.
   */
  async cleanupAll(force = false): Promise<CleanupSummary> {
    const summary: CleanupSummary = { orphans: [], removed: [], skipped: [] };
    const instances = await this.options.registry.listInstances();
    if (instances.length === 0) {
      this.reporter.info('No WordPress instances found');
    }

    for (const instance of instances) {
      const compose = this.options.composeFactory(instance.directory);
      // eslint-disable-next-line no-await-in-loop
      const running = (await compose.runningServices().catch(() => [])).length > 0;
      if (running && !force) {
        // eslint-disable-next-line no-await-in-loop
        const confirmed = await this.options.confirm(`${instance.name} is running. Stop and remove it?`);
        if (!confirmed) {
          summary.skipped.push(instance.name);
          continue;
        }
      }

      // eslint-disable-next-line no-await-in-loop
      await this.removeInstance(instance, running);
      summary.removed.push(instance.name);
    }

    summary.orphans = await this.removeOrphans(force);
    return summary;
  }

  /**
   * Lists Docker volumes and networks left behind by instances whose
   * directory no longer exists.
   */
  async findOrphans(): Promise<{ networks: string[]; volumes: string[] }> {
    const { dockerHost, registry } = this.options;
    const live = new Set((await registry.listInstances()).map((instance) => instance.name));
    const orphaned = (pattern: RegExp) => (name: string) => {
      const match = pattern.exec(name);
      return match !== null && !live.has(match[1]);
    };

    const [volumes, networks] = await Promise.all([dockerHost.listVolumes(), dockerHost.listNetworks()]);
    return {
      networks: networks.filter(orphaned(ORPHAN_NETWORK)),
      volumes: volumes.filter(orphaned(ORPHAN_VOLUME)),
    };
  }

  /**
   * Hands wp-content back to the host user, brings the project down with its
   * volumes and deletes the directory. A stopped instance is started briefly
   * so the ownership fix can run inside the container.
   */
  async removeInstance(instance: InstanceInfo, running: boolean): Promise<void> {
    const compose = this.options.composeFactory(instance.directory);
    this.reporter.info(`Removing ${instance.name}...`);

    if (!running) {
      await compose.up([WORDPRESS_SERVICE, 'db']).catch((error: unknown) => {
        this.reporter.debug(`could not start ${instance.name}: ${String(error)}`);
      });
    }

    const owner = `${this.owner.uid}:${this.owner.gid}`;
    const chown = await compose.exec(WORDPRESS_SERVICE, ['chown', '-R', owner, `/var/www/html/${CONTENT_DIR}`]);
    if (chown.exitCode !== 0) {
      this.reporter.debug(`chown in ${instance.name} failed: ${chown.stderr}`);
    }

    try {
      await compose.down({ volumes: true });
    } catch (error) {
      this.reporter.warn(`docker compose down failed for ${instance.name}: ${error instanceof Error ? error.message : String(error)}`);
    }

    await fs.remove(instance.directory);
    this.reporter.success(`Removed ${instance.name}`);
  }

  async removeOrphans(force = false): Promise<string[]> {
    const { networks, volumes } = await this.findOrphans();
    const names = [...volumes.map((name) => `volume ${name}`), ...networks.map((name) => `network ${name}`)];
    if (names.length === 0) {
      return [];
    }

    if (!force && !(await this.options.confirm(`Remove ${names.length} orphaned Docker resources (${names.join(', ')})?`))) {
      return [];
    }

    const removed: string[] = [];
    for (const volume of volumes) {
      // eslint-disable-next-line no-await-in-loop
      if (await this.tryRemove(() => this.options.dockerHost.removeVolume(volume), `volume ${volume}`)) {
        removed.push(volume);
      }
    }

    for (const network of networks) {
      // eslint-disable-next-line no-await-in-loop
      if (await this.tryRemove(() => this.options.dockerHost.removeNetwork(network), `network ${network}`)) {
        removed.push(network);
      }
    }

    return removed;
  }

  private async tryRemove(action: () => Promise<void>, label: string): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (error) {
      this.reporter.warn(`Could not remove ${label}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}

import chalk from 'chalk';

import { NoPortAvailableError } from '../errors.js';
import { runtimeStatus } from '../services/instances.js';
import { BaseCommand } from './base.js';

export default class Ports extends BaseCommand {
  static description = 'Show the ports used by instances and the next free one';
  static examples = ['$ wpdock ports'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    await this.parse(Ports);
    const instances = (await this.registry.listInstances())
      .filter((instance) => instance.primaryPort !== undefined)
      .sort((a, b) => (a.primaryPort ?? 0) - (b.primaryPort ?? 0));

    if (instances.length === 0) {
      this.log(chalk.yellow('No ports in use by WordPress instances'));
    } else {
      this.log(chalk.bold(`${'PORT'.padEnd(8)}${'ADMIN'.padEnd(8)}${'INSTANCE'.padEnd(32)}STATUS`));
      for (const instance of instances) {
        // eslint-disable-next-line no-await-in-loop
        const status = await runtimeStatus(this.composeFor(instance));
        const admin = instance.adminPort === undefined ? '-' : String(instance.adminPort);
        this.log(`${String(instance.primaryPort).padEnd(8)}${admin.padEnd(8)}${instance.name.padEnd(32)}${this.statusColor(status)}`);
      }
    }

    try {
      const next = await this.createAllocator().findAvailablePort();
      this.log(`\nNext available port: ${chalk.cyan(next)}`);
    } catch (error) {
      if (!(error instanceof NoPortAvailableError)) {
        throw error;
      }

      this.log(`\nNext available port: ${chalk.red('None available')}`);
    }
  }
}

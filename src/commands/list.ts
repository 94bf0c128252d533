import chalk from 'chalk';

import { runtimeStatus } from '../services/instances.js';
import { localUrl } from '../services/provisioner.js';
import { BaseCommand } from './base.js';

export default class List extends BaseCommand {
  static aliases = ['ls'];
  static description = 'List WordPress instances in the workspace';
  static examples = ['$ wpdock list', '$ wpdock list --workspace ~/sites'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    await this.parse(List);
    const instances = await this.registry.listInstances();
    if (instances.length === 0) {
      this.log(chalk.yellow(`No WordPress instances found in ${this.settings.workspace}`));
      return;
    }

    this.log(chalk.bold(`${'NAME'.padEnd(32)}${'STATUS'.padEnd(10)}${'PORT'.padEnd(8)}URL`));
    for (const instance of instances) {
      // eslint-disable-next-line no-await-in-loop
      const status = await runtimeStatus(this.composeFor(instance));
      const port = instance.primaryPort === undefined ? '-' : String(instance.primaryPort);
      const url = instance.primaryPort === undefined ? '-' : localUrl(instance.primaryPort);
      this.log(`${instance.name.padEnd(32)}${this.statusColor(status)}${' '.repeat(10 - status.length)}${port.padEnd(8)}${url}`);
    }
  }
}

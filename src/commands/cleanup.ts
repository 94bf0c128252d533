import { Flags } from '@oclif/core';
import chalk from 'chalk';

import { InstanceCleaner } from '../services/cleanup.js';
import { BaseCommand } from './base.js';

export default class Cleanup extends BaseCommand {
  static description = 'Remove every WordPress instance in the workspace plus orphaned Docker volumes and networks';
  static examples = ['$ wpdock cleanup', '$ wpdock cleanup --force'];
  static flags = {
    ...BaseCommand.baseFlags,
    force: Flags.boolean({
      char: 'f',
      default: false,
      description: 'Remove running instances and orphans without asking',
    }),
  };
  static hidden = false;

  async run(): Promise<void> {
    const { flags } = await this.parse(Cleanup);
    await this.checkDockerEnvironment();

    const cleaner = new InstanceCleaner({
      composeFactory: this.composeFactory,
      confirm: (message) => this.confirm(message),
      dockerHost: this.dockerHost,
      registry: this.registry,
      reporter: this.reporter,
    });
    const summary = await cleaner.cleanupAll(flags.force);

    this.log(`\n${chalk.green.bold('Cleanup complete')}`);
    this.log(`Removed instances: ${summary.removed.length > 0 ? summary.removed.join(', ') : 'none'}`);
    if (summary.skipped.length > 0) {
      this.log(`Skipped: ${summary.skipped.join(', ')}`);
    }

    if (summary.orphans.length > 0) {
      this.log(`Removed Docker resources: ${summary.orphans.join(', ')}`);
    }
  }
}

import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';

import { InstanceCleaner } from '../services/cleanup.js';
import { BaseCommand } from './base.js';

export default class Remove extends BaseCommand {
  static aliases = ['rm'];
  static args = {
    name: Args.string({ description: 'Instance to remove', required: true }),
  };
  static description = 'Remove a WordPress instance with its containers, volumes and files';
  static examples = ['$ wpdock remove my-site', '$ wpdock remove my-site --force'];
  static flags = {
    ...BaseCommand.baseFlags,
    force: Flags.boolean({
      char: 'f',
      default: false,
      description: 'Skip the confirmation prompt',
    }),
  };
  static hidden = false;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Remove);
    await this.checkDockerEnvironment();

    const instance = await this.registry.findInstance(args.name);
    if (!flags.force) {
      this.log(chalk.red(`This will permanently delete ${instance.name} and all of its data.`));
      const answer = await this.ask('Type "yes" to confirm:');
      if (answer !== 'yes') {
        this.log('Removal cancelled');
        return;
      }
    }

    const cleaner = new InstanceCleaner({
      composeFactory: this.composeFactory,
      confirm: (message) => this.confirm(message),
      dockerHost: this.dockerHost,
      registry: this.registry,
      reporter: this.reporter,
    });
    // Unreadable status counts as stopped.
    const services = await this.composeFor(instance)
      .runningServices()
      .catch((): string[] => []);
    await cleaner.removeInstance(instance, services.length > 0);
  }
}

import { Args } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';

import { BaseCommand } from './base.js';

export default class Stop extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Instance to stop (all instances when omitted)', required: false }),
  };
  static description = 'Stop one WordPress instance, or all of them';
  static examples = ['$ wpdock stop', '$ wpdock stop my-site'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    const { args } = await this.parse(Stop);
    await this.checkDockerEnvironment();

    const instances = args.name ? [await this.registry.findInstance(args.name)] : await this.registry.listInstances();
    if (instances.length === 0) {
      this.log(chalk.yellow('No WordPress instances found'));
      return;
    }

    const spinner = ora();
    for (const instance of instances) {
      spinner.start(`Stopping ${instance.name}...`);
      try {
        // eslint-disable-next-line no-await-in-loop
        await this.composeFor(instance).down();
        spinner.succeed(`${instance.name} stopped`);
      } catch (error) {
        spinner.fail(`Failed to stop ${instance.name}`);
        throw error;
      }
    }
  }
}

import { Args } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';

import { InstanceInfo } from '../services/instances.js';
import { localUrl } from '../services/provisioner.js';
import { BaseCommand } from './base.js';

export default class Start extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Instance to start (all instances when omitted)', required: false }),
  };
  static description = 'Start one WordPress instance, or all of them';
  static examples = ['$ wpdock start', '$ wpdock start my-site', '$ wpdock start wp-test-my-site'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    const { args } = await this.parse(Start);
    await this.checkDockerEnvironment();

    const instances = args.name ? [await this.registry.findInstance(args.name)] : await this.registry.listInstances();
    if (instances.length === 0) {
      this.log(chalk.yellow('No WordPress instances found'));
      return;
    }

    for (const instance of instances) {
      // eslint-disable-next-line no-await-in-loop
      await this.startInstance(instance);
    }
  }

  private async startInstance(instance: InstanceInfo): Promise<void> {
    const spinner = ora(`Starting ${instance.name}...`).start();
    try {
      await this.composeFor(instance).up();
      const url = instance.primaryPort === undefined ? '' : ` at ${chalk.cyan(localUrl(instance.primaryPort))}`;
      spinner.succeed(`${instance.name} started${url}`);
    } catch (error) {
      spinner.fail(`Failed to start ${instance.name}`);
      throw error;
    }
  }
}

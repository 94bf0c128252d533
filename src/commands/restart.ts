import { Args } from '@oclif/core';
import ora from 'ora';

import { BaseCommand } from './base.js';

export default class Restart extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Instance to restart', required: true }),
  };
  static description = 'Restart a WordPress instance (down, then up)';
  static examples = ['$ wpdock restart my-site'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    const { args } = await this.parse(Restart);
    await this.checkDockerEnvironment();

    const instance = await this.registry.findInstance(args.name);
    const compose = this.composeFor(instance);
    const spinner = ora(`Restarting ${instance.name}...`).start();
    try {
      await compose.down();
      await compose.up();
      spinner.succeed(`${instance.name} restarted`);
    } catch (error) {
      spinner.fail(`Failed to restart ${instance.name}`);
      throw error;
    }
  }
}

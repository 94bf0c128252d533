import { Args } from '@oclif/core';
import chalk from 'chalk';

import { runtimeStatus } from '../services/instances.js';
import { BaseCommand } from './base.js';

export default class Status extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Instance to inspect', required: true }),
  };
  static description = 'Show the container status of a WordPress instance';
  static examples = ['$ wpdock status my-site'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    const { args } = await this.parse(Status);
    await this.checkDockerEnvironment();

    const instance = await this.registry.findInstance(args.name);
    const compose = this.composeFor(instance);
    const status = await runtimeStatus(compose);

    this.log(`${chalk.bold(instance.name)}: ${this.statusColor(status)}`);
    this.log(await compose.ps());
  }
}

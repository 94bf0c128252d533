import { Args, Flags } from '@oclif/core';

import { BaseCommand } from './base.js';

export default class Logs extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Instance whose logs to show', required: true }),
  };
  static description = 'View container logs of a WordPress instance';
  static examples = [
    '$ wpdock logs my-site',
    '$ wpdock logs my-site --service db',
    '$ wpdock logs my-site --follow',
  ];
  static flags = {
    ...BaseCommand.baseFlags,
    follow: Flags.boolean({
      char: 'f',
      default: false,
      description: 'Keep streaming new log lines',
    }),
    service: Flags.string({
      char: 's',
      description: 'Only this service',
      options: ['wordpress', 'db', 'phpmyadmin'],
    }),
  };
  static hidden = false;

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Logs);
    await this.checkDockerEnvironment();

    const instance = await this.registry.findInstance(args.name);
    await this.composeFor(instance).streamLogs({ follow: flags.follow, service: flags.service });
  }
}

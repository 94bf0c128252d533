import { Args } from '@oclif/core';

import { WORDPRESS_SERVICE } from '../services/wp-cli.js';
import { BaseCommand } from './base.js';

export default class Wp extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Instance to run WP-CLI in', required: true }),
  };
  static description = 'Run a WP-CLI command inside an instance';
  static examples = ['$ wpdock wp my-site -- plugin list', '$ wpdock wp my-site -- option get siteurl'];
  static flags = {
    ...BaseCommand.baseFlags,
  };
  static hidden = false;
  static strict = false;

  async run(): Promise<void> {
    const { args, argv } = await this.parse(Wp);
    const rest = argv.filter((value): value is string => typeof value === 'string').slice(1);
    const wpArgs = rest[0] === '--' ? rest.slice(1) : rest;
    if (wpArgs.length === 0) {
      this.error('Pass the WP-CLI arguments after --, for example: wpdock wp my-site -- plugin list', { exit: 1 });
    }

    const instance = await this.registry.findInstance(args.name);
    const exitCode = await this.composeFor(instance).execInteractive(WORDPRESS_SERVICE, [
      'wp',
      ...wpArgs,
      '--allow-root',
    ]);
    if (exitCode !== 0) {
      this.exit(exitCode);
    }
  }
}

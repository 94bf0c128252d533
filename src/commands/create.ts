import { Args } from '@oclif/core';

import { ProvisionCommand } from './base.js';

export default class Create extends ProvisionCommand {
  static args = {
    name: Args.string({ description: 'Site name (defaults to a timestamp)', required: false }),
  };
  static description = 'Create a fresh WordPress instance and wait until it is ready';
  static examples = [
    '$ wpdock create',
    '$ wpdock create my-site',
    '$ wpdock create my-site --port 8090',
    '$ wpdock create --start-port 8100 --cleanup',
  ];
  static flags = {
    ...ProvisionCommand.baseFlags,
    ...ProvisionCommand.provisioningFlags,
  };
  static hidden = false;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Create);

    const provisioner = this.createProvisioner();
    const job = await provisioner.validateCreate({
      name: args.name,
      port: flags.port,
      startPort: flags['start-port'],
    });

    await this.checkDockerEnvironment();
    if (flags.cleanup) {
      await this.preCleanup();
    }

    const result = await provisioner.execute(job);

    this.printSummary('WordPress Site Created!', result);
  }
}

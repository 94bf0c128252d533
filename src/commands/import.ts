import { Flags } from '@oclif/core';

import { ProvisionCommand } from './base.js';

export default class Import extends ProvisionCommand {
  static description = 'Create an instance from a database dump and a wp-content directory or archive';
  static examples = [
    '$ wpdock import --name shop --db ./backup.sql --content ./wp-content',
    '$ wpdock import -n shop -d ./backup.sql -c ./wp-content.tar.gz --port 8090',
  ];
  static flags = {
    ...ProvisionCommand.baseFlags,
    ...ProvisionCommand.provisioningFlags,
    content: Flags.string({
      char: 'c',
      description: 'wp-content directory, .tar or .tar.gz archive',
      required: true,
    }),
    db: Flags.string({
      char: 'd',
      description: 'SQL dump to import',
      required: true,
    }),
    name: Flags.string({
      char: 'n',
      description: 'Site name; the instance becomes wp-test-<name>',
      required: true,
    }),
  };
  static hidden = false;

  async run(): Promise<void> {
    const { flags } = await this.parse(Import);

    const provisioner = this.createProvisioner();
    const job = await provisioner.validateImport({
      contentSource: flags.content,
      databaseFile: flags.db,
      name: flags.name,
      port: flags.port,
      startPort: flags['start-port'],
    });

    await this.checkDockerEnvironment();
    if (flags.cleanup) {
      await this.preCleanup();
    }

    const result = await provisioner.execute(job);

    this.printSummary('WordPress Site Import Complete!', result);
  }
}

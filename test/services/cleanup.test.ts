import { expect } from 'chai';
import fs from 'fs-extra';
import { join } from 'node:path';
import { stub } from 'sinon';

import { DEFAULT_ADMIN } from '../../src/config/settings.js';
import { InstanceCleaner } from '../../src/services/cleanup.js';
import { FakeComposeService, FakeDockerHost } from '../../src/services/__mocks__/docker.js';
import { buildComposeDefinition, writeComposeFile } from '../../src/services/compose-file.js';
import { InstanceRegistry } from '../../src/services/instances.js';
import { makeTempDir } from '../helpers/temp.js';

describe('InstanceCleaner', () => {
  let workspace: string;
  let composes: Map<string, FakeComposeService>;
  let dockerHost: FakeDockerHost;

  const addInstance = async (name: string, port: number, running: boolean) => {
    const directory = join(workspace, name);
    await fs.ensureDir(directory);
    await writeComposeFile(directory, buildComposeDefinition({
      admin: DEFAULT_ADMIN,
      instance: name,
      primaryPort: port,
      siteTitle: name,
    }));
    const compose = new FakeComposeService(directory);
    compose.running = running ? ['db', 'wordpress'] : [];
    composes.set(directory, compose);
    return compose;
  };

  const cleaner = (confirm = stub().resolves(false)) =>
    new InstanceCleaner({
      composeFactory: (directory) => composes.get(directory) ?? new FakeComposeService(directory),
      confirm,
      dockerHost,
      owner: { gid: 1000, uid: 1000 },
      registry: new InstanceRegistry(workspace),
    });

  beforeEach(async () => {
    workspace = await makeTempDir();
    composes = new Map();
    dockerHost = new FakeDockerHost();
  });

  it('finds volumes and networks of instances that no longer exist', async () => {
    await addInstance('wp-test-live', 8080, false);
    dockerHost.volumes = ['wp-test-live_db_data', 'wp-test-gone_db_data', 'wp-test-gone_wp_data', 'unrelated_db_data'];
    dockerHost.networks = ['bridge', 'wp-test-gone_wordpress_net', 'wp-test-live_wordpress_net'];

    expect(await cleaner().findOrphans()).to.deep.equal({
      networks: ['wp-test-gone_wordpress_net'],
      volumes: ['wp-test-gone_db_data', 'wp-test-gone_wp_data'],
    });
  });

  it('removes a stopped instance after starting it for the ownership fix', async () => {
    const compose = await addInstance('wp-test-idle', 8080, false);

    const summary = await cleaner().cleanupAll();

    expect(summary).to.deep.equal({ orphans: [], removed: ['wp-test-idle'], skipped: [] });
    expect(compose.calls).to.deep.equal([
      'running-services',
      'up wordpress db',
      'exec wordpress chown -R 1000:1000 /var/www/html/wp-content',
      'down -v',
    ]);
    expect(await fs.pathExists(join(workspace, 'wp-test-idle'))).to.be.false;
  });

  it('skips running instances the user declines to remove', async () => {
    const compose = await addInstance('wp-test-busy', 8080, true);
    const confirm = stub().resolves(false);

    const summary = await cleaner(confirm).cleanupAll();

    expect(summary.skipped).to.deep.equal(['wp-test-busy']);
    expect(confirm.firstCall.args[0]).to.equal('wp-test-busy is running. Stop and remove it?');
    expect(compose.calls).to.deep.equal(['running-services']);
    expect(await fs.pathExists(join(workspace, 'wp-test-busy'))).to.be.true;
  });

  it('removes running instances and orphans without asking when forced', async () => {
    await addInstance('wp-test-busy', 8080, true);
    dockerHost.volumes = ['wp-test-old_db_data'];
    dockerHost.networks = ['wp-test-old_wordpress_net'];
    const confirm = stub().resolves(false);

    const summary = await cleaner(confirm).cleanupAll(true);

    expect(confirm.called).to.be.false;
    expect(summary).to.deep.equal({
      orphans: ['wp-test-old_db_data', 'wp-test-old_wordpress_net'],
      removed: ['wp-test-busy'],
      skipped: [],
    });
    expect(dockerHost.removed).to.deep.equal(['volume wp-test-old_db_data', 'network wp-test-old_wordpress_net']);
  });

  it('keeps orphans when removal is not confirmed', async () => {
    dockerHost.volumes = ['wp-test-old_wp_data'];

    expect(await cleaner().removeOrphans()).to.deep.equal([]);
    expect(dockerHost.volumes).to.deep.equal(['wp-test-old_wp_data']);
  });

  it('still deletes the directory when compose down fails', async () => {
    const compose = await addInstance('wp-test-broken', 8080, true);
    compose.downError = new Error('daemon gone');

    await cleaner().cleanupAll(true);

    expect(await fs.pathExists(join(workspace, 'wp-test-broken'))).to.be.false;
  });
});

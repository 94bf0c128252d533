import { expect } from 'chai';
import fs from 'fs-extra';
import { join } from 'node:path';

import List from '../../src/commands/list.js';
import { FakeComposeService, FakeDockerHost } from '../../src/services/__mocks__/docker.js';
import { loadConfig, writeInstance } from '../helpers/command.js';
import { makeTempDir } from '../helpers/temp.js';

describe('list', () => {
  let composes: Map<string, FakeComposeService>;
  let workspace: string;

  class ListUnderTest extends List {
    lines: string[] = [];

    async init(): Promise<void> {
      await super.init();
      this.composeFactory = (directory) => composes.get(directory) ?? new FakeComposeService(directory);
      this.dockerHost = new FakeDockerHost();
    }

    log(message = ''): void {
      this.lines.push(message);
    }
  }

  const run = async (): Promise<string[]> => {
    const command = new ListUnderTest(['--workspace', workspace], await loadConfig());
    await command.init();
    await command.run();
    return command.lines;
  };

  beforeEach(async () => {
    composes = new Map();
    workspace = await makeTempDir();
  });

  it('reports an empty workspace', async () => {
    expect(await run()).to.deep.equal([`No WordPress instances found in ${workspace}`]);
  });

  it('prints one row per instance with its status and URL', async () => {
    await writeInstance(workspace, 'wp-test-alpha', 8080);
    const stopped = new FakeComposeService();
    stopped.running = [];
    composes.set(await writeInstance(workspace, 'wp-test-beta', 8081), stopped);

    expect(await run()).to.deep.equal([
      `${'NAME'.padEnd(32)}${'STATUS'.padEnd(10)}${'PORT'.padEnd(8)}URL`,
      `${'wp-test-alpha'.padEnd(32)}${'Running'.padEnd(10)}${'8080'.padEnd(8)}http://localhost:8080`,
      `${'wp-test-beta'.padEnd(32)}${'Stopped'.padEnd(10)}${'8081'.padEnd(8)}http://localhost:8081`,
    ]);
  });

  it('ignores directories without a compose file', async () => {
    await writeInstance(workspace, 'wp-test-alpha', 8080);
    await fs.ensureDir(join(workspace, 'wp-test-draft'));

    const lines = await run();
    expect(lines).to.have.length(2);
    expect(lines[1]).to.match(/^wp-test-alpha /);
  });
});

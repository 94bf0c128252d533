import { Errors } from '@oclif/core';
import { expect } from 'chai';
import fs from 'fs-extra';
import { EventEmitter } from 'node:events';
import { join } from 'node:path';
import { stub } from 'sinon';

import Create from '../../src/commands/create.js';
import Import from '../../src/commands/import.js';
import { FakeComposeService, FakeDockerHost } from '../../src/services/__mocks__/docker.js';
import { HostPortInspector } from '../../src/services/host-ports.js';
import { Provisioner } from '../../src/services/provisioner.js';
import { loadConfig, writeInstance } from '../helpers/command.js';
import { rejection } from '../helpers/rejection.js';
import { makeTempDir } from '../helpers/temp.js';

describe('create and import commands', () => {
  let composes: Map<string, FakeComposeService>;
  let workspace: string;

  const composeFactory = (directory: string): FakeComposeService => {
    const compose = composes.get(directory) ?? new FakeComposeService(directory);
    composes.set(directory, compose);
    return compose;
  };

  const freePorts: HostPortInspector = { isBound: async () => false };

  class CreateUnderTest extends Create {
    static args = Create.args;
    errors: string[] = [];
    lines: string[] = [];

    async init(): Promise<void> {
      await super.init();
      this.composeFactory = composeFactory;
      this.dockerHost = new FakeDockerHost();
      this.hostPorts = freePorts;
    }

    log(message = ''): void {
      this.lines.push(message);
    }

    logToStderr(message = ''): void {
      this.errors.push(message);
    }

    public _run<T>(): Promise<T> {
      return super._run<T>();
    }

    protected createProvisioner(): Provisioner {
      const claims = this.createClaims();
      return new Provisioner({
        allocator: this.createAllocator(claims),
        claims,
        composeFactory: this.composeFactory,
        exit: stub(),
        httpProbe: async () => true,
        registry: this.registry,
        reporter: this.reporter,
        settings: this.settings,
        signals: new EventEmitter(),
        sleep: async () => {},
      });
    }
  }

  class ImportUnderTest extends Import {
    errors: string[] = [];

    async init(): Promise<void> {
      await super.init();
      this.composeFactory = composeFactory;
      this.dockerHost = new FakeDockerHost();
      this.hostPorts = freePorts;
    }

    logToStderr(message = ''): void {
      this.errors.push(message);
    }

    public _run<T>(): Promise<T> {
      return super._run<T>();
    }
  }

  beforeEach(async () => {
    composes = new Map();
    workspace = await makeTempDir();
  });

  it('cleans up earlier instances before creating a new one', async () => {
    const old = await writeInstance(workspace, 'wp-test-old', 8080);

    const command = new CreateUnderTest(['blog', '--cleanup', '--workspace', workspace], await loadConfig());
    await command._run();

    expect(await fs.pathExists(old)).to.be.false;
    expect(await fs.pathExists(join(workspace, 'wp-test-blog', 'site-info.txt'))).to.be.true;
    expect(command.lines.slice(0, 5)).to.deep.equal([
      'Running cleanup of previous WordPress instances...',
      'Cleanup complete.\n',
      '\nWordPress Site Created!',
      'Instance:     wp-test-blog',
      'Site URL:     http://localhost:8080',
    ]);
  });

  it('rejects a privileged port before --cleanup touches anything', async () => {
    const keep = await writeInstance(workspace, 'wp-test-keep', 8080);

    const command = new CreateUnderTest(['blog', '--port', '80', '--cleanup', '--workspace', workspace], await loadConfig());
    const error = await rejection(command._run());

    expect(error).to.be.instanceOf(Errors.ExitError);
    expect(error).to.have.nested.property('oclif.exit', 1);
    expect(command.errors).to.have.length(1);
    expect(command.errors[0]).to.include('Invalid Port');
    expect(command.lines).to.deep.equal([]);
    expect(await fs.pathExists(keep)).to.be.true;
    expect(composeFactory(keep).calls).to.deep.equal([]);
    expect(await fs.pathExists(join(workspace, 'wp-test-blog'))).to.be.false;
  });

  it('rejects a missing dump before --cleanup touches anything', async () => {
    const keep = await writeInstance(workspace, 'wp-test-keep', 8080);
    const content = join(workspace, 'content');
    await fs.ensureDir(content);
    const dump = join(workspace, 'missing.sql');

    const command = new ImportUnderTest(
      ['--name', 'shop', '--db', dump, '--content', content, '--cleanup', '--workspace', workspace],
      await loadConfig(),
    );
    const error = await rejection(command._run());

    expect(error).to.have.nested.property('oclif.exit', 1);
    expect(command.errors).to.have.length(1);
    expect(command.errors[0]).to.include('Invalid Input');
    expect(command.errors[0]).to.include('Database file not found');
    expect(await fs.pathExists(keep)).to.be.true;
    expect(composeFactory(keep).calls).to.deep.equal([]);
  });
});

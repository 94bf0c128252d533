import { expect } from 'chai';
import fs from 'fs-extra';
import { EventEmitter } from 'node:events';
import { join } from 'node:path';
import { stub } from 'sinon';

import { WpdockError } from '../../src/errors.js';
import { FakeComposeService } from '../../src/services/__mocks__/docker.js';
import { ProvisioningGuard } from '../../src/services/provisioning-guard.js';
import { rejection } from '../helpers/rejection.js';
import { makeTempDir } from '../helpers/temp.js';

describe('ProvisioningGuard', () => {
  let compose: FakeComposeService;
  let directory: string;
  let signals: EventEmitter;

  const guard = (overrides: Partial<ConstructorParameters<typeof ProvisioningGuard>[0]> = {}) =>
    new ProvisioningGuard({
      compose,
      directory,
      exit: stub(),
      owner: { gid: 1000, uid: 1000 },
      signals,
      ...overrides,
    });

  beforeEach(async () => {
    compose = new FakeComposeService();
    directory = join(await makeTempDir(), 'wp-test-site');
    await fs.ensureDir(join(directory, 'wp-content'));
    signals = new EventEmitter();
  });

  it('removes the instance and rethrows when the body fails', async () => {
    const releaseClaim = stub().resolves();
    const provisioning = guard({ releaseClaim });

    await expect(provisioning.run(async () => {
      throw new Error('gate timed out');
    })).to.be.rejectedWith('gate timed out');

    expect(await fs.pathExists(directory)).to.be.false;
    expect(compose.calls).to.deep.equal(['exec wordpress chown -R 1000:1000 /var/www/html/wp-content', 'down -v']);
    expect(releaseClaim.calledOnce).to.be.true;
    expect(provisioning.state).to.equal('rolled-back');
  });

  it('keeps everything once committed', async () => {
    const provisioning = guard();

    const result = await provisioning.run(async () => 'ready');

    expect(result).to.equal('ready');
    expect(await fs.pathExists(directory)).to.be.true;
    expect(compose.calls).to.deep.equal([]);
    expect(provisioning.state).to.equal('committed');
  });

  it('keeps going when a cleanup step fails', async () => {
    compose.execHandler = () => ({ exitCode: 1, stderr: 'no such service: wordpress', stdout: '' });
    compose.downError = new Error('compose down failed');
    const provisioning = guard();
    provisioning.arm();

    await provisioning.rollback();

    expect(await fs.pathExists(directory)).to.be.false;
  });

  it('does nothing on rollback after commit', async () => {
    const provisioning = guard();
    provisioning.arm();
    provisioning.commit();

    await provisioning.rollback();

    expect(await fs.pathExists(directory)).to.be.true;
    expect(compose.calls).to.deep.equal([]);
  });

  it('listens for interrupts only while armed', () => {
    const provisioning = guard();

    provisioning.arm();
    expect(signals.listenerCount('SIGINT')).to.equal(1);
    expect(signals.listenerCount('SIGTERM')).to.equal(1);

    provisioning.commit();
    expect(signals.listenerCount('SIGINT')).to.equal(0);
    expect(signals.listenerCount('SIGTERM')).to.equal(0);
  });

  it('rolls back and exits 130 on SIGINT', async () => {
    const exit = stub();
    const done = new Promise<void>((resolve) => {
      exit.callsFake(() => resolve());
    });
    const provisioning = guard({ exit });
    provisioning.arm();

    signals.emit('SIGINT');
    await done;

    expect(exit.calledOnceWithExactly(130)).to.be.true;
    expect(await fs.pathExists(directory)).to.be.false;
  });

  it('waits for an interrupted step to settle before rolling back', async () => {
    let finishUp = (): void => {};
    compose.upPending = new Promise<void>((resolve) => {
      finishUp = resolve;
    });
    const exit = stub();
    const exited = new Promise<void>((resolve) => {
      exit.callsFake(() => resolve());
    });
    const provisioning = guard({ exit });

    const running = provisioning.run((signal) => compose.up([], { signal }));
    signals.emit('SIGINT');
    await new Promise((resolve) => setImmediate(resolve));

    expect(compose.calls).to.deep.equal(['up']);
    expect(await fs.pathExists(directory)).to.be.true;

    finishUp();
    const error = await rejection(running);
    await exited;

    expect(error).to.be.instanceOf(WpdockError);
    expect(error).to.have.property('exitCode', 130);
    expect(compose.calls).to.deep.equal([
      'up',
      'exec wordpress chown -R 1000:1000 /var/www/html/wp-content',
      'down -v',
    ]);
    expect(await fs.pathExists(directory)).to.be.false;
    expect(exit.calledOnceWithExactly(130)).to.be.true;
  });
});

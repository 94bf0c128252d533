import { expect } from 'chai';
import { resolve } from 'node:path';

import { DEFAULT_READINESS_TIMINGS } from '../../src/config/readiness.js';
import { DEFAULT_ADMIN, loadSettings } from '../../src/config/settings.js';

describe('loadSettings', () => {
  it('falls back to the defaults', () => {
    const settings = loadSettings({ WPDOCK_WORKSPACE: '/tmp/sites' });

    expect(settings.admin).to.deep.equal(DEFAULT_ADMIN);
    expect(settings.debug).to.be.false;
    expect(settings.timings).to.deep.equal(DEFAULT_READINESS_TIMINGS);
    expect(settings.workspace).to.equal(resolve('/tmp/sites'));
  });

  it('reads credentials, debug and timeouts from the environment', () => {
    const settings = loadSettings({
      WPDOCK_ADMIN_PASSWORD: 'test-secret',
      WPDOCK_ADMIN_USER: 'editor',
      WPDOCK_DEBUG: 'true',
      WPDOCK_GRACE_SECONDS: '0',
      WPDOCK_HEALTHY_TIMEOUT: '30',
    });

    expect(settings.admin).to.deep.equal({ email: 'admin@example.com', password: 'test-secret', user: 'editor' });
    expect(settings.debug).to.be.true;
    expect(settings.timings.grace).to.equal(0);
    expect(settings.timings.containersHealthy).to.deep.equal({ interval: 5, maxWait: 30 });
    expect(settings.timings.appInstalled).to.deep.equal({ interval: 10, maxWait: 120 });
  });

  it('rejects a timeout that is not a number', () => {
    expect(() => loadSettings({ WPDOCK_DB_TIMEOUT: 'soon' })).to.throw(
      'WPDOCK_DB_TIMEOUT must be a non-negative number of seconds, got "soon"',
    );
  });

  it('lets overrides win over the environment', () => {
    const settings = loadSettings({ WPDOCK_WORKSPACE: '/tmp/a' }, { workspace: '/tmp/b' });

    expect(settings.workspace).to.equal('/tmp/b');
  });
});

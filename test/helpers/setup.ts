import chai from 'chai';
import chalk from 'chalk';
import chaiAsPromised from 'chai-as-promised';
import sinonChai from 'sinon-chai';

import { removeTempDirs } from './temp.js';

chai.use(chaiAsPromised);
chai.use(sinonChai);

process.env.NODE_ENV = 'test';
chalk.level = 0;

// Root-level hook: runs once after every suite
after(async () => {
  await removeTempDirs();
});

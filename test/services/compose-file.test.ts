import { expect } from 'chai';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import { join } from 'node:path';

import { DEFAULT_ADMIN } from '../../src/config/settings.js';
import {
  buildComposeDefinition,
  declaredHostPort,
  hostPortOf,
  parseComposeFile,
  readDeclaredPorts,
  serializeComposeDefinition,
  writeComposeFile,
} from '../../src/services/compose-file.js';
import { makeTempDir } from '../helpers/temp.js';

const options = {
  admin: DEFAULT_ADMIN,
  instance: 'wp-test-blog',
  primaryPort: 8083,
  siteTitle: 'Blog',
};

describe('compose file', () => {
  describe('buildComposeDefinition', () => {
    it('publishes WordPress on the primary port and phpMyAdmin 100 above it', () => {
      const definition = buildComposeDefinition(options);

      expect(definition.services.wordpress.ports).to.deep.equal(['8083:80']);
      expect(definition.services.phpmyadmin.ports).to.deep.equal(['8183:80']);
      expect(definition.services.wordpress.environment?.WORDPRESS_SITE_URL).to.equal('http://localhost:8083');
    });

    it('gives the database a health check the gate can wait on', () => {
      const { db } = buildComposeDefinition(options).services;

      expect(db.image).to.equal('mysql:5.7');
      expect(db.healthcheck?.test).to.deep.equal(['CMD', 'mysqladmin', 'ping', '-h', 'localhost']);
    });

    it('declares the shared network and both volumes', () => {
      const definition = buildComposeDefinition(options);

      expect(Object.keys(definition.networks)).to.deep.equal(['wordpress_net']);
      expect(Object.keys(definition.volumes)).to.deep.equal(['db_data', 'wp_data']);
      expect(definition.name).to.equal('wp-test-blog');
    });
  });

  it('reads back the primary port from its own serialized output', () => {
    const parsed = parseComposeFile(serializeComposeDefinition(buildComposeDefinition(options)));

    expect(declaredHostPort(parsed, 'wordpress')).to.equal(8083);
    expect(declaredHostPort(parsed, 'phpmyadmin')).to.equal(8183);
    expect(declaredHostPort(parsed, 'db')).to.be.undefined;
  });

  describe('hostPortOf', () => {
    it('understands the short and long port syntaxes', () => {
      expect(hostPortOf('8090:80', 80)).to.equal(8090);
      expect(hostPortOf('127.0.0.1:8091:80', 80)).to.equal(8091);
      expect(hostPortOf('8092:80/tcp', 80)).to.equal(8092);
      expect(hostPortOf({ published: '8093', target: 80 }, 80)).to.equal(8093);
    });

    it('ignores mappings to other container ports', () => {
      expect(hostPortOf('3307:3306', 80)).to.be.undefined;
      expect(hostPortOf('80', 80)).to.be.undefined;
      expect(hostPortOf(80, 80)).to.be.undefined;
    });
  });

  describe('parseComposeFile', () => {
    it('rejects documents without a services mapping', () => {
      expect(() => parseComposeFile('version: "3"\n')).to.throw('Compose file has no services mapping');
      expect(() => parseComposeFile('- a\n- b\n')).to.throw('Compose file has no services mapping');
    });

    it('keeps services that publish no ports', () => {
      const parsed = parseComposeFile(yaml.dump({ services: { db: { image: 'mysql:5.7' } } }));

      expect(parsed.services.db.ports).to.deep.equal([]);
    });
  });

  describe('readDeclaredPorts', () => {
    it('reads the ports of an instance directory', async () => {
      const dir = await makeTempDir();
      await writeComposeFile(dir, buildComposeDefinition({ ...options, primaryPort: 8120 }));

      expect(await readDeclaredPorts(dir)).to.deep.equal({ admin: 8220, primary: 8120 });
    });

    it('returns no ports for a missing or malformed file', async () => {
      const dir = await makeTempDir();
      expect(await readDeclaredPorts(dir)).to.deep.equal({});

      await fs.writeFile(join(dir, 'docker-compose.yml'), 'services: [unclosed');
      expect(await readDeclaredPorts(dir)).to.deep.equal({});
    });
  });
});

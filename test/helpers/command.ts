import { Config } from '@oclif/core';
import fs from 'fs-extra';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { DEFAULT_ADMIN } from '../../src/config/settings.js';
import { buildComposeDefinition, writeComposeFile } from '../../src/services/compose-file.js';

const ROOT = fileURLToPath(new URL('../../', import.meta.url));

let config: Promise<Config> | undefined;

/** The CLI's oclif config, loaded once per run. */
export function loadConfig(): Promise<Config> {
  config ??= Config.load(ROOT);
  return config;
}

/**
 * Writes an instance directory with a generated compose file.
 */
export async function writeInstance(workspace: string, name: string, port: number): Promise<string> {
  const directory = join(workspace, name);
  await fs.ensureDir(directory);
  await writeComposeFile(directory, buildComposeDefinition({
    admin: DEFAULT_ADMIN,
    instance: name,
    primaryPort: port,
    siteTitle: name,
  }));
  return directory;
}

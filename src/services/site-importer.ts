import { execa } from 'execa';
import fs from 'fs-extra';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { AdminCredentials, CONTENT_DIR, DATABASE } from '../config/settings.js';
import { WpdockError } from '../errors.js';
import { Reporter, silentReporter } from '../lib/reporter.js';
import { ExecResult, IComposeService } from './docker-interface.js';
import { WordPressCli } from './wp-cli.js';

export type ContentSourceKind = 'directory' | 'tar' | 'tar.gz';

type Extract = (archive: string, kind: 'tar' | 'tar.gz', destination: string) => Promise<void>;

const extractWithTar: Extract = async (archive, kind, destination) => {
  await execa('tar', [kind === 'tar.gz' ? '-xzf' : '-xf', archive, '-C', destination]);
};

export async function contentSourceKind(source: string): Promise<ContentSourceKind> {
  const stats = await fs.stat(source);
  if (stats.isDirectory()) {
    return 'directory';
  }

  if (stats.isFile() && source.endsWith('.tar.gz')) {
    return 'tar.gz';
  }

  if (stats.isFile() && source.endsWith('.tar')) {
    return 'tar';
  }

  throw new WpdockError({
    kind: 'validation',
    message: `wp-content must be a directory or tar/tar.gz file: ${source}`,
    title: 'Unsupported Content Source',
  });
}

/**
 * Breadth-first search for the first directory named wp-content.
 */
export async function findContentDirectory(root: string): Promise<string | undefined> {
  const queue = [root];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }

    // eslint-disable-next-line no-await-in-loop
    const entries = await fs.readdir(current, { withFileTypes: true });
    const directories = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
    for (const name of directories) {
      const path = join(current, name);
      if (name === CONTENT_DIR) {
        return path;
      }

      queue.push(path);
    }
  }

  return undefined;
}

/**
 * Copies a wp-content directory, or the first wp-content inside a tar
 * archive, to `destination`.
 */
export async function stageContent(source: string, destination: string, extract: Extract = extractWithTar): Promise<void> {
  const kind = await contentSourceKind(source);
  await fs.remove(destination);

  if (kind === 'directory') {
    await fs.copy(source, destination);
    return;
  }

  const scratch = await fs.mkdtemp(join(tmpdir(), 'wpdock-content-'));
  try {
    await extract(source, kind, scratch);
    const found = await findContentDirectory(scratch);
    if (!found) {
      throw new WpdockError({
        kind: 'validation',
        message: `Could not find a wp-content directory in ${basename(source)}`,
        title: 'Invalid Archive',
      });
    }

    await fs.copy(found, destination);
  } finally {
    await fs.remove(scratch);
  }
}

/**
 * Source URLs to rewrite to `localUrl`, primary first: the live URL, its
 * http:// form when it was https://, then its www-toggled form. Variants equal
 * to the local URL are dropped.
 */
export function urlReplacements(liveUrl: string, localUrl: string): string[] {
  if (liveUrl === localUrl) {
    return [];
  }

  const variants = [liveUrl];
  if (liveUrl.startsWith('https://')) {
    variants.push(liveUrl.replace('https://', 'http://'));
  }

  variants.push(liveUrl.includes('www.') ? liveUrl.replaceAll('www.', '') : liveUrl.replace('://', '://www.'));

  return [...new Set(variants)].filter((url) => url !== localUrl);
}

const sqlString = (value: string): string => `'${value.replaceAll('\\', '\\\\').replaceAll("'", "''")}'`;

export interface SiteImporterOptions {
  compose: IComposeService;
  reporter?: Reporter;
  wp: WordPressCli;
}

/**
 * Post-start steps that turn a fresh instance into a copy of a live site.
 */
export class SiteImporter {
  private readonly compose: IComposeService;
  private readonly reporter: Reporter;
  private readonly wp: WordPressCli;

  constructor(options: SiteImporterOptions) {
    this.compose = options.compose;
    this.reporter = options.reporter ?? silentReporter;
    this.wp = options.wp;
  }

  /**
   * Activates the first non-default theme when the database points at a theme
   * that is not installed.
   */
  async ensureTheme(): Promise<string | undefined> {
    const active = await this.wp.optionGet('template');
    const installed = await this.wp.themeNames();
    if (active && installed.includes(active)) {
      this.reporter.success(`Active theme '${active}' is present`);
      return active;
    }

    const fallback = installed.find((name) => !name.startsWith('twenty'));
    if (!fallback) {
      this.reporter.warn(`Active theme '${active ?? 'unknown'}' not found and no imported theme available`);
      return undefined;
    }

    await this.wp.activateTheme(fallback);
    this.reporter.success(`Theme '${fallback}' activated`);
    return fallback;
  }

  async importDatabase(dumpFile: string): Promise<void> {
    const recreate = await this.mysql([
      '-e',
      `DROP DATABASE IF EXISTS ${DATABASE.NAME}; CREATE DATABASE ${DATABASE.NAME} CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;`,
    ]);
    if (recreate.exitCode !== 0) {
      throw new WpdockError({
        detail: recreate.stderr,
        kind: 'runtime',
        message: 'Could not recreate the database',
        title: 'Database Import Failed',
      });
    }

    const load = await this.compose.exec('db', this.mysqlCommand([DATABASE.NAME]), { inputFile: dumpFile });
    if (load.exitCode !== 0) {
      throw new WpdockError({
        detail: load.stderr,
        kind: 'runtime',
        message: `Could not import ${basename(dumpFile)}`,
        title: 'Database Import Failed',
      });
    }

    this.reporter.success('Database imported successfully');
  }

  async refreshPermalinks(): Promise<void> {
    const structure = (await this.wp.optionGet('permalink_structure'))?.replaceAll(/\s/g, '');
    if (structure) {
      await this.wp.rewriteStructure(structure);
    }

    await this.wp.rewriteFlush();
    await this.wp.ensureHtaccess();
    this.reporter.success('Permalinks refreshed');
  }

  /**
   * Renames the first administrator to the configured login and sets its
   * password, or creates one when the imported site has none.
   */
  async resetAdmin(admin: AdminCredentials): Promise<void> {
    const [adminId] = await this.wp.administratorIds();
    if (adminId && /^\d+$/.test(adminId)) {
      await this.mysql([
        DATABASE.NAME,
        '-e',
        `UPDATE wp_users SET user_login=${sqlString(admin.user)}, user_email=${sqlString(admin.email)} WHERE ID=${adminId};`,
      ]);
      await this.wp.setPassword(admin.user, admin.password);
    } else {
      await this.wp.createAdministrator(admin.user, admin.email, admin.password);
    }

    this.reporter.success(`Admin credentials reset (${admin.user})`);
  }

  /**
   * Points every stored URL at the local instance. Returns the URLs replaced.
   */
  async rewriteUrls(localUrl: string): Promise<string[]> {
    const liveUrl = await this.wp.optionGet('siteurl');
    if (!liveUrl) {
      this.reporter.warn('Could not detect the live site URL from the database');
      return [];
    }

    this.reporter.info(`Live site URL detected: ${liveUrl}`);
    const replacements = urlReplacements(liveUrl, localUrl);
    for (const [index, from] of replacements.entries()) {
      // eslint-disable-next-line no-await-in-loop
      const ok = await this.wp.searchReplace(from, localUrl);
      if (!ok && index === 0) {
        this.reporter.warn(`search-replace of ${from} reported an error`);
      }
    }

    if (replacements.length > 0) {
      this.reporter.success('URL search and replace complete');
    }

    return replacements;
  }

  private mysql(args: string[]): Promise<ExecResult> {
    return this.compose.exec('db', this.mysqlCommand(args));
  }

  private mysqlCommand(args: string[]): string[] {
    return ['mysql', '-u', DATABASE.USER, `-p${DATABASE.PASSWORD}`, ...args];
  }
}

import fs from 'fs-extra';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { COMPOSE_FILE, CONTENT_DIR, Settings, SITE_INFO_FILE } from '../config/settings.js';
import { InstanceExistsError, WpdockError } from '../errors.js';
import { Sleep } from '../lib/poll.js';
import { Reporter, silentReporter } from '../lib/reporter.js';
import { adminPortFor, buildComposeDefinition, writeComposeFile } from './compose-file.js';
import { ComposeFactory, IComposeService } from './docker-interface.js';
import { InstanceRegistry, InstanceState, instanceName, timestampName } from './instances.js';
import { ClaimStore, PortAllocator, validatePort } from './port-allocator.js';
import { ProvisioningGuard, SignalSource } from './provisioning-guard.js';
import { HttpProbe, ReadinessGate } from './readiness-gate.js';
import { contentSourceKind, SiteImporter, stageContent } from './site-importer.js';
import { WordPressCli } from './wp-cli.js';

export const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));
export const TEMPLATE_FILES = ['Dockerfile', 'wp-installer.sh'] as const;

export interface InstanceRecord {
  adminPort: number;
  directory: string;
  name: string;
  primaryPort: number;
  state: InstanceState;
}

export interface CreateRequest {
  name?: string;
  port?: number | string;
  startPort?: number;
}

export interface ImportRequest {
  contentSource: string;
  databaseFile: string;
  name: string;
  port?: number | string;
  startPort?: number;
}

export interface ProvisionResult {
  httpReachable: boolean;
  instance: InstanceRecord;
  siteInfoFile: string;
}

export interface ProvisionerOptions {
  allocator: PortAllocator;
  claims: ClaimStore;
  composeFactory: ComposeFactory;
  exit?: (code: number) => void;
  extract?: Parameters<typeof stageContent>[2];
  httpProbe?: HttpProbe;
  now?: () => Date;
  registry: InstanceRegistry;
  reporter?: Reporter;
  settings: Settings;
  signals?: SignalSource;
  sleep?: Sleep;
  templatesDir?: string;
}

export interface ProvisionPlan {
  afterReady(compose: IComposeService, wp: WordPressCli, record: InstanceRecord, signal: AbortSignal): Promise<void>;
  prepareContent(directory: string): Promise<void>;
  siteInfo: string[];
}

/**
 * A request that passed validation: nothing on disk or in Docker has been
 * touched yet.
 */
export interface ProvisionJob {
  explicitPort?: number;
  name: string;
  plan: ProvisionPlan;
  startPort?: number;
}

export const localUrl = (port: number): string => `http://localhost:${port}`;

/**
 * Create and import workflows: name, port, files, containers, readiness,
 * post-provisioning. `validateCreate`/`validateImport` check a request up
 * front; `execute` does the work.
 */
export class Provisioner {
  private readonly options: ProvisionerOptions;
  private readonly reporter: Reporter;

  constructor(options: ProvisionerOptions) {
    this.options = options;
    this.reporter = options.reporter ?? silentReporter;
  }

  async create(request: CreateRequest = {}): Promise<ProvisionResult> {
    return this.execute(await this.validateCreate(request));
  }

  /**
   * Provisions a validated job. Everything after the instance directory
   * exists runs under a ProvisioningGuard.
   */
  async execute(job: ProvisionJob): Promise<ProvisionResult> {
    const { allocator, claims, composeFactory, registry, settings } = this.options;
    const { name, plan } = job;
    const directory = registry.directoryFor(name);
    if (await fs.pathExists(directory)) {
      throw new InstanceExistsError(name, directory);
    }

    let primaryPort: number;
    if (job.explicitPort === undefined) {
      primaryPort = await allocator.reservePort(name, job.startPort);
    } else {
      await allocator.ensureExplicitPortFree(job.explicitPort);
      await claims.claim(job.explicitPort, name);
      primaryPort = job.explicitPort;
    }

    const record: InstanceRecord = {
      adminPort: adminPortFor(primaryPort),
      directory,
      name,
      primaryPort,
      state: 'not-created',
    };
    this.reporter.info(`Instance: ${name}, port ${primaryPort}`);

    try {
      await fs.ensureDir(registry.workspace);
      await fs.mkdir(directory);
    } catch (error) {
      await claims.release(primaryPort);
      throw error;
    }

    record.state = 'provisioning';
    const compose = composeFactory(directory);
    const wp = new WordPressCli(compose);
    const guard = new ProvisioningGuard({
      compose,
      directory,
      exit: this.options.exit,
      releaseClaim: () => claims.release(primaryPort),
      reporter: this.reporter,
      signals: this.options.signals,
    });

    let httpReachable = false;
    let siteInfoFile = '';
    try {
      await guard.run(async (signal) => {
        await this.writeInstanceFiles(record, settings);
        signal.throwIfAborted();
        await plan.prepareContent(directory);
        signal.throwIfAborted();

        this.reporter.info('Starting Docker containers...');
        await compose.up([], { signal });

        const gate = new ReadinessGate({
          compose,
          httpProbe: this.options.httpProbe,
          reporter: this.reporter,
          signal,
          sleep: this.options.sleep,
          timings: settings.timings,
          wp,
        });
        await gate.waitUntilReady();

        await plan.afterReady(compose, wp, record, signal);
        signal.throwIfAborted();
        await wp.cacheFlush();
        httpReachable = await gate.checkHttp(localUrl(primaryPort));
        signal.throwIfAborted();
        siteInfoFile = await this.writeSiteInfo(record, plan.siteInfo);
      });
    } catch (error) {
      record.state = 'failed';
      throw error;
    }

    await claims.release(primaryPort);
    record.state = 'ready';
    return { httpReachable, instance: record, siteInfoFile };
  }

  async import(request: ImportRequest): Promise<ProvisionResult> {
    return this.execute(await this.validateImport(request));
  }

  /**
   * Checks a create request without side effects: instance name and explicit
   * port.
   */
  async validateCreate(request: CreateRequest = {}): Promise<ProvisionJob> {
    return {
      explicitPort: request.port === undefined ? undefined : validatePort(request.port),
      name: request.name ? instanceName(request.name) : timestampName(this.now()),
      plan: {
        async afterReady() {},
        async prepareContent(directory) {
          await fs.ensureDir(join(directory, CONTENT_DIR));
        },
        siteInfo: [],
      },
      startPort: request.startPort,
    };
  }

  /**
   * Checks an import request without side effects: name, explicit port, a
   * readable dump and a readable content source of a supported kind.
   */
  async validateImport(request: ImportRequest): Promise<ProvisionJob> {
    const name = instanceName(request.name);
    const explicitPort = request.port === undefined ? undefined : validatePort(request.port);
    const databaseFile = resolve(request.databaseFile);
    const contentSource = resolve(request.contentSource);
    await this.ensureReadable(databaseFile, 'Database file');
    await this.ensureReadable(contentSource, 'wp-content source');
    await contentSourceKind(contentSource);

    const { admin } = this.options.settings;
    const { extract } = this.options;
    const reporter = this.reporter;

    return {
      explicitPort,
      name,
      plan: {
        async afterReady(compose, wp, record, signal) {
          const importer = new SiteImporter({ compose, reporter, wp });
          reporter.info('Importing database...');
          await importer.importDatabase(databaseFile);
          signal.throwIfAborted();
          await importer.rewriteUrls(localUrl(record.primaryPort));
          signal.throwIfAborted();
          await importer.refreshPermalinks();
          await importer.resetAdmin(admin);
          await importer.ensureTheme();
        },
        async prepareContent(directory) {
          reporter.info('Setting up wp-content...');
          await stageContent(contentSource, join(directory, CONTENT_DIR), extract);
        },
        siteInfo: [`Source DB: ${basename(databaseFile)}`, `Source WP-Content: ${basename(contentSource)}`],
      },
      startPort: request.startPort,
    };
  }

  private async ensureReadable(path: string, label: string): Promise<void> {
    try {
      await fs.access(path, fs.constants.R_OK);
    } catch {
      throw new WpdockError({
        kind: 'validation',
        message: `${label} not found or not readable: ${path}`,
        title: 'Invalid Input',
      });
    }
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  private async writeInstanceFiles(record: InstanceRecord, settings: Settings): Promise<void> {
    const templatesDir = this.options.templatesDir ?? TEMPLATES_DIR;
    await Promise.all(
      TEMPLATE_FILES.map((file) => fs.copy(join(templatesDir, file), join(record.directory, file))),
    );
    await fs.chmod(join(record.directory, 'wp-installer.sh'), 0o755);

    const definition = buildComposeDefinition({
      admin: settings.admin,
      instance: record.name,
      primaryPort: record.primaryPort,
      siteTitle: settings.siteTitle,
    });
    await writeComposeFile(record.directory, definition);
    this.reporter.debug(`wrote ${join(record.directory, COMPOSE_FILE)}`);
  }

  private async writeSiteInfo(record: InstanceRecord, extra: string[]): Promise<string> {
    const { admin } = this.options.settings;
    const url = localUrl(record.primaryPort);
    const lines = [
      'WordPress Site Information',
      '==========================',
      `Instance Name: ${record.name}`,
      `Site URL: ${url}`,
      `Admin URL: ${url}/wp-admin`,
      `Admin Username: ${admin.user}`,
      `Admin Password: ${admin.password}`,
      `Created: ${this.now().toISOString()}`,
      `Directory: ${record.directory}`,
      ...extra,
      '',
      'phpMyAdmin Information',
      '======================',
      `Access URL: ${localUrl(record.adminPort)}`,
      'Server: db',
      'Username: wordpress',
      'Password: wordpress',
      'Database: wordpress',
      '',
      'Commands:',
      `  wpdock start ${record.name}`,
      `  wpdock stop ${record.name}`,
      `  wpdock logs ${record.name}`,
      `  wpdock wp ${record.name} -- plugin list`,
      `  wpdock remove ${record.name}`,
      '',
    ];

    const file = join(record.directory, SITE_INFO_FILE);
    await fs.writeFile(file, lines.join('\n'), 'utf8');
    return file;
  }
}

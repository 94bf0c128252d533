import { Command, Errors, Flags } from '@oclif/core';
import chalk from 'chalk';
import { createPromptModule } from 'inquirer';
import { resolve } from 'node:path';

import { loadSettings, Settings } from '../config/settings.js';
import { renderError, toWpdockError } from '../errors.js';
import { createConsoleReporter, Reporter } from '../lib/reporter.js';
import { InstanceCleaner } from '../services/cleanup.js';
import { ComposeFactory, IComposeService, IDockerHost } from '../services/docker-interface.js';
import { createComposeService, DockerHost } from '../services/docker.js';
import { HostPortInspector, SystemPortInspector } from '../services/host-ports.js';
import { InstanceInfo, InstanceRegistry } from '../services/instances.js';
import { PortAllocator } from '../services/port-allocator.js';
import { PortClaims } from '../services/port-claims.js';
import { localUrl, ProvisionResult, Provisioner } from '../services/provisioner.js';

export const baseFlags = {
  workspace: Flags.string({
    char: 'w',
    description: 'Directory that holds the wp-test-* instances (defaults to the current directory)',
    env: 'WPDOCK_WORKSPACE',
  }),
};

export abstract class BaseCommand extends Command {
  static baseFlags = baseFlags;
  static hidden = true;
  protected composeFactory: ComposeFactory = createComposeService;
  /**
   * Docker commands that are not tied to one instance
   */
  protected dockerHost!: IDockerHost;
  protected hostPorts: HostPortInspector = new SystemPortInspector();
  protected registry!: InstanceRegistry;
  protected reporter!: Reporter;
  protected settings!: Settings;

  /**
   * Renders wpdock errors in a box and exits 1. oclif's own errors (flag
   * parsing, this.exit) keep their default handling.
   */
  protected async catch(error: Error & { exitCode?: number }): Promise<unknown> {
    if (error instanceof Errors.CLIError) {
      return super.catch(error);
    }

    const wpdockError = toWpdockError(error);
    this.logToStderr(renderError(wpdockError));
    this.exit(wpdockError.exitCode);
  }

  /**
   * Free-text prompt; resolves to the trimmed answer.
   */
  protected async ask(message: string): Promise<string> {
    const prompt = createPromptModule();
    const { answer } = await prompt({ message, name: 'answer', type: 'input' });
    return typeof answer === 'string' ? answer.trim() : '';
  }

  protected async checkDockerEnvironment(): Promise<void> {
    await this.dockerHost.checkDockerInstalled();
    await this.dockerHost.checkDockerRunning();
    await this.dockerHost.checkDockerComposeInstalled();
  }

  protected composeFor(instance: InstanceInfo): IComposeService {
    return this.composeFactory(instance.directory);
  }

  protected async confirm(message: string): Promise<boolean> {
    const prompt = createPromptModule();
    const { confirm } = await prompt({
      default: false,
      message,
      name: 'confirm',
      type: 'confirm',
    });
    return confirm === true;
  }

  protected createAllocator(claims: PortClaims = this.createClaims()): PortAllocator {
    return new PortAllocator({
      claims,
      hostPorts: this.hostPorts,
      siblings: this.registry,
    });
  }

  protected createClaims(): PortClaims {
    return new PortClaims(this.settings.workspace);
  }

  public async init(): Promise<void> {
    await super.init();
    const { flags } = await this.parse(this.ctor);
    const workspace: unknown = flags.workspace;

    this.settings = loadSettings(process.env, typeof workspace === 'string' ? { workspace: resolve(workspace) } : {});
    this.reporter = createConsoleReporter(this.settings.debug);
    this.registry = new InstanceRegistry(this.settings.workspace);
    this.dockerHost = new DockerHost();
    this.logDebug(`workspace: ${this.settings.workspace}`);
  }

  protected logDebug(message: string): void {
    this.reporter.debug(message);
  }

  protected statusColor(status: string): string {
    switch (status) {
      case 'Running': {
        return chalk.green(status);
      }

      case 'Error': {
        return chalk.red(status);
      }

      default: {
        return chalk.yellow(status);
      }
    }
  }
}

const provisioningFlags = {
  cleanup: Flags.boolean({
    default: false,
    description: 'Remove every existing instance before provisioning',
  }),
  port: Flags.string({
    char: 'p',
    description: 'Use this port instead of allocating one (1024-65535)',
  }),
  'start-port': Flags.integer({
    description: 'Lowest port the allocator may pick',
    max: 8200,
    min: 1024,
  }),
};

/**
 * Shared plumbing of the create and import commands.
 */
export abstract class ProvisionCommand extends BaseCommand {
  static provisioningFlags = provisioningFlags;

  protected createProvisioner(): Provisioner {
    const claims = this.createClaims();
    return new Provisioner({
      allocator: this.createAllocator(claims),
      claims,
      composeFactory: this.composeFactory,
      registry: this.registry,
      reporter: this.reporter,
      settings: this.settings,
    });
  }

  protected async preCleanup(): Promise<void> {
    this.log(chalk.blue('Running cleanup of previous WordPress instances...'));
    const cleaner = new InstanceCleaner({
      composeFactory: this.composeFactory,
      confirm: (message) => this.confirm(message),
      dockerHost: this.dockerHost,
      registry: this.registry,
      reporter: this.reporter,
    });
    await cleaner.cleanupAll(true);
    this.log(chalk.blue('Cleanup complete.\n'));
  }

  protected printSummary(title: string, result: ProvisionResult): void {
    const { instance } = result;
    const { admin } = this.settings;
    const url = localUrl(instance.primaryPort);

    this.log(`\n${chalk.green.bold(title)}`);
    this.log(`Instance:     ${chalk.cyan(instance.name)}`);
    this.log(`Site URL:     ${chalk.cyan(url)}`);
    this.log(`Admin URL:    ${chalk.cyan(`${url}/wp-admin`)}`);
    this.log(`Admin login:  ${admin.user} / ${admin.password}`);
    this.log(`phpMyAdmin:   ${chalk.cyan(localUrl(instance.adminPort))}`);
    this.log(`Directory:    ${instance.directory}`);
    this.log(`Site info:    ${result.siteInfoFile}`);
    if (!result.httpReachable) {
      this.log(chalk.yellow('\nThe site did not answer HTTP yet; give it a moment before opening it.'));
    }
  }
}

import { execa } from 'execa';
import ora from 'ora';

import { WpdockError } from '../errors.js';
import {
  ExecOptions,
  ExecResult,
  IComposeService,
  IDockerHost,
  LogOptions,
  ServiceState,
  UpOptions,
} from './docker-interface.js';

let composeCommand: Promise<string[]> | undefined;

/**
 * Resolves `docker compose` (plugin) or the legacy `docker-compose` binary,
 * once per process.
 */
export function detectDockerComposeCommand(): Promise<string[]> {
  composeCommand ??= (async () => {
    try {
      await execa('docker', ['compose', 'version'], { stdio: 'ignore' });
      return ['docker', 'compose'];
    } catch {
      try {
        await execa('docker-compose', ['--version'], { stdio: 'ignore' });
        return ['docker-compose'];
      } catch {
        composeCommand = undefined;
        throw new Error('Neither docker compose nor docker-compose is available');
      }
    }
  })();

  return composeCommand;
}

/**
 * Failure of a Docker prerequisite. Rendering is left to the command's error
 * handler.
 */
export function dependencyError(title: string, message: string, suggestion?: string): never {
  throw new WpdockError({ hint: suggestion, kind: 'dependency', message, title });
}

export class ComposeService implements IComposeService {
  private projectPath: string;

  constructor(projectPath: string) {
    this.projectPath = projectPath;
  }

  async down(options: { volumes?: boolean } = {}): Promise<void> {
    await this.runDockerCompose(options.volumes ? ['down', '-v'] : ['down']);
  }

  async exec(service: string, command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const [file, ...prefix] = await detectDockerComposeCommand();
    const result = await execa(file, [...prefix, 'exec', '-T', service, ...command], {
      cwd: this.projectPath,
      inputFile: options.inputFile,
      reject: false,
    });

    return {
      exitCode: result.exitCode ?? 1,
      stderr: result.stderr,
      stdout: result.stdout,
    };
  }

  async execInteractive(service: string, command: string[]): Promise<number> {
    const [file, ...prefix] = await detectDockerComposeCommand();
    const result = await execa(file, [...prefix, 'exec', service, ...command], {
      cwd: this.projectPath,
      reject: false,
      stdio: 'inherit',
    });

    return result.exitCode ?? 1;
  }

  getProjectPath(): string {
    return this.projectPath;
  }

  async logs(service?: string): Promise<string> {
    const args = service ? ['logs', '--no-color', service] : ['logs', '--no-color'];
    const { stderr, stdout } = await this.captureDockerCompose(args);
    return [stdout, stderr].filter(Boolean).join('\n');
  }

  async ps(): Promise<string> {
    const { stdout } = await this.captureDockerCompose(['ps']);
    return stdout;
  }

  async runningServices(): Promise<string[]> {
    const { stdout } = await this.captureDockerCompose(['ps', '--services', '--filter', 'status=running']);
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async serviceState(service: string): Promise<ServiceState> {
    const { stdout } = await this.captureDockerCompose(['ps', '-q', service]);
    const containerId = stdout.split('\n')[0]?.trim();
    if (!containerId) {
      return { status: 'none' };
    }

    const { stdout: inspected } = await execa('docker', [
      'inspect',
      '--format',
      '{{.State.Status}}|{{if .State.Health}}{{.State.Health.Status}}{{end}}',
      containerId,
    ]);
    const [status = 'none', health = ''] = inspected.trim().split('|');
    return health ? { health, status } : { status };
  }

  async streamLogs(options: LogOptions = {}): Promise<void> {
    const args = ['logs'];
    if (options.follow) {
      args.push('-f');
    }

    if (options.service) {
      args.push(options.service);
    }

    await this.runDockerCompose(args);
  }

  async up(services: string[] = [], options: UpOptions = {}): Promise<void> {
    await this.runDockerCompose(['up', '-d', ...services], options.signal);
  }

  private async captureDockerCompose(args: string[]): Promise<{ stderr: string; stdout: string }> {
    const [file, ...prefix] = await detectDockerComposeCommand();
    const { stderr, stdout } = await execa(file, [...prefix, ...args], { cwd: this.projectPath });
    return { stderr, stdout };
  }

  private async runDockerCompose(args: string[], signal?: AbortSignal): Promise<void> {
    let command: string[];
    try {
      command = await detectDockerComposeCommand();
    } catch {
      dependencyError(
        'Docker Compose Not Found',
        'Docker Compose is not installed on your system.',
        'Install Docker Compose from https://docs.docker.com/compose/install/ or enable the Compose plugin.',
      );
    }

    const [file, ...prefix] = command;
    await execa(file, [...prefix, ...args], {
      cancelSignal: signal,
      cwd: this.projectPath,
      stdio: 'inherit',
    });
  }
}

export class DockerHost implements IDockerHost {
  private spinner = ora();

  async checkDockerComposeInstalled(): Promise<void> {
    this.spinner.start('Checking Docker Compose installation...');
    try {
      const command = await detectDockerComposeCommand();
      this.spinner.succeed(`Docker Compose is installed (using ${command.join(' ')})`);
    } catch {
      this.spinner.fail('Docker Compose is not installed');
      dependencyError(
        'Docker Compose Not Found',
        'Docker Compose is not installed on your system.',
        'Install Docker Compose from https://docs.docker.com/compose/install/ or enable the Compose plugin.',
      );
    }
  }

  async checkDockerInstalled(): Promise<void> {
    this.spinner.start('Checking Docker installation...');
    try {
      await execa('docker', ['--version'], { stdio: 'ignore' });
      this.spinner.succeed('Docker is installed');
    } catch {
      this.spinner.fail('Docker is not installed');
      dependencyError(
        'Docker Not Found',
        'Docker is not installed on your system.',
        'Install Docker from https://www.docker.com/get-started',
      );
    }
  }

  async checkDockerRunning(): Promise<void> {
    this.spinner.start('Checking Docker...');
    try {
      await execa('docker', ['info'], { stdio: 'ignore' });
      this.spinner.succeed('Docker is running');
    } catch {
      this.spinner.fail('Docker is not running');
      dependencyError('Docker Not Running', 'Docker daemon is not running.', 'Start Docker and try again.');
    }
  }

  async listNetworks(): Promise<string[]> {
    const { stdout } = await execa('docker', ['network', 'ls', '--format', '{{.Name}}']);
    return stdout.split('\n').filter(Boolean);
  }

  async listVolumes(): Promise<string[]> {
    const { stdout } = await execa('docker', ['volume', 'ls', '--format', '{{.Name}}']);
    return stdout.split('\n').filter(Boolean);
  }

  async removeNetwork(name: string): Promise<void> {
    await execa('docker', ['network', 'rm', name]);
  }

  async removeVolume(name: string): Promise<void> {
    await execa('docker', ['volume', 'rm', name]);
  }
}

export const createComposeService = (projectPath: string): IComposeService => new ComposeService(projectPath);

import {
  ExecOptions,
  ExecResult,
  IComposeService,
  IDockerHost,
  LogOptions,
  ServiceState,
  UpOptions,
} from '../docker-interface.js';

type ExecHandler = (service: string, command: string[], options: ExecOptions) => ExecResult;

const ok = (stdout = ''): ExecResult => ({ exitCode: 0, stderr: '', stdout });

/**
 * In-memory stand-in for ComposeService. Records every call as a
 * space-joined string so tests can assert on order.
 */
export class FakeComposeService implements IComposeService {
  calls: string[] = [];
  downError?: Error;
  execHandler: ExecHandler = () => ok();
  logOutput: Record<string, string> = { all: 'all logs', db: 'db logs', wordpress: 'wordpress logs' };
  psOutput = 'NAME   STATUS\nwordpress   Up 5 seconds';
  running: string[] = ['db', 'wordpress', 'phpmyadmin'];
  runningError?: Error;
  states: Record<string, ServiceState> = {
    db: { health: 'healthy', status: 'running' },
    wordpress: { status: 'running' },
  };
  upError?: Error;
  /** When set, `up` waits for it before finishing. */
  upPending?: Promise<void>;
  private projectPath: string;

  constructor(projectPath = '/fake/project') {
    this.projectPath = projectPath;
  }

  async down(options: { volumes?: boolean } = {}): Promise<void> {
    this.calls.push(options.volumes ? 'down -v' : 'down');
    if (this.downError) {
      throw this.downError;
    }

    this.running = [];
  }

  async exec(service: string, command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    this.calls.push(['exec', service, ...command].join(' '));
    return this.execHandler(service, command, options);
  }

  async execInteractive(service: string, command: string[]): Promise<number> {
    this.calls.push(['exec-it', service, ...command].join(' '));
    return this.execHandler(service, command, {}).exitCode;
  }

  getProjectPath(): string {
    return this.projectPath;
  }

  async logs(service?: string): Promise<string> {
    this.calls.push(service ? `logs ${service}` : 'logs');
    return this.logOutput[service ?? 'all'] ?? '';
  }

  async ps(): Promise<string> {
    this.calls.push('ps');
    return this.psOutput;
  }

  async runningServices(): Promise<string[]> {
    this.calls.push('running-services');
    if (this.runningError) {
      throw this.runningError;
    }

    return [...this.running];
  }

  async serviceState(service: string): Promise<ServiceState> {
    this.calls.push(`state ${service}`);
    return this.states[service] ?? { status: 'none' };
  }

  async streamLogs(options: LogOptions = {}): Promise<void> {
    this.calls.push(['stream-logs', options.service, options.follow ? '-f' : undefined].filter(Boolean).join(' '));
  }

  async up(services: string[] = [], options: UpOptions = {}): Promise<void> {
    this.calls.push(['up', ...services].join(' '));
    if (this.upPending) {
      await this.upPending;
    }

    options.signal?.throwIfAborted();
    if (this.upError) {
      throw this.upError;
    }
  }
}

export class FakeDockerHost implements IDockerHost {
  networks: string[] = [];
  removed: string[] = [];
  volumes: string[] = [];

  async checkDockerComposeInstalled(): Promise<void> {}

  async checkDockerInstalled(): Promise<void> {}

  async checkDockerRunning(): Promise<void> {}

  async listNetworks(): Promise<string[]> {
    return [...this.networks];
  }

  async listVolumes(): Promise<string[]> {
    return [...this.volumes];
  }

  async removeNetwork(name: string): Promise<void> {
    this.removed.push(`network ${name}`);
    this.networks = this.networks.filter((network) => network !== name);
  }

  async removeVolume(name: string): Promise<void> {
    this.removed.push(`volume ${name}`);
    this.volumes = this.volumes.filter((volume) => volume !== name);
  }
}

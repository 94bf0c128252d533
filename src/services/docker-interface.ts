/**
 * Interface for ComposeService
 * Both the real implementation and the in-memory fake implement it
 */
export interface ServiceState {
  /** Health check status, absent when the service defines no health check. */
  health?: string;
  /** Container state, `none` when the service has no container. */
  status: string;
}

export interface ExecResult {
  exitCode: number;
  stderr: string;
  stdout: string;
}

export interface ExecOptions {
  /** File piped to the command's stdin. */
  inputFile?: string;
}

export interface LogOptions {
  follow?: boolean;
  service?: string;
}

export interface UpOptions {
  /** Cancels the `up` invocation when aborted. */
  signal?: AbortSignal;
}

export interface IComposeService {
  down(options?: { volumes?: boolean }): Promise<void>;
  exec(service: string, command: string[], options?: ExecOptions): Promise<ExecResult>;
  execInteractive(service: string, command: string[]): Promise<number>;
  getProjectPath(): string;
  logs(service?: string): Promise<string>;
  ps(): Promise<string>;
  runningServices(): Promise<string[]>;
  serviceState(service: string): Promise<ServiceState>;
  streamLogs(options?: LogOptions): Promise<void>;
  up(services?: string[], options?: UpOptions): Promise<void>;
}

export type ComposeFactory = (projectPath: string) => IComposeService;

/**
 * Docker commands that are not scoped to one compose project.
 */
export interface IDockerHost {
  checkDockerComposeInstalled(): Promise<void>;
  checkDockerInstalled(): Promise<void>;
  checkDockerRunning(): Promise<void>;
  listNetworks(): Promise<string[]>;
  listVolumes(): Promise<string[]>;
  removeNetwork(name: string): Promise<void>;
  removeVolume(name: string): Promise<void>;
}

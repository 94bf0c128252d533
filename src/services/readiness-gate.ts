import { ReadinessStage, ReadinessTimings, StageTiming } from '../config/readiness.js';
import { ContainersNotStartedError, ReadinessTimeoutError } from '../errors.js';
import { pollUntil, sleep as defaultSleep, Sleep } from '../lib/poll.js';
import { Reporter, silentReporter } from '../lib/reporter.js';
import { IComposeService } from './docker-interface.js';
import { WORDPRESS_SERVICE, WordPressCli } from './wp-cli.js';

export type HttpProbe = (url: string) => Promise<boolean>;

export interface ReadinessGateOptions {
  compose: IComposeService;
  httpProbe?: HttpProbe;
  reporter?: Reporter;
  signal?: AbortSignal;
  sleep?: Sleep;
  timings: ReadinessTimings;
  wp: WordPressCli;
}

type DiagnosticSource = { label: string; read: () => Promise<string> };

/**
 * Requests the URL and treats any status below 400 as reachable.
 */
export const fetchProbe: HttpProbe = async (url) => {
  const response = await fetch(url, { signal: AbortSignal.timeout(5000) });
  return response.status < 400;
};

/**
 * Blocks until an instance's containers, database and WordPress install are
 * up, in that order. Each stage must pass before the next is probed.
 */
export class ReadinessGate {
  readonly history: ReadinessStage[] = [];
  private readonly compose: IComposeService;
  private readonly httpProbe: HttpProbe;
  private readonly reporter: Reporter;
  private readonly signal?: AbortSignal;
  private readonly sleep: Sleep;
  private readonly timings: ReadinessTimings;
  private readonly wp: WordPressCli;

  constructor(options: ReadinessGateOptions) {
    this.compose = options.compose;
    this.httpProbe = options.httpProbe ?? fetchProbe;
    this.reporter = options.reporter ?? silentReporter;
    this.signal = options.signal;
    this.sleep = options.sleep ?? defaultSleep;
    this.timings = options.timings;
    this.wp = options.wp;
  }

  get stage(): ReadinessStage | undefined {
    return this.history.at(-1);
  }

  /**
   * Non-fatal: returns false after the configured attempts instead of throwing.
   */
  async checkHttp(url: string): Promise<boolean> {
    const { httpAttempts, httpInterval } = this.timings;
    this.reporter.info(`Checking ${url}...`);
    const result = await pollUntil(() => this.httpProbe(url), {
      interval: httpInterval,
      maxWait: httpAttempts * httpInterval,
      signal: this.signal,
      sleep: this.sleep,
    });

    if (result.ok) {
      this.reporter.success(`Site responds at ${url}`);
    } else {
      this.reporter.warn(`${url} did not respond after ${result.attempts} attempts; the site may still be starting`);
    }

    return result.ok;
  }

  async waitUntilReady(): Promise<void> {
    await this.waitForStart();

    await this.waitForStage(
      'containers-healthy',
      this.timings.containersHealthy,
      () => this.containersHealthy(),
      'Waiting for containers to be healthy...',
      [this.statusSource(), this.logSource('Database logs', 'db')],
    );
    this.reporter.success('Containers are healthy');

    await this.waitForStage(
      'database-reachable',
      this.timings.databaseReachable,
      () => this.wp.dbCheck(),
      'Database not ready yet...',
      [this.logSource('Database logs', 'db'), this.logSource('WordPress logs', WORDPRESS_SERVICE)],
    );
    this.reporter.success('Database connection established');

    await this.waitForStage(
      'app-installed',
      this.timings.appInstalled,
      () => this.wp.isInstalled(),
      'WordPress installation in progress...',
      [this.logSource('WordPress logs', WORDPRESS_SERVICE)],
    );
    this.reporter.success('WordPress installation completed');

    this.enter('ready');
  }

  private async collectDiagnostics(sources: DiagnosticSource[]): Promise<string> {
    const sections = await Promise.all(
      sources.map(async ({ label, read }) => {
        try {
          return `${label}:\n${await read()}`;
        } catch (error) {
          return `${label}: unavailable (${error instanceof Error ? error.message : String(error)})`;
        }
      }),
    );
    return sections.join('\n\n');
  }

  private async containersHealthy(): Promise<boolean> {
    const [db, wordpress] = await Promise.all([
      this.compose.serviceState('db'),
      this.compose.serviceState(WORDPRESS_SERVICE),
    ]);
    return db.health === 'healthy' && wordpress.status === 'running';
  }

  private enter(stage: ReadinessStage): void {
    this.history.push(stage);
    this.reporter.debug(`readiness stage: ${stage}`);
  }

  private logSource(label: string, service?: string): DiagnosticSource {
    return { label, read: () => this.compose.logs(service) };
  }

  private statusSource(): DiagnosticSource {
    return { label: 'Container status', read: () => this.compose.ps() };
  }

  private async waitForStage(
    stage: ReadinessStage,
    timing: StageTiming,
    probe: () => Promise<boolean>,
    progress: string,
    diagnostics: DiagnosticSource[],
  ): Promise<void> {
    this.enter(stage);
    const result = await pollUntil(probe, {
      interval: timing.interval,
      maxWait: timing.maxWait,
      onRetry: (waited, maxWait) => this.reporter.info(`  ${progress} (${waited}/${maxWait} seconds)`),
      signal: this.signal,
      sleep: this.sleep,
    });

    if (!result.ok) {
      throw new ReadinessTimeoutError(stage, result.attempts, result.waited, await this.collectDiagnostics(diagnostics));
    }
  }

  private async waitForStart(): Promise<void> {
    this.enter('starting');
    this.reporter.info('Waiting for containers to start...');
    await this.sleep(this.timings.grace * 1000);
    this.signal?.throwIfAborted();

    let running: string[] = [];
    try {
      running = await this.compose.runningServices();
    } catch (error) {
      this.reporter.debug(`listing running services failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (running.length === 0) {
      throw new ContainersNotStartedError(
        await this.collectDiagnostics([this.statusSource(), this.logSource('Container logs')]),
      );
    }

    this.reporter.success('Containers are running');
  }
}

import fs from 'fs-extra';

import { CONTENT_DIR } from '../config/settings.js';
import { WpdockError } from '../errors.js';
import { Reporter, silentReporter } from '../lib/reporter.js';
import { IComposeService } from './docker-interface.js';
import { WORDPRESS_SERVICE } from './wp-cli.js';

export type GuardState = 'armed' | 'committed' | 'idle' | 'rolled-back';

type Signal = 'SIGINT' | 'SIGTERM';

export interface SignalSource {
  once(event: Signal, listener: () => void): unknown;
  removeListener(event: Signal, listener: () => void): unknown;
}

export interface ProvisioningGuardOptions {
  compose: IComposeService;
  directory: string;
  exit?: (code: number) => void;
  owner?: { gid: number; uid: number };
  releaseClaim?: () => Promise<void>;
  removeDirectory?: (directory: string) => Promise<void>;
  reporter?: Reporter;
  signals?: SignalSource;
}

const SIGNAL_EXIT_CODES: Record<Signal, number> = { SIGINT: 130, SIGTERM: 143 };

/**
 * Undoes a half-provisioned instance unless `commit()` is reached. Armed
 * right after the instance directory is created.
 *
 * An interrupt aborts `signal`; the body is expected to check it between
 * steps. Rollback starts once the body has settled, so nothing the body
 * does can land after cleanup.
 */
export class ProvisioningGuard {
  private body?: Promise<void>;
  private readonly compose: IComposeService;
  private readonly controller = new AbortController();
  private readonly directory: string;
  private readonly exit: (code: number) => void;
  private readonly handlers = new Map<Signal, () => void>();
  private readonly owner: { gid: number; uid: number };
  private readonly releaseClaim?: () => Promise<void>;
  private readonly removeDirectory: (directory: string) => Promise<void>;
  private readonly reporter: Reporter;
  private readonly signals: SignalSource;
  private current: GuardState = 'idle';
  private interruption?: WpdockError;
  private undoing?: Promise<void>;

  constructor(options: ProvisioningGuardOptions) {
    this.compose = options.compose;
    this.directory = options.directory;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.owner = options.owner ?? { gid: process.getgid?.() ?? 0, uid: process.getuid?.() ?? 0 };
    this.releaseClaim = options.releaseClaim;
    this.removeDirectory = options.removeDirectory ?? ((directory) => fs.remove(directory));
    this.reporter = options.reporter ?? silentReporter;
    this.signals = options.signals ?? process;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get state(): GuardState {
    return this.current;
  }

  arm(): void {
    if (this.current !== 'idle') {
      return;
    }

    this.current = 'armed';
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const handler = (): void => {
        const exitCode = SIGNAL_EXIT_CODES[signal];
        this.reporter.warn(`Interrupted by ${signal}, cleaning up...`);
        this.interruption = new WpdockError({
          exitCode,
          kind: 'runtime',
          message: `Provisioning interrupted by ${signal}`,
          title: 'Interrupted',
        });
        this.controller.abort(this.interruption);
        void (this.body ?? Promise.resolve())
          .then(() => this.rollback())
          .finally(() => this.exit(exitCode));
      };

      this.handlers.set(signal, handler);
      this.signals.once(signal, handler);
    }
  }

  commit(): void {
    if (this.current === 'armed') {
      this.current = 'committed';
      this.detach();
    }
  }

  /**
   * Aborts the body's signal and undoes the instance. Calls made while a
   * rollback is running share it.
   */
  rollback(): Promise<void> {
    if (this.current === 'armed') {
      this.current = 'rolled-back';
      this.detach();
      if (!this.controller.signal.aborted) {
        this.controller.abort(new Error('Provisioning rolled back'));
      }

      this.undoing = this.undo();
    }

    return this.undoing ?? Promise.resolve();
  }

  /**
   * Runs the body with the guard armed; commits on success, rolls back and
   * rethrows on failure. After an interrupt the interruption is rethrown in
   * place of whatever the aborted step threw.
   */
  async run<T>(body: (signal: AbortSignal) => Promise<T>): Promise<T> {
    this.arm();
    const running = body(this.controller.signal);
    this.body = running.then(
      () => undefined,
      () => undefined,
    );

    try {
      const result = await running;
      this.commit();
      return result;
    } catch (error) {
      await this.rollback();
      throw this.interruption ?? error;
    }
  }

  private async attempt(step: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.reporter.debug(`cleanup step "${step}" failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Each step is best-effort: a failure is reported and the next step runs.
   */
  private async undo(): Promise<void> {
    this.reporter.warn('Provisioning failed. Cleaning up...');

    await this.attempt('restore wp-content ownership', async () => {
      const owner = `${this.owner.uid}:${this.owner.gid}`;
      const result = await this.compose.exec(WORDPRESS_SERVICE, ['chown', '-R', owner, `/var/www/html/${CONTENT_DIR}`]);
      if (result.exitCode !== 0) {
        throw new Error(result.stderr || `exit code ${result.exitCode}`);
      }
    });
    await this.attempt('remove containers and volumes', () => this.compose.down({ volumes: true }));
    await this.attempt(`remove ${this.directory}`, () => this.removeDirectory(this.directory));
    if (this.releaseClaim) {
      await this.attempt('release port claim', this.releaseClaim);
    }

    this.reporter.info('Cleanup complete.');
  }

  private detach(): void {
    for (const [signal, handler] of this.handlers) {
      this.signals.removeListener(signal, handler);
    }

    this.handlers.clear();
  }
}

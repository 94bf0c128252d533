import boxen from 'boxen';
import chalk from 'chalk';
import { ExecaError } from 'execa';

import { EXPLICIT_PORT_LIMITS, PORT_RANGE } from './config/ports.js';
import { ReadinessStage, STAGE_LABELS } from './config/readiness.js';

export type WpdockErrorKind = 'dependency' | 'not_found' | 'runtime' | 'timeout' | 'validation';

interface WpdockErrorOptions {
  detail?: string;
  exitCode?: number;
  hint?: string;
  kind: WpdockErrorKind;
  message: string;
  title?: string;
}

export class WpdockError extends Error {
  readonly detail?: string;
  readonly exitCode: number;
  readonly hint?: string;
  readonly kind: WpdockErrorKind;
  readonly title: string;

  constructor(options: WpdockErrorOptions) {
    super(options.message);
    this.name = 'WpdockError';
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
    this.title = options.title ?? 'Error';
  }
}

export class NoPortAvailableError extends WpdockError {
  readonly start: number;

  constructor(start: number, end: number = PORT_RANGE.END) {
    super({
      hint: 'Remove unused instances with `wpdock cleanup` or free a port in the range.',
      kind: 'runtime',
      message: `No available ports found between ${start} and ${end}`,
      title: 'No Port Available',
    });
    this.name = 'NoPortAvailableError';
    this.start = start;
  }
}

export class InvalidPortError extends WpdockError {
  constructor(value: number | string) {
    super({
      hint: 'Pass an integer port, for example --port 8085.',
      kind: 'validation',
      message: `Port must be a number between ${EXPLICIT_PORT_LIMITS.MIN} and ${EXPLICIT_PORT_LIMITS.MAX}, got "${value}"`,
      title: 'Invalid Port',
    });
    this.name = 'InvalidPortError';
  }
}

export class PortInUseError extends WpdockError {
  constructor(port: number) {
    super({
      hint: 'Pick another port or omit --port to allocate one automatically.',
      kind: 'validation',
      message: `Port ${port} is already in use`,
      title: 'Port In Use',
    });
    this.name = 'PortInUseError';
  }
}

export class PortClaimedError extends WpdockError {
  readonly port: number;

  constructor(port: number, owner: string) {
    super({
      kind: 'runtime',
      message: `Port ${port} is being claimed by ${owner}`,
      title: 'Port Claimed',
    });
    this.name = 'PortClaimedError';
    this.port = port;
  }
}

export class InstanceExistsError extends WpdockError {
  constructor(name: string, directory: string) {
    super({
      hint: `Choose another name or remove it first with \`wpdock remove ${name}\`.`,
      kind: 'validation',
      message: `Directory ${directory} already exists`,
      title: 'Instance Exists',
    });
    this.name = 'InstanceExistsError';
  }
}

export class InstanceNotFoundError extends WpdockError {
  constructor(name: string) {
    super({
      hint: 'Run `wpdock list` to see the available instances.',
      kind: 'not_found',
      message: `Instance ${name} not found`,
      title: 'Instance Not Found',
    });
    this.name = 'InstanceNotFoundError';
  }
}

export class ContainersNotStartedError extends WpdockError {
  readonly stage: ReadinessStage = 'starting';

  constructor(detail?: string) {
    super({
      detail,
      hint: 'Check the container status and logs below.',
      kind: 'runtime',
      message: 'Containers failed to start',
      title: 'Containers Not Started',
    });
    this.name = 'ContainersNotStartedError';
  }
}

export class ReadinessTimeoutError extends WpdockError {
  readonly attempts: number;
  readonly stage: ReadinessStage;

  constructor(stage: ReadinessStage, attempts: number, waitedSeconds: number, detail?: string) {
    super({
      detail,
      kind: 'timeout',
      message: `Timed out waiting for ${STAGE_LABELS[stage]} after ${waitedSeconds} seconds (${attempts} checks)`,
      title: 'Readiness Timeout',
    });
    this.name = 'ReadinessTimeoutError';
    this.stage = stage;
    this.attempts = attempts;
  }
}

export function toWpdockError(error: unknown): WpdockError {
  if (error instanceof WpdockError) {
    return error;
  }

  if (error instanceof ExecaError) {
    const execaError: ExecaError = error;
    const detail = [execaError.stdout, execaError.stderr]
      .filter((part): part is string => typeof part === 'string' && part.length > 0)
      .join('\n');
    return new WpdockError({
      detail: detail || undefined,
      kind: 'runtime',
      message: error.shortMessage,
      title: 'Command Failed',
    });
  }

  if (error instanceof Error) {
    return new WpdockError({ kind: 'runtime', message: error.message });
  }

  return new WpdockError({ kind: 'runtime', message: String(error) });
}

/**
 * Boxed rendering used by every command before it exits non-zero.
 */
export function renderError(error: WpdockError): string {
  const parts = [chalk.red.bold(error.title), '', error.message];
  if (error.hint) {
    parts.push('', `${chalk.yellow('Hint:')} ${error.hint}`);
  }

  const box = boxen(parts.join('\n'), {
    borderColor: 'red',
    borderStyle: 'round',
    margin: 1,
    padding: 1,
    title: 'Error',
    titleAlignment: 'center',
  });

  return error.detail ? `${box}\n${error.detail}` : box;
}

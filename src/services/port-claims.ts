import fs from 'fs-extra';
import { join } from 'node:path';

import { STATE_DIR } from '../config/settings.js';
import { PortClaimedError } from '../errors.js';

export interface PortClaim {
  claimedAt: string;
  instance: string;
  pid: number;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function isClaim(value: unknown): value is PortClaim {
  return (
    typeof value === 'object' &&
    value !== null &&
    'instance' in value &&
    typeof value.instance === 'string' &&
    'pid' in value &&
    typeof value.pid === 'number'
  );
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Marker files under `<workspace>/.wpdock/claims` that reserve a port between
 * allocation and the moment the instance's compose file exists. Creation is
 * exclusive, so two workflows cannot claim the same port.
 */
export class PortClaims {
  private readonly directory: string;
  private readonly isAlive: (pid: number) => boolean;
  private readonly pid: number;

  constructor(workspace: string, options: { isAlive?: (pid: number) => boolean; pid?: number } = {}) {
    this.directory = join(workspace, STATE_DIR, 'claims');
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.pid = options.pid ?? process.pid;
  }

  /**
   * Claims the port for the instance. Replaces a claim left by a dead process;
   * throws PortClaimedError when a live one holds it.
   */
  async claim(port: number, instance: string): Promise<void> {
    await fs.ensureDir(this.directory);
    const claim: PortClaim = { claimedAt: new Date().toISOString(), instance, pid: this.pid };

    try {
      await fs.writeFile(this.fileFor(port), JSON.stringify(claim), { flag: 'wx' });
      return;
    } catch (error) {
      if (!hasCode(error, 'EEXIST')) {
        throw error;
      }
    }

    const existing = await this.read(port);
    if (existing && this.isAlive(existing.pid)) {
      throw new PortClaimedError(port, existing.instance);
    }

    await fs.remove(this.fileFor(port));
    try {
      await fs.writeFile(this.fileFor(port), JSON.stringify(claim), { flag: 'wx' });
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        throw new PortClaimedError(port, 'another workflow');
      }

      throw error;
    }
  }

  /** True when a live process holds a claim on the port. */
  async isClaimed(port: number): Promise<boolean> {
    const claim = await this.read(port);
    return claim !== undefined && this.isAlive(claim.pid);
  }

  async read(port: number): Promise<PortClaim | undefined> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.fileFor(port), 'utf8'));
      return isClaim(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }

  async release(port: number): Promise<void> {
    await fs.remove(this.fileFor(port));
  }

  private fileFor(port: number): string {
    return join(this.directory, `${port}.json`);
  }
}

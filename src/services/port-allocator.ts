import { EXPLICIT_PORT_LIMITS, PORT_RANGE } from '../config/ports.js';
import { InvalidPortError, NoPortAvailableError, PortClaimedError, PortInUseError } from '../errors.js';
import { HostPortInspector } from './host-ports.js';

export interface SiblingPorts {
  declaredPorts(excluding?: string): Promise<Map<number, string>>;
}

export interface ClaimStore {
  claim(port: number, instance: string): Promise<void>;
  isClaimed(port: number): Promise<boolean>;
  release(port: number): Promise<void>;
}

export interface PortAllocatorOptions {
  claims?: ClaimStore;
  end?: number;
  hostPorts: HostPortInspector;
  siblings: SiblingPorts;
}

/**
 * Parses a caller-pinned port. Accepts base-10 integers in [1024, 65535].
 */
export function validatePort(value: number | string): number {
  const text = String(value).trim();
  if (!/^\d+$/.test(text)) {
    throw new InvalidPortError(value);
  }

  const port = Number.parseInt(text, 10);
  if (port < EXPLICIT_PORT_LIMITS.MIN || port > EXPLICIT_PORT_LIMITS.MAX) {
    throw new InvalidPortError(value);
  }

  return port;
}

export class PortAllocator {
  private readonly claims?: ClaimStore;
  private readonly end: number;
  private readonly hostPorts: HostPortInspector;
  private readonly siblings: SiblingPorts;

  constructor(options: PortAllocatorOptions) {
    this.claims = options.claims;
    this.end = options.end ?? PORT_RANGE.END;
    this.hostPorts = options.hostPorts;
    this.siblings = options.siblings;
  }

  /**
   * Rejects an explicit port that something on the host already listens on.
   */
  async ensureExplicitPortFree(port: number): Promise<void> {
    if (await this.hostPorts.isBound(port)) {
      throw new PortInUseError(port);
    }
  }

  /**
   * Lowest port in [start, end] that is not bound on the host, not declared
   * by a sibling instance and not claimed by a live workflow. Read-only.
   */
  async findAvailablePort(start: number = PORT_RANGE.START): Promise<number> {
    let declared: Map<number, string> | undefined;

    for (let port = start; port <= this.end; port++) {
      // eslint-disable-next-line no-await-in-loop
      if (await this.hostPorts.isBound(port)) {
        continue;
      }

      // eslint-disable-next-line no-await-in-loop
      declared ??= await this.siblings.declaredPorts();
      if (declared.has(port)) {
        continue;
      }

      // eslint-disable-next-line no-await-in-loop
      if (this.claims && (await this.claims.isClaimed(port))) {
        continue;
      }

      return port;
    }

    throw new NoPortAvailableError(start, this.end);
  }

  /**
   * Finds a port and claims it for the instance. A port claimed by another
   * workflow between scan and claim is skipped. Exhaustion is reported
   * against the caller's start port.
   */
  async reservePort(instance: string, start: number = PORT_RANGE.START): Promise<number> {
    let from = start;
    for (;;) {
      // eslint-disable-next-line no-await-in-loop
      const port = await this.findAvailablePort(from).catch((error: unknown) => {
        throw error instanceof NoPortAvailableError ? new NoPortAvailableError(start, this.end) : error;
      });
      if (!this.claims) {
        return port;
      }

      try {
        // eslint-disable-next-line no-await-in-loop
        await this.claims.claim(port, instance);
        return port;
      } catch (error) {
        if (!(error instanceof PortClaimedError)) {
          throw error;
        }

        from = port + 1;
      }
    }
  }
}

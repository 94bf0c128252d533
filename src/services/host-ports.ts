import { execa } from 'execa';
import * as net from 'node:net';

/**
 * Answers "is something on this host bound to port P?".
 */
export interface HostPortInspector {
  isBound(port: number): Promise<boolean>;
}

/**
 * Extracts the local ports from `ss -tuln` or `netstat -tuln` output.
 * The local address is the first column ending in `:<port>`.
 */
export function parseListeningPorts(output: string): Set<number> {
  const ports = new Set<number>();
  for (const line of output.split('\n')) {
    const columns = line.trim().split(/\s+/);
    const local = columns.find((column) => /:\d+$/.test(column));
    if (!local) {
      continue;
    }

    const port = Number.parseInt(local.slice(local.lastIndexOf(':') + 1), 10);
    if (Number.isInteger(port)) {
      ports.add(port);
    }
  }

  return ports;
}

/**
 * Tries to listen on the port, on all interfaces.
 */
export function isPortAvailable(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', () => {
      resolve(false);
    });
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen(port);
  });
}

type ListingCommand = () => Promise<string>;

const listWith = (file: string): ListingCommand => async () => {
  const { stdout } = await execa(file, ['-tuln']);
  return stdout;
};

/**
 * Inspects host sockets through `ss`, then `netstat`. When neither tool is
 * installed each port is probed by binding it. The listing is taken once
 * per inspector, so create one per allocation scan.
 */
export class SystemPortInspector implements HostPortInspector {
  private listing?: Promise<Set<number> | undefined>;
  private readonly listers: ListingCommand[];
  private readonly probe: (port: number) => Promise<boolean>;

  constructor(
    listers: ListingCommand[] = [listWith('ss'), listWith('netstat')],
    probe: (port: number) => Promise<boolean> = isPortAvailable,
  ) {
    this.listers = listers;
    this.probe = probe;
  }

  async isBound(port: number): Promise<boolean> {
    this.listing ??= this.loadListing();
    const bound = await this.listing;
    if (bound) {
      return bound.has(port);
    }

    return !(await this.probe(port));
  }

  private async loadListing(): Promise<Set<number> | undefined> {
    for (const lister of this.listers) {
      try {
        // eslint-disable-next-line no-await-in-loop
        return parseListeningPorts(await lister());
      } catch {
        continue;
      }
    }

    return undefined;
  }
}

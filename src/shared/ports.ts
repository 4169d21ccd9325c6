/**
 * Random host port selection for single-container previews
 */

import net from 'net';
import { PortAllocationError } from './errors.js';

export interface PortRange {
  min: number;
  max: number;
}

export type PortProbe = (port: number) => Promise<boolean>;

const MAX_PROBES = 100;

/**
 * Check whether nothing is listening on `port` by briefly binding it
 */
export function isPortFree(port: number): Promise<boolean> {
  return new Promise(resolve => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen(port, '0.0.0.0');
  });
}

export class PortAllocator {
  private range: PortRange;
  private probe: PortProbe;
  private random: () => number;

  constructor(
    range: PortRange = { min: 4000, max: 7000 },
    probe: PortProbe = isPortFree,
    random: () => number = Math.random
  ) {
    if (range.min < 1 || range.max > 65535 || range.min > range.max) {
      throw new Error(`Invalid port range ${range.min}-${range.max}`);
    }
    this.range = range;
    this.probe = probe;
    this.random = random;
  }

  /**
   * Pick a random port in range that is currently free
   * @param exclude - Ports already tried by the caller
   */
  async allocate(exclude: ReadonlySet<number> = new Set()): Promise<number> {
    const span = this.range.max - this.range.min + 1;

    for (let probes = 0; probes < MAX_PROBES; probes++) {
      const port = this.range.min + Math.floor(this.random() * span);
      if (exclude.has(port)) continue;
      if (await this.probe(port)) {
        return port;
      }
    }

    throw new PortAllocationError(
      `No free port found in range ${this.range.min}-${this.range.max} after ${MAX_PROBES} probes`
    );
  }
}

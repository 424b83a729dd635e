import { Socket } from 'node:net';
import { availableParallelism } from 'node:os';
import { getLogger } from '../shared/logger.js';
import { hostCount, hosts, parseCidr } from './cidr.js';
import type {
  Candidate,
  CandidateSource,
  ProbeFn,
  SendCandidate,
} from './types.js';

const log = getLogger('discovery', { component: 'subnet-scanner' });

export const DEFAULT_SCAN_TIMEOUT_MS = 200;

/**
 * Resolves true when a TCP connection to host:port completes within
 * `timeoutMs`. Refused, unreachable and timed-out connects resolve false.
 * The socket is destroyed as soon as the outcome is known.
 */
export function tcpProbe(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new Socket();
    let settled = false;

    const finish = (open: boolean): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(open);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect({ host, port });
  });
}

export interface SubnetScannerConfig {
  port: number;
  /** Connect timeout per probe. Default: 200 */
  timeoutMs?: number;
  /** Probes in flight at once. Default: available compute units */
  concurrency?: number;
  probe?: ProbeFn;
}

/**
 * Range-mode address source. Every host of a CIDR range is probed for an
 * open port; hosts that accept the connection become candidates.
 *
 * A fixed set of workers pulls addresses from one shared iterator, so a
 * slow probe only holds up its own worker. Emission order across the
 * range is therefore not the address order.
 */
export class SubnetScanner implements CandidateSource {
  readonly kind = 'range';
  private readonly port: number;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly probe: ProbeFn;

  constructor(
    private readonly cidr: string,
    config: SubnetScannerConfig,
  ) {
    this.port = config.port;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SCAN_TIMEOUT_MS;
    this.concurrency = Math.max(1, config.concurrency ?? availableParallelism());
    this.probe = config.probe ?? tcpProbe;
  }

  async produce(send: SendCandidate): Promise<void> {
    const range = parseCidr(this.cidr);
    if (!range) {
      // Unparseable ranges scan nothing; the run completes with no results.
      log.debug({ cidr: this.cidr }, 'Range did not parse, nothing to scan');
      return;
    }

    const total = hostCount(range);
    log.info(
      { cidr: this.cidr, hosts: total.toString(), port: this.port, concurrency: this.concurrency },
      'Starting subnet scan',
    );

    const addresses = hosts(range);
    let open = 0;

    const worker = async (): Promise<void> => {
      // next() runs synchronously, so workers sharing the iterator never
      // receive the same address.
      for (let next = addresses.next(); !next.done; next = addresses.next()) {
        const host = next.value;
        if (await this.probe(host, this.port, this.timeoutMs)) {
          open++;
          const candidate: Candidate = { host, port: this.port, family: range.family };
          await send(candidate);
        }
      }
    };

    const workerCount = total < BigInt(this.concurrency) ? Number(total) : this.concurrency;
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    log.info({ cidr: this.cidr, open }, 'Subnet scan complete');
  }
}

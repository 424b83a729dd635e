import { fetch, ProxyAgent } from 'undici';
import { ZodError } from 'zod';
import { getLogger } from '../shared/logger.js';
import { VerificationError } from '../shared/errors.js';
import { formatEndpoint, proxyUrl } from '../discovery/endpoint.js';
import type { Candidate } from '../discovery/types.js';
import {
  geoResponseSchema,
  type ProxyResult,
  type VerificationOutcome,
  type Verifier,
} from './types.js';

const log = getLogger('proxy', { component: 'verifier' });

export const DEFAULT_GEO_API_URL = 'http://ip-api.com/json';
export const DEFAULT_TEST_TIMEOUT_SEC = 10;

const UNKNOWN = 'Unknown';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

export interface ProxyVerifierConfig {
  /** Budget for the whole proxied request, in seconds. Default: 10 */
  timeoutSec?: number;
  /** Endpoint queried through each proxy. Default: ip-api.com */
  geoApiUrl?: string;
}

/**
 * Turns whatever a failed attempt threw into a one-line reason.
 * undici reports transport problems as `TypeError: fetch failed` with the
 * socket error as `cause`, so the cause is appended when present.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return `Invalid geolocation response: ${issues}`;
  }

  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }

  return String(error);
}

/**
 * Verifies a candidate by routing one geolocation request through it as
 * an HTTP forward proxy. Exactly one attempt is made; every way the
 * attempt can fail (connect, proxy handshake, timeout, bad body, API
 * status) comes back as a Failure outcome rather than a rejection.
 */
export class ProxyVerifier {
  private readonly timeoutMs: number;
  private readonly geoApiUrl: string;

  constructor(config: ProxyVerifierConfig = {}) {
    this.timeoutMs = (config.timeoutSec ?? DEFAULT_TEST_TIMEOUT_SEC) * 1000;
    this.geoApiUrl = config.geoApiUrl ?? DEFAULT_GEO_API_URL;
  }

  async verify(candidate: Candidate): Promise<VerificationOutcome> {
    const endpoint = formatEndpoint(candidate);
    const signal = AbortSignal.timeout(this.timeoutMs);
    let dispatcher: ProxyAgent | undefined;

    try {
      dispatcher = new ProxyAgent({ uri: proxyUrl(candidate) });
      const start = performance.now();
      const response = await fetch(this.geoApiUrl, {
        method: 'GET',
        signal,
        headers: { 'User-Agent': USER_AGENT },
        dispatcher,
      });
      // Measured to the response headers, before the body is read.
      const responseTimeMs = Math.round(performance.now() - start);

      const geo = geoResponseSchema.parse(await response.json());

      if (geo.status !== 'success') {
        throw new VerificationError(
          `Geo API error: ${geo.message ?? 'API error'}`,
          'GEO_API_ERROR',
          endpoint,
        );
      }

      const result: ProxyResult = {
        ip: candidate.host,
        responseTimeMs,
        location: `${geo.city ?? UNKNOWN}, ${geo.country ?? UNKNOWN}`,
      };

      log.debug({ proxy: endpoint, ...result }, 'Proxy verified');
      return { ok: true, result };
    } catch (error) {
      const reason = describeFailure(error);
      log.debug({ proxy: endpoint, reason }, 'Proxy verification failed');
      return { ok: false, candidate, reason };
    } finally {
      await dispatcher?.destroy();
    }
  }

  /** The verifier as a plain function, for the pipeline. */
  asVerifier(): Verifier {
    return (candidate) => this.verify(candidate);
  }
}

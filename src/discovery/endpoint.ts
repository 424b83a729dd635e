import { isIP } from 'node:net';
import type { Candidate } from './types.js';

const PORT_PATTERN = /^\d{1,5}$/;
const BRACKETED_V6 = /^\[([^\]]+)\]:(\d{1,5})$/;

function toPort(raw: string): number | null {
  if (!PORT_PATTERN.test(raw)) return null;
  const port = parseInt(raw, 10);
  return port <= 65535 ? port : null;
}

/**
 * Parses a candidate address in one of these forms:
 *   - 203.0.113.5          (uses `defaultPort`)
 *   - 203.0.113.5:8080
 *   - 2001:db8::1          (uses `defaultPort`)
 *   - [2001:db8::1]:8080
 *
 * Returns null for anything else, including hostnames.
 */
export function parseEndpoint(raw: string, defaultPort: number): Candidate | null {
  const value = raw.trim();
  if (value.length === 0) return null;

  const bracketed = BRACKETED_V6.exec(value);
  if (bracketed) {
    const [, host = '', rawPort = ''] = bracketed;
    const port = toPort(rawPort);
    if (port === null || isIP(host) !== 6) return null;
    return { host, port, family: 6 };
  }

  const bare = isIP(value);
  if (bare === 4 || bare === 6) {
    return { host: value, port: defaultPort, family: bare };
  }

  // Only IPv4 may carry an unbracketed port.
  const colon = value.lastIndexOf(':');
  if (colon <= 0) return null;

  const host = value.slice(0, colon);
  const port = toPort(value.slice(colon + 1));
  if (port === null || isIP(host) !== 4) return null;

  return { host, port, family: 4 };
}

export function formatEndpoint(candidate: Candidate): string {
  return candidate.family === 6
    ? `[${candidate.host}]:${candidate.port}`
    : `${candidate.host}:${candidate.port}`;
}

/** URL of the candidate when used as an HTTP forward proxy. */
export function proxyUrl(candidate: Candidate): string {
  return `http://${formatEndpoint(candidate)}`;
}

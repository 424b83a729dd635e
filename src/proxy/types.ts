/**
 * Shared type definitions for the proxy module.
 */

import { z } from 'zod';
import type { Candidate } from '../discovery/types.js';

/** Body returned by the geolocation endpoint. Extra fields are ignored. */
export const geoResponseSchema = z.object({
  status: z.string(),
  country: z.string().nullish(),
  city: z.string().nullish(),
  message: z.string().nullish(),
});

export type GeoResponse = z.infer<typeof geoResponseSchema>;

export interface ProxyResult {
  /** Address of the proxy, without the port. */
  ip: string;
  responseTimeMs: number;
  /** "City, Country"; either part may be "Unknown". */
  location: string;
}

export type VerificationOutcome =
  | { ok: true; result: ProxyResult }
  | { ok: false; candidate: Candidate; reason: string };

/**
 * Tests one candidate. Must resolve with an outcome for every proxy
 * failure; a rejection means the check itself could not run.
 */
export type Verifier = (candidate: Candidate) => Promise<VerificationOutcome>;

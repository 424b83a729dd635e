/**
 * Type definitions for the discovery module.
 * These types describe candidate endpoints and the sources that
 * produce them ahead of proxy verification.
 */

// ---------------------------------------------------------------------------
// Candidate endpoints
// ---------------------------------------------------------------------------

export type IpFamily = 4 | 6;

/**
 * An address/port pair that may be a working HTTP proxy.
 * Plain value: two candidates with equal fields are interchangeable.
 */
export interface Candidate {
  readonly host: string;
  readonly port: number;
  readonly family: IpFamily;
}

// ---------------------------------------------------------------------------
// Address ranges
// ---------------------------------------------------------------------------

export interface CidrRange {
  readonly family: IpFamily;
  /** Network address with host bits cleared. */
  readonly network: bigint;
  readonly prefix: number;
}

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

/**
 * Hands one candidate downstream. The returned promise stays pending
 * while the downstream buffer is full.
 */
export type SendCandidate = (candidate: Candidate) => Promise<void>;

export type SourceKind = 'range' | 'file';

export interface CandidateSource {
  readonly kind: SourceKind;
  /** Number of candidates the source will emit, when known up front. */
  readonly total?: number;
  /**
   * Emits every candidate through `send`, then resolves. Rejects only
   * for errors that should abort the run.
   */
  produce(send: SendCandidate): Promise<void>;
}

/** A TCP reachability check for one host. */
export type ProbeFn = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

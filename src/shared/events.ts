import { EventEmitter } from 'eventemitter3';
import type { Candidate, SourceKind } from '../discovery/types.js';
import type { ProxyResult } from '../proxy/types.js';

export interface PipelineSummary {
  candidates: number;
  succeeded: number;
  failed: number;
  faulted: number;
}

/**
 * Events emitted while a scan runs.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface PipelineEvents {
  'pipeline:started': {
    source: SourceKind;
    total?: number;
  };
  'candidate:found': {
    candidate: Candidate;
  };
  'verify:success': {
    result: ProxyResult;
  };
  'verify:failure': {
    candidate: Candidate;
    reason: string;
  };
  'verify:fault': {
    error: unknown;
  };
  'pipeline:completed': PipelineSummary & {
    results: readonly ProxyResult[];
  };
}

type Listener<T> = (payload: T) => void;

/**
 * Strongly-typed event emitter. Each listener receives a single payload
 * object so handlers can destructure what they need.
 */
export class TypedEventEmitter extends EventEmitter<{
  [K in keyof PipelineEvents]: Listener<PipelineEvents[K]>;
}> {}

import { getLogger } from '../shared/logger.js';
import { TypedEventEmitter, type PipelineSummary } from '../shared/events.js';
import type { Candidate, CandidateSource } from '../discovery/types.js';
import type { ProxyResult, VerificationOutcome, Verifier } from '../proxy/types.js';
import { BoundedChannel, DEFAULT_CHANNEL_CAPACITY } from './channel.js';
import { TaskSet, type TaskResult } from './task-set.js';

const log = getLogger('pipeline', { component: 'aggregator' });

export interface PipelineOptions {
  source: CandidateSource;
  verify: Verifier;
  /** Candidates allowed to queue ahead of verification. Default: 200 */
  channelCapacity?: number;
  events?: TypedEventEmitter;
}

export interface PipelineResult extends PipelineSummary {
  /** Successful proxies, fastest first. */
  results: ProxyResult[];
}

type LoopEvent =
  | { kind: 'candidate'; candidate: Candidate | undefined }
  | { kind: 'completion'; result: TaskResult<VerificationOutcome> | undefined };

/** Stable ascending sort by response time; ties keep arrival order. */
export function sortByResponseTime(results: readonly ProxyResult[]): ProxyResult[] {
  return results
    .map((result, index) => ({ result, index }))
    .sort((a, b) => a.result.responseTimeMs - b.result.responseTimeMs || a.index - b.index)
    .map(({ result }) => result);
}

/**
 * Runs discovery and verification concurrently.
 *
 * The source fills a bounded channel while a single loop waits on
 * whichever comes first: the next candidate (which immediately spawns a
 * verification unit) or the next finished unit (which is classified).
 * At most one receive and one join are pending at any time; whichever
 * loses a race is carried into the next iteration rather than re-issued,
 * so no candidate or completion is dropped.
 *
 * The loop ends once the channel is closed and drained and no unit is
 * outstanding. If the source failed, its error is rethrown after every
 * spawned unit has been collected.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { source, verify } = options;
  const events = options.events ?? new TypedEventEmitter();
  const channel = new BoundedChannel<Candidate>(
    options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY,
  );
  const tasks = new TaskSet<VerificationOutcome>();

  const summary: PipelineSummary = { candidates: 0, succeeded: 0, failed: 0, faulted: 0 };
  const successes: ProxyResult[] = [];

  events.emit('pipeline:started', { source: source.kind, total: source.total });
  log.info({ source: source.kind, total: source.total }, 'Pipeline started');

  let sourceError: unknown;
  let sourceFailed = false;
  const producer = source
    .produce((candidate) => channel.send(candidate))
    .catch((error: unknown) => {
      sourceFailed = true;
      sourceError = error;
    })
    .finally(() => channel.close());

  let pendingRecv: Promise<LoopEvent> | null = null;
  let pendingJoin: Promise<LoopEvent> | null = null;
  let sourceOpen = true;

  while (sourceOpen || tasks.size > 0) {
    if (sourceOpen && !pendingRecv) {
      pendingRecv = channel
        .recv()
        .then((candidate): LoopEvent => ({ kind: 'candidate', candidate }));
    }
    if (tasks.size > 0 && !pendingJoin) {
      pendingJoin = tasks
        .joinNext()
        .then((result): LoopEvent => ({ kind: 'completion', result }));
    }

    const waits: Promise<LoopEvent>[] = [];
    if (pendingRecv) waits.push(pendingRecv);
    if (pendingJoin) waits.push(pendingJoin);

    const event = await Promise.race(waits);

    if (event.kind === 'candidate') {
      pendingRecv = null;
      if (event.candidate === undefined) {
        sourceOpen = false;
        continue;
      }
      const candidate = event.candidate;
      summary.candidates++;
      events.emit('candidate:found', { candidate });
      tasks.spawn(() => verify(candidate));
      continue;
    }

    pendingJoin = null;
    if (!event.result) continue;

    const result = event.result;
    if (result.status === 'fault') {
      summary.faulted++;
      log.warn({ err: result.error }, 'Verification task failed to run');
      events.emit('verify:fault', { error: result.error });
    } else if (result.value.ok) {
      summary.succeeded++;
      successes.push(result.value.result);
      events.emit('verify:success', { result: result.value.result });
    } else {
      summary.failed++;
      events.emit('verify:failure', {
        candidate: result.value.candidate,
        reason: result.value.reason,
      });
    }
  }

  await producer;
  if (sourceFailed) {
    log.error({ err: sourceError }, 'Candidate source failed');
    throw sourceError;
  }

  const results = sortByResponseTime(successes);
  log.info(summary, 'Pipeline completed');
  events.emit('pipeline:completed', { ...summary, results });

  return { ...summary, results };
}

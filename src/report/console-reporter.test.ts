import { describe, expect, it } from 'vitest';
import { TypedEventEmitter } from '../shared/events.js';
import { ConsoleReporter } from './console-reporter.js';
import type { OutputStream } from './progress.js';

function capture(): OutputStream & { text: () => string } {
  const chunks: string[] = [];
  return {
    isTTY: false,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}

const candidate = { host: '203.0.113.9', port: 8080, family: 4 } as const;

describe('ConsoleReporter', () => {
  it('prints the no-results line on an empty ranking', () => {
    const out = capture();
    new ConsoleReporter({ verbose: false, out, status: capture(), color: false }).printResults([]);
    expect(out.text()).toBe('\nNo working HTTP proxies were found.\n');
  });

  it('prints a heading and the table for results', () => {
    const out = capture();
    new ConsoleReporter({ verbose: false, out, status: capture(), color: false }).printResults([
      { ip: '203.0.113.9', responseTimeMs: 80, location: 'Oslo, Norway' },
    ]);

    const lines = out.text().split('\n');
    expect(lines.slice(0, 3)).toEqual([
      '',
      '--- Final Results ---',
      '┌──────┬─────────────┬───────────────┬──────────────┐',
    ]);
    expect(lines).toContain('│ 1    │ 203.0.113.9 │ 80 ms         │ Oslo, Norway │');
  });

  it('logs each event in verbose mode', () => {
    const status = capture();
    const events = new TypedEventEmitter();
    new ConsoleReporter({ verbose: true, out: capture(), status, color: false }).attach(events);

    events.emit('pipeline:started', { source: 'range' });
    events.emit('candidate:found', { candidate });
    events.emit('verify:success', {
      result: { ip: '203.0.113.9', responseTimeMs: 80, location: 'Oslo, Norway' },
    });
    events.emit('verify:failure', { candidate, reason: 'connection refused' });
    events.emit('verify:fault', { error: new Error('task crashed') });

    expect(status.text().split('\n')).toEqual([
      '[FOUND]   Potential proxy at 203.0.113.9:8080',
      '[SUCCESS] 203.0.113.9 connected in 80ms',
      '[GEO]      203.0.113.9 located in Oslo, Norway',
      '[FAIL]     203.0.113.9:8080: connection refused',
      '[ERROR]   A test task failed: task crashed',
      '',
    ]);
  });

  it('stays quiet without verbose', () => {
    const status = capture();
    const events = new TypedEventEmitter();
    new ConsoleReporter({ verbose: false, out: capture(), status, color: false }).attach(events);

    events.emit('pipeline:started', { source: 'file', total: 1 });
    events.emit('candidate:found', { candidate });
    events.emit('verify:failure', { candidate, reason: 'timeout' });

    expect(status.text()).toBe('');
  });

  it('reports where results were saved', () => {
    const out = capture();
    new ConsoleReporter({ verbose: false, out, color: false }).printSaved('ranked.csv');
    expect(out.text()).toBe('\nResults saved to ranked.csv\n');
  });
});

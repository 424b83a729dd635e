import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readCandidateFile } from '../discovery/record-reader.js';
import type { Candidate } from '../discovery/types.js';
import type { OutputStream } from '../report/progress.js';
import type { Verifier } from '../proxy/types.js';
import { main, type RunDependencies } from './run.js';

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

const LATENCY: Record<string, number> = {
  '203.0.113.5': 90,
  '198.51.100.4': 30,
};

const stubVerifier: Verifier = async (candidate: Candidate) => {
  const ms = LATENCY[candidate.host];
  if (ms === undefined) return { ok: false, candidate, reason: 'connection refused' };
  return {
    ok: true,
    result: {
      ip: candidate.host,
      responseTimeMs: ms,
      location: candidate.host === '198.51.100.4' ? 'Paris, France' : 'Oslo, Norway',
    },
  };
};

describe('main', () => {
  let dir: string;
  let out: ReturnType<typeof capture>;
  let status: ReturnType<typeof capture>;
  let deps: RunDependencies;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'proxyscout-cli-'));
    out = capture();
    status = capture();
    deps = { out, status, color: false, verify: stubVerifier };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports no proxies for an empty input file', async () => {
    const input = join(dir, 'empty.csv');
    await writeFile(input, '', 'utf-8');

    await expect(main(['--input', input], deps)).resolves.toBe(0);
    expect(out.text()).toBe('\nNo working HTTP proxies were found.\n');
  });

  it('ranks working proxies and writes the results file', async () => {
    const input = join(dir, 'list.csv');
    const output = join(dir, 'ranked.csv');
    await writeFile(input, 'IP Address\n203.0.113.5\n192.0.2.1:3128\n198.51.100.4:8080\n', 'utf-8');

    await expect(main(['-i', input, '-o', output], deps)).resolves.toBe(0);

    const lines = out.text().split('\n');
    expect(lines[1]).toBe('--- Final Results ---');
    expect(lines).toContain('│ 1    │ 198.51.100.4 │ 30 ms         │ Paris, France │');
    expect(lines).toContain('│ 2    │ 203.0.113.5  │ 90 ms         │ Oslo, Norway  │');
    expect(out.text().endsWith(`\nResults saved to ${output}\n`)).toBe(true);

    await expect(readFile(output, 'utf-8')).resolves.toBe(
      'IP Address,Response Time (ms),Location\n' +
        '198.51.100.4,30,"Paris, France"\n' +
        '203.0.113.5,90,"Oslo, Norway"\n',
    );
  });

  it('writes a results file that can be read back as input', async () => {
    const input = join(dir, 'list.csv');
    const output = join(dir, 'ranked.csv');
    await writeFile(input, 'IP Address\n203.0.113.5\n198.51.100.4\n', 'utf-8');

    await main(['-i', input, '-o', output], deps);

    await expect(readCandidateFile(output, 7890)).resolves.toEqual([
      { host: '198.51.100.4', port: 7890, family: 4 },
      { host: '203.0.113.5', port: 7890, family: 4 },
    ]);
  });

  it('skips the results file when nothing worked', async () => {
    const input = join(dir, 'list.csv');
    const output = join(dir, 'ranked.csv');
    await writeFile(input, 'IP Address\n192.0.2.1\n', 'utf-8');

    await expect(main(['-i', input, '-o', output], deps)).resolves.toBe(0);
    await expect(readFile(output, 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('scans a range with nothing reachable', async () => {
    const probed: string[] = [];
    const code = await main(['--subnet', '192.0.2.0/29', '-p', '3128'], {
      ...deps,
      probe: async (host) => {
        probed.push(host);
        return false;
      },
    });

    expect(code).toBe(0);
    expect(probed.sort()).toEqual([
      '192.0.2.1',
      '192.0.2.2',
      '192.0.2.3',
      '192.0.2.4',
      '192.0.2.5',
      '192.0.2.6',
    ]);
    expect(out.text()).toBe('\nNo working HTTP proxies were found.\n');
  });

  it('verifies hosts the scan finds open', async () => {
    const code = await main(['--subnet', '203.0.113.4/30', '-v'], {
      ...deps,
      probe: async (host) => host === '203.0.113.5',
    });

    expect(code).toBe(0);
    expect(status.text()).toContain('[FOUND]   Potential proxy at 203.0.113.5:7890\n');
    expect(out.text()).toContain('│ 1    │ 203.0.113.5 │ 90 ms         │ Oslo, Norway │');
  });

  it('exits with 1 when the input file is missing', async () => {
    const input = join(dir, 'missing.csv');

    await expect(main(['--input', input], deps)).resolves.toBe(1);
    expect(status.text().startsWith(`error: Cannot read input file ${input}:`)).toBe(true);
    expect(out.text()).toBe('');
  });

  it('exits with 1 when the results file cannot be written', async () => {
    const input = join(dir, 'list.csv');
    await writeFile(input, 'IP Address\n203.0.113.5\n', 'utf-8');
    const output = join(dir, 'no-such-dir', 'ranked.csv');

    await expect(main(['-i', input, '-o', output], deps)).resolves.toBe(1);
    expect(status.text().startsWith(`error: Cannot write results to ${output}:`)).toBe(true);
  });

  it('exits with 2 and prints usage for bad arguments', async () => {
    await expect(main(['--port', '80'], deps)).resolves.toBe(2);
    expect(status.text()).toContain(
      'error: --subnet/--input: exactly one of --subnet or --input is required\n',
    );
    expect(status.text()).toContain('Usage: proxyscout');
  });

  it('prints help and version', async () => {
    await expect(main(['--help'], deps)).resolves.toBe(0);
    await expect(main(['--version'], deps)).resolves.toBe(0);
    expect(out.text()).toContain('Usage: proxyscout');
    expect(out.text().endsWith('proxyscout 0.4.0\n')).toBe(true);
  });
});

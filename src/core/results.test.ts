import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { readResultSummary } from './results.js';
import { StateStore } from './store.js';
import { createMemoryLogger } from '../test-fixtures.js';

const NOW = new Date('2026-01-01T00:00:10.000Z');

let dir: string;
let store: StateStore;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tixmux-results-'));
  store = new StateStore({ logger: createMemoryLogger(), now: () => NOW });
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('readResultSummary', () => {
  test('given failures, should be failing and carry them', async () => {
    const file = path.join(dir, 'test-status.json');
    await fs.writeFile(file, JSON.stringify({
      passed: 41,
      failed: 1,
      skipped: 2,
      durationSeconds: 12.5,
      finishedAt: '2026-01-01T00:00:05.000Z',
      failures: [{ name: 'uploads > rejects oversize files', message: 'expected 413', file: 'src/uploads.test.ts', line: 88 }],
    }));

    const actual = await readResultSummary(store, file, NOW);

    expect(actual.outcome).toBe('failing');
    expect(actual.passed).toBe(41);
    expect(actual.failures).toEqual([
      { name: 'uploads > rejects oversize files', message: 'expected 413', file: 'src/uploads.test.ts', line: 88 },
    ]);
    expect(actual.finishedAt).toBe('2026-01-01T00:00:05.000Z');
  });

  test('given only passes and missing optional fields, should be passing with defaults', async () => {
    const file = path.join(dir, 'build-status.json');
    await fs.writeFile(file, '{"passed": 3}');

    const actual = await readResultSummary(store, file, NOW, Infinity);

    expect(actual).toEqual({
      file,
      outcome: 'passing',
      passed: 3,
      failed: 0,
      skipped: 0,
      durationSeconds: 0,
      failures: [],
      finishedAt: undefined,
      stale: false,
      checkedAt: '2026-01-01T00:00:10.000Z',
    });
  });

  test('given no counts at all, should be unknown', async () => {
    const file = path.join(dir, 'build-status.json');
    await fs.writeFile(file, '{}');

    const actual = await readResultSummary(store, file, NOW, Infinity);

    expect(actual.outcome).toBe('unknown');
  });

  test('given no file, should be missing', async () => {
    const actual = await readResultSummary(store, path.join(dir, 'build-status.json'), NOW);

    expect(actual.outcome).toBe('missing');
  });

  test('given garbage, should be corrupt and leave the file in place', async () => {
    const file = path.join(dir, 'test-status.json');
    await fs.writeFile(file, 'PASS 3 tests');

    const actual = await readResultSummary(store, file, NOW);

    expect(actual.outcome).toBe('corrupt');
    expect(await fs.readFile(file, 'utf-8')).toBe('PASS 3 tests');
  });
});

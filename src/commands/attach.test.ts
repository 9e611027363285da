import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { attachWithRecovery, type Confirm } from './attach.js';
import { SessionOrchestrator } from '../core/orchestrator.js';
import { StateStore } from '../core/store.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import { WindowNotFoundError } from '../lib/errors.js';
import { createMemoryLogger, FakeMultiplexer, FakeVcs } from '../test-fixtures.js';

const SESSION = 'tix-IN-413';

let root: string;
let mux: FakeMultiplexer;
let orchestrator: SessionOrchestrator;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'tixmux-attach-'));
  mux = new FakeMultiplexer();
  const logger = createMemoryLogger();
  orchestrator = new SessionOrchestrator({
    store: new StateStore({ logger }),
    mux,
    vcs: new FakeVcs(),
    config: DEFAULT_CONFIG,
    logger,
    root,
  });
  await orchestrator.createTicket({ id: 'IN-413' });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

describe('attachWithRecovery', () => {
  test('given the window exists, should focus it without asking', async () => {
    const confirm = vi.fn<Confirm>(async () => true);

    const actual = await attachWithRecovery(orchestrator, 'IN-413', 'server', confirm);

    expect(actual.target).toBe('=tix-IN-413:1');
    expect(confirm).not.toHaveBeenCalled();
  });

  test('given a closed window and a yes answer, should recreate it and focus the new one', async () => {
    mux.closeExternally(SESSION, 'tests');
    const confirm = vi.fn<Confirm>(async () => true);

    const actual = await attachWithRecovery(orchestrator, 'IN-413', 'tests', confirm);

    expect(confirm).toHaveBeenCalledWith("Window 'tests' of IN-413 no longer exists. Recreate it? [y/N] ");
    expect(actual).toEqual({ session: SESSION, name: 'tests', index: 3, target: '=tix-IN-413:3' });
    expect(mux.focused.map((w) => w.name)).toEqual(['tests']);
  });

  test('given a closed window and a no answer, should fail with WindowNotFoundError', async () => {
    mux.closeExternally(SESSION, 'tests');

    await expect(attachWithRecovery(orchestrator, 'IN-413', 'tests', async () => false)).rejects.toBeInstanceOf(
      WindowNotFoundError,
    );
    expect(mux.window(SESSION, 'tests')).toBeUndefined();
  });
});

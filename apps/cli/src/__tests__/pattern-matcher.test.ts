import { describe, it, expect } from 'vitest';
import { AGORIC_NODE_DEFAULTS } from '../core/restart-config.js';
import { LogSourceError } from '../core/restart-errors.js';
import type { LogEntry } from '../services/log-watcher.js';
import { awaitRestartDuration, compileRestartPatterns } from '../services/pattern-matcher.js';

const patterns = compileRestartPatterns({
  startPattern: AGORIC_NODE_DEFAULTS.startPattern,
  readyPattern: AGORIC_NODE_DEFAULTS.readyPattern,
});

const STARTED = 'Started Agoric Cosmos daemon.';
const READY = '2024-01-01T00:00:00.000Z SwingSet: kernel: block-manager: block 1042 begin';

async function* entries(...items: LogEntry[]): AsyncGenerator<LogEntry> {
  for (const item of items) {
    yield item;
  }
}

describe('compileRestartPatterns', () => {
  it('matches the default markers', () => {
    expect(patterns.start.test(STARTED)).toBe(true);
    expect(patterns.ready.test(READY)).toBe(true);
  });

  it('anchors the ready marker at the end of the message', () => {
    expect(patterns.ready.test('block-manager: block 7 begin, replaying')).toBe(false);
    expect(patterns.ready.test('block-manager: block x begin')).toBe(false);
  });

  it('is case-sensitive', () => {
    expect(patterns.start.test('started agoric cosmos daemon.')).toBe(false);
  });

  it('anchors custom patterns at the start of the message', () => {
    const custom = compileRestartPatterns({ startPattern: 'boot', readyPattern: 'ready' });
    expect(custom.start.test('boot complete')).toBe(true);
    expect(custom.start.test('reboot complete')).toBe(false);
  });
});

describe('awaitRestartDuration', () => {
  it('returns the time between the start and ready markers', async () => {
    const duration = await awaitRestartDuration(
      entries(
        { timestamp: 1_700_000_000_000_000, message: 'Stopping Agoric Cosmos daemon...' },
        { timestamp: 1_700_000_001_000_000, message: STARTED },
        { timestamp: 1_700_000_005_000_000, message: 'p2p: dialing peers' },
        { timestamp: 1_700_000_019_444_228, message: READY }
      ),
      patterns
    );

    expect(duration).toBe(18_444_228);
  });

  it('measures from the latest start marker', async () => {
    const duration = await awaitRestartDuration(
      entries(
        { timestamp: 1_000_000, message: STARTED },
        { timestamp: 3_000_000, message: STARTED },
        { timestamp: 4_500_000, message: READY }
      ),
      patterns
    );

    expect(duration).toBe(1_500_000);
  });

  it('ignores ready markers seen before any start marker', async () => {
    const duration = await awaitRestartDuration(
      entries(
        { timestamp: 1_000_000, message: READY },
        { timestamp: 2_000_000, message: STARTED },
        { timestamp: 2_250_000, message: READY }
      ),
      patterns
    );

    expect(duration).toBe(250_000);
  });

  it('skips entries without a text message', async () => {
    const duration = await awaitRestartDuration(
      entries(
        { timestamp: 1_000_000, message: STARTED },
        { timestamp: 1_500_000 },
        { timestamp: 2_000_000, message: READY }
      ),
      patterns
    );

    expect(duration).toBe(1_000_000);
  });

  it('stops reading once the ready marker is found', async () => {
    let pulled = 0;
    async function* counted(): AsyncGenerator<LogEntry> {
      const items: LogEntry[] = [
        { timestamp: 10, message: STARTED },
        { timestamp: 20, message: READY },
        { timestamp: 30, message: 'after' },
      ];
      for (const item of items) {
        pulled++;
        yield item;
      }
    }

    await expect(awaitRestartDuration(counted(), patterns)).resolves.toBe(10);
    expect(pulled).toBe(2);
  });

  it('rejects when the stream ends before the service is ready', async () => {
    await expect(
      awaitRestartDuration(entries({ timestamp: 1, message: STARTED }), patterns)
    ).rejects.toBeInstanceOf(LogSourceError);
  });

  it('names the service in the early-end error', async () => {
    await expect(
      awaitRestartDuration(entries({ timestamp: 1, message: STARTED }), patterns, 'demo.service')
    ).rejects.toThrow('Log of `demo.service` ended before the service reported ready');
  });
});

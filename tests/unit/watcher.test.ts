import type { EventEmitter } from 'events';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const chokidarState = vi.hoisted(() => {
  const watchers: Array<EventEmitter & { close: () => Promise<void> }> = [];
  return { watchers };
});

vi.mock('chokidar', async () => {
  const { EventEmitter } = await import('events');
  class FakeWatcher extends EventEmitter {
    close = vi.fn(async () => undefined);
  }
  return {
    default: {
      watch: vi.fn(() => {
        const watcher = new FakeWatcher();
        chokidarState.watchers.push(watcher);
        setImmediate(() => watcher.emit('ready'));
        return watcher;
      })
    }
  };
});

vi.mock('../../packages/agent/src/logger', () => ({
  logger: { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }
}));

import chokidar from 'chokidar';
import { ProcessedPaths, ProgramWatcher } from '../../packages/agent/src/services/watcher';

describe('ProcessedPaths', () => {
  it('forgets the oldest paths past its limit', () => {
    const paths = new ProcessedPaths(2);
    paths.add('a');
    paths.add('b');
    paths.add('c');
    expect(paths.size).toBe(2);
    expect(paths.has('a')).toBe(false);
    expect(paths.has('c')).toBe(true);
  });
});

describe('ProgramWatcher', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chip-warden-watch-'));
    chokidarState.watchers.length = 0;
    vi.mocked(chokidar.watch).mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('watches the top level of the directory and handles program files once', async () => {
    const handled: string[] = [];
    const watcher = new ProgramWatcher(
      dir,
      async (path) => {
        handled.push(path);
      },
      { settleDelayMs: 0 }
    );

    await watcher.start();
    expect(chokidar.watch).toHaveBeenCalledWith(dir, { ignoreInitial: true, depth: 0, persistent: true });

    const events = chokidarState.watchers[0];
    events.emit('add', join(dir, 'a.nc'));
    events.emit('add', join(dir, 'notes.txt'));
    events.emit('add', join(dir, 'a.nc'));
    events.emit('add', join(dir, 'B.GCODE'));
    await watcher.stop();

    expect(handled).toEqual([join(dir, 'a.nc'), join(dir, 'B.GCODE')]);
    expect(events.close).toHaveBeenCalledTimes(1);
  });

  it('runs the handler for one file at a time, in arrival order', async () => {
    let active = 0;
    let maxActive = 0;
    const order: string[] = [];
    const watcher = new ProgramWatcher(
      dir,
      async (path) => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(path);
        active -= 1;
      },
      { settleDelayMs: 0 }
    );

    for (const name of ['1.nc', '2.nc', '3.nc']) {
      expect(watcher.enqueue(join(dir, name))).toBe(true);
    }
    await watcher.idle();

    expect(order).toEqual([join(dir, '1.nc'), join(dir, '2.nc'), join(dir, '3.nc')]);
    expect(maxActive).toBe(1);
  });

  it('keeps going after a handler failure', async () => {
    const handled: string[] = [];
    const watcher = new ProgramWatcher(
      dir,
      async (path) => {
        if (path.endsWith('bad.nc')) throw new Error('disk full');
        handled.push(path);
      },
      { settleDelayMs: 0 }
    );

    watcher.enqueue(join(dir, 'bad.nc'));
    watcher.enqueue(join(dir, 'good.nc'));
    await watcher.idle();

    expect(handled).toEqual([join(dir, 'good.nc')]);
  });

  it('honours configured extensions', () => {
    const watcher = new ProgramWatcher(dir, async () => undefined, { extensions: ['.tap'] });
    expect(watcher.accepts('part.TAP')).toBe(true);
    expect(watcher.accepts('part.nc')).toBe(false);
  });

  it('queues program files already in the directory', async () => {
    writeFileSync(join(dir, 'a.nc'), 'x');
    writeFileSync(join(dir, 'b.txt'), 'x');
    writeFileSync(join(dir, 'c.gcode'), 'x');
    mkdirSync(join(dir, 'nested.nc'));
    const handled: string[] = [];
    const watcher = new ProgramWatcher(
      dir,
      async (path) => {
        handled.push(path);
      },
      { settleDelayMs: 0 }
    );

    expect(await watcher.enqueueExisting()).toBe(2);
    await watcher.idle();

    expect(handled.sort()).toEqual([join(dir, 'a.nc'), join(dir, 'c.gcode')]);
  });
});

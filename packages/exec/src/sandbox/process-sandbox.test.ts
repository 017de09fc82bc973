import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { existsSync } from 'fs';
import { spawn, type ChildProcess } from 'child_process';
import { SandboxError } from '@synthloop/shared';
import { ProcessSandbox, getSafeEnv } from './process-sandbox';
import { HARNESS_SOURCE } from './harness';

vi.mock('child_process', () => {
  const spawn = vi.fn();
  const spawnSync = vi.fn();
  return {
    spawn,
    spawnSync,
    default: {
      spawn,
      spawnSync,
    },
  };
});

class FakeChild extends EventEmitter {
  pid = 4242;
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  sent: unknown[] = [];
  sendError: Error | null = null;

  send(message: unknown, callback: (error: Error | null) => void): boolean {
    this.sent.push(message);
    callback(this.sendError);
    return this.sendError === null;
  }
}

function mockChild(child: FakeChild): void {
  // Test double stands in for the spawned process.
  vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
}

const spawned = () => vi.waitFor(() => expect(spawn).toHaveBeenCalledTimes(1));

describe('ProcessSandbox', () => {
  const options = { timeoutMs: 1000, maxOldSpaceMb: 64, maxOutputBytes: 2048 };
  let child: FakeChild;

  beforeEach(() => {
    vi.clearAllMocks();
    child = new FakeChild();
    mockChild(child);
    vi.spyOn(process, 'kill').mockReturnValue(true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('spawns node with the harness, a heap cap and IPC', async () => {
    const program = { units: [{ name: 'main code', source: 'const x = 1;' }] };
    const pending = new ProcessSandbox({ ...options, nodePath: '/usr/bin/node' }).run(program);
    await spawned();

    expect(spawn).toHaveBeenCalledWith(
      '/usr/bin/node',
      ['--max-old-space-size=64', '-e', HARNESS_SOURCE],
      expect.objectContaining({
        stdio: ['ignore', 'pipe', 'pipe', 'ipc'],
        detached: true,
      }),
    );
    expect(child.sent).toEqual([{ units: program.units, timeoutMs: 1000 }]);

    child.emit('message', { ok: true });
    child.emit('close', 0, null);

    await expect(pending).resolves.toEqual({ status: 'success' });
  });

  it('runs in a temporary directory that is removed afterwards', async () => {
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    const spawnOptions = vi.mocked(spawn).mock.calls[0]?.[2];
    const cwd = typeof spawnOptions?.cwd === 'string' ? spawnOptions.cwd : '';
    expect(cwd).toContain('synthloop-sandbox-');
    expect(existsSync(cwd)).toBe(true);

    child.emit('message', { ok: true });
    child.emit('close', 0, null);
    await pending;

    expect(existsSync(cwd)).toBe(false);
  });

  it('returns the failure reported by the harness', async () => {
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    child.emit('message', { ok: false, error: 'AssertionError: 3 !== 4' });
    child.emit('close', 0, null);

    await expect(pending).resolves.toEqual({
      status: 'failure',
      error: 'AssertionError: 3 !== 4',
    });
  });

  it('ignores malformed IPC messages', async () => {
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    child.emit('message', 'hello');
    child.emit('close', 1, null);

    await expect(pending).resolves.toEqual({
      status: 'failure',
      error: 'SandboxError: Process exited with code 1',
    });
  });

  it('describes a child that dies without reporting', async () => {
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    child.stderr.emit('data', Buffer.from('FATAL ERROR: JavaScript heap out of memory\n'));
    child.emit('close', 134, 'SIGABRT');

    await expect(pending).resolves.toEqual({
      status: 'failure',
      error:
        'SandboxError: Process exited with code 134 (signal SIGABRT)\nFATAL ERROR: JavaScript heap out of memory',
    });
  });

  it('kills the process group and reports output overflow', async () => {
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    child.stdout.emit('data', Buffer.alloc(3000, 'x'));
    child.emit('close', null, 'SIGKILL');

    await expect(pending).resolves.toEqual({
      status: 'failure',
      error: 'OutputLimitError: Output exceeded 2048 bytes',
    });
    expect(process.kill).toHaveBeenCalledWith(-4242, 'SIGKILL');
  });

  it('kills the process group after the wall-clock limit', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    // Limit plus the startup allowance.
    vi.advanceTimersByTime(3000);
    expect(process.kill).toHaveBeenCalledWith(-4242, 'SIGKILL');
    child.emit('close', null, 'SIGKILL');

    await expect(pending).resolves.toEqual({
      status: 'failure',
      error: 'TimeoutError: Execution timed out after 1000ms',
    });
  });

  it('mentions a failed IPC delivery', async () => {
    child.sendError = new Error('channel closed');
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    child.emit('close', 0, null);

    await expect(pending).resolves.toEqual({
      status: 'failure',
      error: 'SandboxError: Process exited with code 0 after failing to receive the program: channel closed',
    });
  });

  it('rejects with SandboxError when the child cannot start', async () => {
    const pending = new ProcessSandbox(options).run({ units: [] });
    await spawned();

    child.emit('error', new Error('spawn ENOENT'));

    await expect(pending).rejects.toThrow(SandboxError);
  });
});

describe('getSafeEnv', () => {
  it('keeps PATH and the baseline keys only', () => {
    expect(
      getSafeEnv({
        PATH: '/usr/bin',
        HOME: '/home/dev',
        OPENAI_API_KEY: 'test-secret',
        NODE_OPTIONS: '--inspect',
      }),
    ).toEqual({ PATH: '/usr/bin', HOME: '/home/dev' });
  });
});

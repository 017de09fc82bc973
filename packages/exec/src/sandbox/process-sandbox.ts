import { spawn, spawnSync } from 'child_process';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { SandboxError, excerpt, type Logger, type SandboxConfig } from '@synthloop/shared';
import { HARNESS_SOURCE } from './harness';
import type { ExecutionOutcome, ExecutionSandbox, SandboxProgram } from './types';

// Time the child gets to boot on top of the per-unit execution limit.
const STARTUP_GRACE_MS = 2000;
const STDERR_EXCERPT_CHARS = 500;

const HarnessReplySchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

type HarnessReply = z.infer<typeof HarnessReplySchema>;

function killProcessTree(pid: number, logger?: Logger): void {
  if (process.platform === 'win32') {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  try {
    // Negative PID signals the whole process group (child is spawned detached).
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ESRCH') {
      void logger?.warn(`Failed to kill sandbox process ${pid}: ${String(err)}`);
    }
  }
}

// Minimal env vars a Node.js child needs. Credentials never reach generated code.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  // Windows
  'USERPROFILE',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
];

export function getSafeEnv(baseEnv: NodeJS.ProcessEnv): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of BASELINE_ENV_KEYS) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  return safeEnv;
}

export type ProcessSandboxOptions = Pick<
  SandboxConfig,
  'timeoutMs' | 'maxOldSpaceMb' | 'maxOutputBytes'
> & {
  /** Node.js binary used for the child. Defaults to the current one. */
  nodePath?: string;
  logger?: Logger;
};

/**
 * Runs each program in a fresh Node.js child process.
 *
 * The child gets a stripped environment, a throwaway working directory,
 * a V8 heap cap and a wall-clock limit. Results come back over IPC.
 */
export class ProcessSandbox implements ExecutionSandbox {
  readonly mode = 'process';

  constructor(private readonly options: ProcessSandboxOptions) {}

  async run(program: SandboxProgram): Promise<ExecutionOutcome> {
    const workDir = await mkdtemp(join(tmpdir(), 'synthloop-sandbox-'));
    try {
      return await this.execute(program, workDir);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private execute(program: SandboxProgram, cwd: string): Promise<ExecutionOutcome> {
    const { timeoutMs, maxOldSpaceMb, maxOutputBytes, logger } = this.options;
    const start = Date.now();

    return new Promise<ExecutionOutcome>((resolve, reject) => {
      let settled = false;
      let reply: HarnessReply | undefined;
      let stderr = '';
      let outputBytes = 0;
      let truncated = false;
      let timedOut = false;
      let sendError: Error | undefined;

      const child = spawn(
        this.options.nodePath ?? process.execPath,
        [`--max-old-space-size=${maxOldSpaceMb}`, '-e', HARNESS_SOURCE],
        {
          cwd,
          env: getSafeEnv(process.env),
          stdio: ['ignore', 'pipe', 'pipe', 'ipc'],
          detached: true,
        },
      );

      const terminate = () => {
        if (child.pid) {
          killProcessTree(child.pid, logger);
        }
      };

      const timeoutTimer = setTimeout(() => {
        if (!settled) {
          timedOut = true;
          terminate();
        }
      }, timeoutMs + STARTUP_GRACE_MS);

      const countOutput = (chunk: Buffer) => {
        if (truncated) return;
        outputBytes += chunk.length;
        if (outputBytes > maxOutputBytes) {
          truncated = true;
          terminate();
        }
      };

      child.stdout?.on('data', countOutput);
      child.stderr?.on('data', (chunk: Buffer) => {
        countOutput(chunk);
        if (!truncated) stderr += chunk.toString('utf8');
      });

      child.on('message', (message: unknown) => {
        const parsed = HarnessReplySchema.safeParse(message);
        if (parsed.success) {
          reply = parsed.data;
        }
      });

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        reject(new SandboxError(`Failed to start sandbox process: ${err.message}`, { cause: err }));
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);

        const outcome = this.toOutcome({ reply, code, signal, stderr, timedOut, truncated, sendError });
        void logger?.debug(
          `Sandbox run finished in ${Date.now() - start}ms with status ${outcome.status}`,
        );
        resolve(outcome);
      });

      child.send({ units: program.units, timeoutMs }, (err) => {
        if (err) {
          sendError = err;
          terminate();
        }
      });
    });
  }

  private toOutcome(state: {
    reply?: HarnessReply;
    code: number | null;
    signal: NodeJS.Signals | null;
    stderr: string;
    timedOut: boolean;
    truncated: boolean;
    sendError?: Error;
  }): ExecutionOutcome {
    if (state.timedOut) {
      return {
        status: 'failure',
        error: `TimeoutError: Execution timed out after ${this.options.timeoutMs}ms`,
      };
    }
    if (state.truncated) {
      return {
        status: 'failure',
        error: `OutputLimitError: Output exceeded ${this.options.maxOutputBytes} bytes`,
      };
    }
    if (state.reply) {
      return state.reply.ok
        ? { status: 'success' }
        : { status: 'failure', error: state.reply.error ?? 'Error: unknown failure' };
    }

    let error = `SandboxError: Process exited with code ${state.code ?? 'null'}`;
    if (state.signal) error += ` (signal ${state.signal})`;
    if (state.sendError) error += ` after failing to receive the program: ${state.sendError.message}`;
    const stderr = state.stderr.trim();
    if (stderr) error += `\n${excerpt(stderr, STDERR_EXCERPT_CHARS)}`;
    return { status: 'failure', error };
  }
}

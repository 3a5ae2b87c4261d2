import { spawn, spawnSync, type ChildProcess } from 'child_process';
import { isWindows, ProcessError, TimeoutError } from '@faultline/shared';

/** Returns whether the signal reached the process group. */
function killProcessTree(pid: number, signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
  if (isWindows()) {
    // On Windows, process.kill is not effective for killing process trees.
    // We use taskkill to forcefully terminate the process and its children.
    return spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']).status === 0;
  }
  // On POSIX systems, sending a signal to the negative PID kills the entire process group.
  // This requires the child process to have been spawned in detached mode.
  try {
    process.kill(-pid, signal);
    return true;
  } catch {
    return false;
  }
}

/**
 * One external invocation: an argument vector, never a shell string.
 */
export interface CommandRequest {
  bin: string;
  args: string[];
  cwd: string;
  /** Variables layered over the parent environment */
  env?: Record<string, string>;
  /** Kill the process tree and reject with TimeoutError after this many ms */
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Runs external commands to completion.
 *
 * A non-zero exit is a normal result. Implementations reject with
 * `ProcessError` when the process cannot be started and with `TimeoutError`
 * when it outlives `timeoutMs`.
 */
export interface CommandRunner {
  run(req: CommandRequest): Promise<CommandResult>;
  /** Signals every process tree still running; returns how many were signalled. */
  terminateAll?(signal?: NodeJS.Signals): number;
}

export function formatCommand(bin: string, args: readonly string[]): string {
  return [bin, ...args].map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * CommandRunner backed by `child_process.spawn`.
 * Output is buffered in full; one process runs at a time per call.
 */
export class ProcessRunner implements CommandRunner {
  private readonly active = new Set<ChildProcess>();

  constructor(private readonly baseEnv: NodeJS.ProcessEnv = process.env) {}

  terminateAll(signal: NodeJS.Signals = 'SIGTERM'): number {
    let signalled = 0;
    for (const child of this.active) {
      if (!child.pid || !killProcessTree(child.pid, signal)) {
        child.kill(signal);
      }
      signalled++;
    }
    return signalled;
  }

  run(req: CommandRequest): Promise<CommandResult> {
    const env = { ...this.baseEnv, ...req.env };
    const start = Date.now();

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      let timeoutTimer: NodeJS.Timeout | undefined;
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      const child = spawn(req.bin, req.args, {
        cwd: req.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        detached: !isWindows(),
      });
      this.active.add(child);

      const collected = () => ({
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
      });

      if (req.timeoutMs !== undefined) {
        timeoutTimer = setTimeout(() => {
          if (settled) return;
          settled = true;
          if (!child.pid || !killProcessTree(child.pid, 'SIGKILL')) {
            child.kill('SIGKILL');
          }
          const partial = collected();
          reject(
            new TimeoutError(
              `Command timed out after ${req.timeoutMs}ms: ${formatCommand(req.bin, req.args)}`,
              { partialStdout: partial.stdout, partialStderr: partial.stderr },
            ),
          );
        }, req.timeoutMs);
      }

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on('error', (err) => {
        clearTimeout(timeoutTimer);
        this.active.delete(child);
        if (settled) return;
        settled = true;
        reject(
          new ProcessError(`Failed to start process ${req.bin}: ${err.message}`, { cause: err }),
        );
      });

      child.on('close', (code, signal) => {
        clearTimeout(timeoutTimer);
        this.active.delete(child);
        if (settled) return;
        settled = true;
        const output = collected();
        resolve({
          // A process killed by a signal has no exit code; report it as a failure.
          exitCode: code ?? (signal ? 128 : -1),
          stdout: output.stdout,
          stderr: output.stderr,
          durationMs: Date.now() - start,
        });
      });
    });
  }
}

/**
 * TaskExecutor — runs one task's shell command with a hard timeout and
 * classifies the outcome. No retries happen here.
 */
import { execa, ExecaError } from 'execa';

import { TaskExecutionError, errorMessage } from '@/core/errors.js';
import type { ExecutionResult, Task } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;

export type FailureReason = 'exit' | 'signal' | 'timeout' | 'spawn';

export interface TaskExecutor {
  run(task: Task): Promise<ExecutionResult>;
}

export interface ShellTaskExecutor extends TaskExecutor {
  /** SIGKILL the process group of every command still running. */
  terminateAll(): void;
}

export interface TaskExecutorOptions {
  logger: Logger;
  /** Wall-clock bound per command. Defaults to 300 seconds. */
  timeoutMs?: number;
  /** Working directory for commands. Defaults to the process cwd. */
  cwd?: string;
}

/**
 * Pick the message reported for a non-zero exit: trimmed stderr, else
 * trimmed stdout, else "Unknown error".
 */
export function describeExitFailure(stdout: string, stderr: string): string {
  return stderr.trim() || stdout.trim() || 'Unknown error';
}

/** Create a shell-backed task executor. */
export function createTaskExecutor(options: TaskExecutorOptions): ShellTaskExecutor {
  const { logger, cwd } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  /** Process group ids of running commands. */
  const running = new Set<number>();

  /** Kill the shell and everything it forked; the group id is the shell's pid. */
  function killGroup(pid: number): void {
    try {
      process.kill(-pid, 'SIGKILL');
    } catch (error) {
      // ESRCH: the whole group already exited
      logger.debug('Process group already gone', {
        component: 'task-executor',
        pid,
        error: errorMessage(error),
      });
    }
  }

  function failure(
    task: Task,
    reason: FailureReason,
    message: string,
    output: { stdout: string; stderr: string; durationMs: number; exitCode?: number },
    details: Record<string, unknown> = {},
  ): ExecutionResult {
    const error = new TaskExecutionError(task.name, message, {
      reason,
      exitCode: output.exitCode,
      ...details,
    });

    logger.error(`Task '${task.name}' failed`, {
      component: 'task-executor',
      taskName: task.name,
      reason,
      exitCode: output.exitCode,
      durationMs: output.durationMs,
      error: message,
    });

    return { ...output, status: 'failure', error };
  }

  // Own process group, so a timeout reaches children that hold the output pipes
  const runShell = (command: string) =>
    execa(command, {
      shell: true,
      reject: false,
      detached: true,
      cwd,
      stdin: 'ignore',
    });

  async function runBounded(
    command: string,
  ): Promise<{ result: Awaited<ReturnType<typeof runShell>>; timedOut: boolean }> {
    const subprocess = runShell(command);
    const { pid } = subprocess;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    if (pid !== undefined) {
      running.add(pid);
      timer = setTimeout(() => {
        timedOut = true;
        killGroup(pid);
      }, timeoutMs);
    }

    try {
      const result = await subprocess;
      return { result, timedOut };
    } finally {
      clearTimeout(timer);
      if (pid !== undefined) running.delete(pid);
    }
  }

  return {
    async run(task: Task): Promise<ExecutionResult> {
      logger.info(`Running task '${task.name}'`, {
        component: 'task-executor',
        taskName: task.name,
        command: task.command,
      });

      const startedAt = Date.now();

      let result: Awaited<ReturnType<typeof runShell>>;
      let timedOut: boolean;
      try {
        ({ result, timedOut } = await runBounded(task.command));
      } catch (error) {
        // execa only throws here for options it cannot use
        return failure(task, 'spawn', `failed to start process: ${errorMessage(error)}`, {
          stdout: '',
          stderr: '',
          durationMs: Date.now() - startedAt,
        });
      }

      const output = {
        stdout: typeof result.stdout === 'string' ? result.stdout : '',
        stderr: typeof result.stderr === 'string' ? result.stderr : '',
        durationMs: Date.now() - startedAt,
        exitCode: result.exitCode,
      };

      if (timedOut) {
        return failure(task, 'timeout', 'execution timed out', output);
      }

      if (result.exitCode === 0 && !result.failed) {
        logger.info(`Task '${task.name}' completed successfully`, {
          component: 'task-executor',
          taskName: task.name,
          durationMs: output.durationMs,
        });
        return { ...output, status: 'success', exitCode: 0 };
      }

      if (result.exitCode !== undefined) {
        return failure(task, 'exit', describeExitFailure(output.stdout, output.stderr), output);
      }

      if (result.signal !== undefined) {
        return failure(task, 'signal', describeExitFailure(output.stdout, output.stderr), output, {
          signal: result.signal,
        });
      }

      const cause = result instanceof ExecaError ? result.originalMessage : 'unknown spawn error';
      return failure(task, 'spawn', `failed to start process: ${cause}`, output);
    },

    terminateAll(): void {
      for (const pid of running) {
        killGroup(pid);
      }
    },
  };
}

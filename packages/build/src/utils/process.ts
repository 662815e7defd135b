/**
 * External process execution with streamed output capture
 */

import { spawn, ChildProcess } from 'child_process';
import { Readable } from 'stream';
import {
  BuildResult,
  RunOptions,
  BuildError,
  BuildErrorCode,
  errorMessage,
  asError
} from '../types.js';
import { createLogger } from './logger.js';

const logger = createLogger('process');

/** Output reported when a process ran without capture */
export const TASK_COMPLETED_MARKER = 'The task completed';

/** Runs an external command to completion */
export interface ProcessExecutor {
  run(command: string, args: string[], options?: RunOptions): Promise<BuildResult>;
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Executor backed by `child_process.spawn`.
 *
 * When capturing, stdout and stderr are each drained by a reader task that
 * appends chunks to a shared list in arrival order. `run` resolves on the
 * child's `close` event, which Node emits only after both streams have
 * ended, so output written just before exit is kept.
 */
export class SpawnExecutor implements ProcessExecutor {
  async run(command: string, args: string[], options: RunOptions = {}): Promise<BuildResult> {
    const { captureOutput = false, cwd, env } = options;

    logger.debug(`Running ${command} ${args.join(' ')}`);

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd,
        env: { ...process.env, ...env },
        stdio: captureOutput ? ['ignore', 'pipe', 'pipe'] : 'ignore'
      });
    } catch (error) {
      throw this.spawnError(command, error);
    }

    const chunks: string[] = [];
    const readers = captureOutput
      ? [child.stdout, child.stderr].map(stream => this.drain(stream, chunks))
      : [];

    let exit: ProcessExit;
    try {
      [exit] = await Promise.all([this.waitForClose(child), ...readers]);
    } catch (error) {
      throw this.spawnError(command, error);
    }

    const output = captureOutput ? chunks.join('\n') : TASK_COMPLETED_MARKER;

    if (exit.code === 0) {
      return { ok: true, output };
    }

    if (exit.signal) {
      logger.warn(`${command} was terminated by ${exit.signal}`);
    }

    return { ok: false, exitCode: exit.code ?? -1, output };
  }

  /**
   * Read a stream to its end, collecting decoded chunks
   */
  private async drain(stream: Readable | null, chunks: string[]): Promise<void> {
    if (!stream) {
      return;
    }

    stream.setEncoding('utf8');
    for await (const chunk of stream) {
      const text = String(chunk);
      chunks.push(text);
      logger.trace(text);
    }
  }

  private waitForClose(child: ChildProcess): Promise<ProcessExit> {
    return new Promise((resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal });
      });
    });
  }

  private spawnError(command: string, error: unknown): BuildError {
    if (error instanceof BuildError) {
      return error;
    }

    return new BuildError(
      BuildErrorCode.ProcessFailed,
      `Could not run ${command}: ${errorMessage(error)}`,
      undefined,
      {},
      false,
      asError(error)
    );
  }
}

/**
 * Create the default process executor
 */
export function createExecutor(): ProcessExecutor {
  return new SpawnExecutor();
}

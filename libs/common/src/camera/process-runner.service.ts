import { Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import which from 'which';

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

const MAX_BUFFER = 8 * 1024 * 1024;

/**
 * Thin wrapper around child processes so media tools can be swapped out in tests.
 */
@Injectable()
export class ProcessRunnerService {
  private readonly logger = new Logger(ProcessRunnerService.name);

  /** Absolute path of `binary` on PATH, or null when it is not installed. */
  async resolveBinary(binary: string): Promise<string | null> {
    return which(binary, { nothrow: true });
  }

  /**
   * Run a command to completion. Resolves for any exit status (including a
   * timeout kill); rejects only when the process could not be spawned.
   */
  run(command: string, args: string[], timeoutMs: number): Promise<ProcessResult> {
    this.logger.verbose(`Running ${command} (timeout ${timeoutMs}ms)`);
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { timeout: timeoutMs, killSignal: 'SIGKILL', maxBuffer: MAX_BUFFER, encoding: 'utf8' },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, signal: null, stdout, stderr, timedOut: false });
            return;
          }
          if (typeof error.code === 'string') {
            reject(error);
            return;
          }
          resolve({
            exitCode: typeof error.code === 'number' ? error.code : null,
            signal: error.signal ?? null,
            stdout,
            stderr,
            timedOut: error.killed === true && error.signal === 'SIGKILL',
          });
        },
      );
    });
  }
}

export function isMissingBinaryError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

import { execFile } from 'child_process';

import { Injectable } from '@nestjs/common';

import { CommandResult, ICommandRunner } from './interfaces';
import { COMMAND_TIMEOUT_MS } from './platform.constants';

/**
 * Runs OS commands through child_process.execFile.
 * Rejects on a non-zero exit, a missing binary or the timeout.
 */
@Injectable()
export class CommandRunnerService implements ICommandRunner {
  run(
    command: string,
    args: readonly string[],
    timeoutMs: number = COMMAND_TIMEOUT_MS,
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { timeout: timeoutMs, windowsHide: true, encoding: 'utf-8' },
        (error, stdout, stderr) => {
          if (error) {
            const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
            reject(new Error(`${command} failed (${error.message})${detail}`, { cause: error }));
            return;
          }
          resolve({ stdout, stderr });
        },
      );
    });
  }
}

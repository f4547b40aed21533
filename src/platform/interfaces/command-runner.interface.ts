export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program without a shell.
 */
export interface ICommandRunner {
  run(command: string, args: readonly string[], timeoutMs?: number): Promise<CommandResult>;
}

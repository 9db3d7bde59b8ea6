// Port: Command Executor
// Interface for executing OS commands

import { CommandResult } from '../types/types';

export interface CommandOptions {
  cwd?: string;
  input?: string; // written to stdin, then stdin is closed
  timeoutMs?: number;
  interactive?: boolean; // inherit the terminal instead of capturing output
  env?: Record<string, string>;
}

export interface CommandExecutorPort {
  /**
   * Run a command with an argument list (no shell interpolation).
   * Resolves with the exit code for any exit status; never rejects on non-zero.
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;

  /**
   * True when the binary resolves on PATH
   */
  commandExists(command: string): Promise<boolean>;
}

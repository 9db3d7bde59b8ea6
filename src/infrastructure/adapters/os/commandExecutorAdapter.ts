import { CommandExecutorPort, CommandOptions } from '../../../domain/ports/commandExecutor';
import { runCommand } from '../../connectors/os/executors/commandExecutor';
import { CommandResult } from '../../../domain/types/types';

export class CommandExecutorAdapter implements CommandExecutorPort {
  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    return runCommand(command, args, options);
  }

  async commandExists(command: string): Promise<boolean> {
    const result = await runCommand('which', [command]);
    return result.passed && result.stdout.length > 0;
  }
}

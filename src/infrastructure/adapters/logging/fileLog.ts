// File Log - append-only operational log files under the log directory
// Line format: [YYYY-MM-DD HH:MM:SS] [LEVEL] message

import * as path from 'path';
import { FileSystemPort } from '../../../domain/ports/fileSystem';
import { LoggerPort, LogLevel, OperationLogPort } from '../../../domain/ports/logger';
import { formatLogTimestamp } from '../../../domain/time/dates';
import { LoggerAdapter } from './loggerAdapter';

export class FileLog implements OperationLogPort {
  constructor(
    private readonly fs: FileSystemPort,
    readonly path: string,
    private readonly module: string,
    private readonly now: () => Date = () => new Date(),
    private readonly logger: LoggerPort = new LoggerAdapter()
  ) {}

  async write(level: LogLevel, message: string): Promise<void> {
    const line = `[${formatLogTimestamp(this.now())}] [${level}] ${message}`;

    if (level === 'ERROR' || level === 'CRITICAL') {
      this.logger.logError(this.module, `[${level}] ${message}`);
    } else {
      this.logger.log(this.module, `[${level}] ${message}`);
    }

    try {
      await this.fs.mkdir(path.dirname(this.path));
      await this.fs.appendFile(this.path, line + '\n');
    } catch (error) {
      this.logger.logError(this.module, `Unable to append to ${this.path}`, error);
    }
  }

  async tail(count: number): Promise<string[]> {
    if (!(await this.fs.exists(this.path))) {
      return [];
    }
    const content = await this.fs.readFile(this.path);
    const lines = content.split('\n').filter(line => line.trim().length > 0);
    return lines.slice(-count);
  }
}

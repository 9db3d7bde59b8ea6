import * as fs from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import { FileStat, FileSystemPort } from '../../../domain/ports/fileSystem';
import { copyDirectory } from '../../connectors/os/executors/fileSystem';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class FileSystemAdapter implements FileSystemPort {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf8');
  }

  async writeFile(filePath: string, content: string, mode?: number): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, mode === undefined ? 'utf8' : { encoding: 'utf8', mode });
  }

  async appendFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, content, 'utf8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async stat(filePath: string): Promise<FileStat | null> {
    try {
      const stats = await fs.stat(filePath);
      return {
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        mtime: stats.mtime,
        mode: stats.mode & 0o777,
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async isExecutable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  async readdir(dirPath: string): Promise<string[]> {
    return fs.readdir(dirPath);
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async copyFile(source: string, destination: string): Promise<void> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.copyFile(source, destination);
  }

  async copyDirectory(source: string, destination: string): Promise<void> {
    await copyDirectory(source, destination);
  }

  async chmod(filePath: string, mode: number): Promise<void> {
    await fs.chmod(filePath, mode);
  }

  async touch(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(filePath, 'a');
    await handle.close();
    const now = new Date();
    await fs.utimes(filePath, now, now);
  }
}

import * as fs from 'fs/promises';
import * as path from 'path';
import { log as logShared, logVerbose } from '../../../adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('FileSystemExecutor', message, ...args);
}

/**
 * Recursively copy a directory tree, preserving file modes.
 * Returns the number of files copied.
 */
export async function copyDirectory(source: string, destination: string, depth = 0, maxDepth = 10): Promise<number> {
  if (depth > maxDepth) {
    log(`Skipping ${source}: deeper than ${maxDepth} levels`);
    return 0;
  }

  await fs.mkdir(destination, { recursive: true });
  const entries = await fs.readdir(source, { withFileTypes: true });
  let copied = 0;

  for (const entry of entries) {
    const from = path.join(source, entry.name);
    const to = path.join(destination, entry.name);

    if (entry.isDirectory()) {
      copied += await copyDirectory(from, to, depth + 1, maxDepth);
    } else if (entry.isFile()) {
      await fs.copyFile(from, to);
      const { mode } = await fs.stat(from);
      await fs.chmod(to, mode & 0o777);
      copied++;
    }
  }

  logVerbose('FileSystemExecutor', 'Directory copied', { source, destination, files: copied, depth });
  return copied;
}

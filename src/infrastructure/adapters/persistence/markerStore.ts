// Marker Store - scheduler roles persisted as flat files under the state dir
// One value per file, full overwrite only
// History is append-only: `ISO-timestamp: old -> new`

import { FailoverMarkers } from '../../../domain/types/types';
import { SchedulerKind, parseSchedulerKind } from '../../../domain/enums/scheduler';
import { MarkerStorePort } from '../../../domain/ports/persistence';
import { FileSystemPort } from '../../../domain/ports/fileSystem';
import { RenewalFiles } from '../../../config/renewalConfig';
import { logVerbose as logVerboseShared } from '../logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`MarkerStore:${component}`, message, data);
}

export class FileMarkerStore implements MarkerStorePort {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly files: RenewalFiles
  ) {}

  private async readKind(filePath: string): Promise<SchedulerKind | null> {
    if (!(await this.fs.exists(filePath))) {
      return null;
    }
    const content = await this.fs.readFile(filePath);
    const kind = parseSchedulerKind(content);
    if (kind === null) {
      // Older installs wrote the literal role ("primary"/"fallback") instead of a kind
      logVerbose('Read', 'Marker does not name a scheduler', { path: filePath, content: content.trim() });
    }
    return kind;
  }

  private async writeKind(filePath: string, kind: SchedulerKind | null): Promise<void> {
    if (kind === null) {
      await this.fs.remove(filePath);
      logVerbose('Write', 'Marker removed', { path: filePath });
      return;
    }
    await this.fs.writeFile(filePath, `${kind}\n`);
    logVerbose('Write', 'Marker written', { path: filePath, kind });
  }

  async readMarkers(): Promise<FailoverMarkers> {
    return {
      primary: await this.readKind(this.files.primaryMarker),
      fallback: await this.readKind(this.files.fallbackMarker),
      failedPrimary: await this.readKind(this.files.failedPrimaryMarker),
    };
  }

  async writeRoles(primary: SchedulerKind | null, fallback: SchedulerKind | null): Promise<void> {
    await this.writeKind(this.files.primaryMarker, primary);
    await this.writeKind(this.files.fallbackMarker, fallback);
  }

  async recordFailedPrimary(kind: SchedulerKind): Promise<void> {
    await this.writeKind(this.files.failedPrimaryMarker, kind);
  }

  async appendHistory(from: SchedulerKind, to: SchedulerKind, at: Date): Promise<void> {
    await this.fs.appendFile(this.files.failoverHistory, `${at.toISOString()}: ${from} -> ${to}\n`);
    logVerbose('History', 'Failover recorded', { from, to, at: at.toISOString() });
  }

  async readHistory(count: number): Promise<string[]> {
    if (!(await this.fs.exists(this.files.failoverHistory))) {
      return [];
    }
    const content = await this.fs.readFile(this.files.failoverHistory);
    return content.split('\n').filter(line => line.trim().length > 0).slice(-count);
  }

  async clear(): Promise<void> {
    for (const filePath of [
      this.files.primaryMarker,
      this.files.fallbackMarker,
      this.files.failedPrimaryMarker,
      this.files.failoverHistory,
    ]) {
      await this.fs.remove(filePath);
    }
    logVerbose('Clear', 'All markers removed');
  }
}

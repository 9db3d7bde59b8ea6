// Port: Persistence
// Interface for scheduler marker files

import { FailoverMarkers } from '../types/types';
import { SchedulerKind } from '../enums/scheduler';

export interface MarkerStorePort {
  /**
   * Read primary, fallback and failed-primary markers
   */
  readMarkers(): Promise<FailoverMarkers>;

  /**
   * Overwrite the primary and fallback markers. A null kind deletes the marker.
   */
  writeRoles(primary: SchedulerKind | null, fallback: SchedulerKind | null): Promise<void>;

  recordFailedPrimary(kind: SchedulerKind): Promise<void>;

  appendHistory(from: SchedulerKind, to: SchedulerKind, at: Date): Promise<void>;

  readHistory(count: number): Promise<string[]>;

  /**
   * Delete every marker and the history file
   */
  clear(): Promise<void>;
}

/**
 * Presentation Event Types
 *
 * Events the tagging pipeline and the duplicate resolution session publish.
 * Presenters read them; they never mutate pipeline or session state.
 */

import { SkipReason } from './video.js';

// ============================================================================
// Tagging Pipeline → Presentation
// ============================================================================

export interface WorkerStartedEvent {
  type: 'worker-started';
  workerId: number;
  path: string;
}

/**
 * Rate-limited approximation of hashing progress
 */
export interface WorkerProgressEvent {
  type: 'worker-progress';
  workerId: number;
  path: string;
  /** 0..1 */
  progress: number;
  bytesRead: number;
  totalBytes: number;
}

export interface WorkerCompletedEvent {
  type: 'worker-completed';
  workerId: number;
  path: string;
  success: boolean;
  newPath?: string;
  error?: string;
}

export interface OverallProgressEvent {
  type: 'overall-progress';
  completed: number;
  total: number;
}

export type TaggingEvent =
  | WorkerStartedEvent
  | WorkerProgressEvent
  | WorkerCompletedEvent
  | OverallProgressEvent;

// ============================================================================
// Duplicate Resolution → Presentation
// ============================================================================

export interface GroupSelectedNotice {
  type: 'group-selected';
  groupIndex: number;
  hash: string;
}

export interface FileSelectedNotice {
  type: 'file-selected';
  groupIndex: number;
  fileIndex: number;
  selected: boolean;
}

export interface DeleteRequestedNotice {
  type: 'delete-requested';
  paths: readonly string[];
}

/**
 * `path` is undefined when every file of the batch was removed
 */
export interface DeletionCompleteNotice {
  type: 'deletion-complete';
  path?: string;
  success: boolean;
  error?: string;
}

export type ResolutionNotice =
  | GroupSelectedNotice
  | FileSelectedNotice
  | DeleteRequestedNotice
  | DeletionCompleteNotice;

/**
 * Re-exported for presenters that only import from here
 */
export type { SkipReason };

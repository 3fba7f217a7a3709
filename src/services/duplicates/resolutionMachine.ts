import { DuplicateIndex } from '../../types/video.js';
import { ResolutionNotice } from '../../types/events.js';

/**
 * Duplicate Resolution State Machine
 *
 * Pure reducer over the operator's duplicate-cleanup session. Every input
 * (keypress intent or deletion completion) goes through `transition`, which
 * returns the next state plus the commands the session runner must carry
 * out. State objects are never mutated.
 *
 * Selections are batch-wide: request-delete gathers selected files from
 * every group, so one confirmation can collapse several groups at once.
 */

export interface GroupEntry {
  readonly path: string;
  readonly selected: boolean;
}

export interface DuplicateGroup {
  readonly hash: string;
  /** path + selection flag pairs, in discovery order */
  readonly entries: readonly GroupEntry[];
  readonly deletedFiles: readonly string[];
}

export interface ResolutionCursor {
  readonly groupIndex: number;
  readonly fileIndex: number;
}

export type ResolutionPhase = 'idle' | 'confirming' | 'quitting';

export interface ResolutionState {
  readonly phase: ResolutionPhase;
  readonly groups: readonly DuplicateGroup[];
  /** Undefined only when no groups remain */
  readonly cursor: ResolutionCursor | undefined;
  /** Snapshot of the paths to delete; set while confirming */
  readonly pending: readonly string[] | undefined;
  /** A confirmed deletion is running; mutating input is refused */
  readonly executing: boolean;
  readonly showHelp: boolean;
}

export type ResolutionEvent =
  | { type: 'move-file'; delta: -1 | 1 }
  | { type: 'move-group'; delta: -1 | 1 }
  | { type: 'toggle-selection' }
  | { type: 'select-all' }
  | { type: 'clear-all' }
  | { type: 'skip-group' }
  | { type: 'request-delete' }
  | { type: 'confirm' }
  | { type: 'cancel' }
  | { type: 'toggle-help' }
  | { type: 'quit' }
  | { type: 'deletion-complete'; path?: string; success: boolean; error?: string };

export type ResolutionCommand =
  | { type: 'delete-files'; paths: readonly string[] }
  | { type: 'notify'; notice: ResolutionNotice }
  | { type: 'quit' };

export interface Transition {
  state: ResolutionState;
  commands: ResolutionCommand[];
}

export type ResolutionStateName = 'idle-with-groups' | 'idle-no-groups' | 'confirming-deletion' | 'quitting';

/**
 * Initial state from a duplicate index; groups keep the index's insertion order
 */
export function createResolutionState(index: DuplicateIndex): ResolutionState {
  const groups: DuplicateGroup[] = [];
  for (const [hash, files] of index) {
    if (files.length <= 1) {
      continue;
    }
    groups.push({
      hash,
      entries: files.map(path => ({ path, selected: false })),
      deletedFiles: [],
    });
  }

  return {
    phase: 'idle',
    groups,
    cursor: groups.length > 0 ? { groupIndex: 0, fileIndex: 0 } : undefined,
    pending: undefined,
    executing: false,
    showHelp: true,
  };
}

export function stateName(state: ResolutionState): ResolutionStateName {
  switch (state.phase) {
    case 'quitting':
      return 'quitting';
    case 'confirming':
      return 'confirming-deletion';
    case 'idle':
      return state.groups.length > 0 ? 'idle-with-groups' : 'idle-no-groups';
  }
}

/**
 * Paths currently selected across every group, in group then file order
 */
export function selectedPaths(groups: readonly DuplicateGroup[]): string[] {
  return groups.flatMap(group => group.entries.filter(entry => entry.selected).map(entry => entry.path));
}

export function transition(state: ResolutionState, event: ResolutionEvent): Transition {
  switch (state.phase) {
    case 'quitting':
      return unchanged(state);
    case 'confirming':
      return state.executing ? whileExecuting(state, event) : whileConfirming(state, event);
    case 'idle':
      return state.groups.length > 0 && state.cursor ? whileIdle(state, state.cursor, event) : whileEmpty(state, event);
  }
}

function unchanged(state: ResolutionState): Transition {
  return { state, commands: [] };
}

function quit(state: ResolutionState): Transition {
  return { state: { ...state, phase: 'quitting', pending: undefined }, commands: [{ type: 'quit' }] };
}

function whileEmpty(state: ResolutionState, event: ResolutionEvent): Transition {
  return event.type === 'quit' ? quit(state) : unchanged(state);
}

function whileIdle(state: ResolutionState, cursor: ResolutionCursor, event: ResolutionEvent): Transition {
  const { groups } = state;
  const group = groups[cursor.groupIndex];
  if (!group) {
    return unchanged(state);
  }

  switch (event.type) {
    case 'quit':
      return quit(state);

    case 'toggle-help':
      return { state: { ...state, showHelp: !state.showHelp }, commands: [] };

    case 'move-file': {
      const fileIndex = clamp(cursor.fileIndex + event.delta, 0, group.entries.length - 1);
      if (fileIndex === cursor.fileIndex) {
        return unchanged(state);
      }
      return { state: { ...state, cursor: { ...cursor, fileIndex } }, commands: [] };
    }

    case 'move-group': {
      const groupIndex = clamp(cursor.groupIndex + event.delta, 0, groups.length - 1);
      if (groupIndex === cursor.groupIndex) {
        return unchanged(state);
      }
      return selectGroup(state, groupIndex);
    }

    case 'skip-group':
      if (cursor.groupIndex >= groups.length - 1) {
        return quit(state);
      }
      return selectGroup(state, cursor.groupIndex + 1);

    case 'toggle-selection': {
      const entry = group.entries[cursor.fileIndex];
      if (!entry) {
        return unchanged(state);
      }
      const selected = !entry.selected;
      return {
        state: { ...state, groups: replaceGroup(groups, cursor.groupIndex, setSelection(group, i => (i === cursor.fileIndex ? selected : undefined))) },
        commands: [notify({ type: 'file-selected', groupIndex: cursor.groupIndex, fileIndex: cursor.fileIndex, selected })],
      };
    }

    case 'select-all':
    case 'clear-all': {
      const selected = event.type === 'select-all';
      return {
        state: { ...state, groups: replaceGroup(groups, cursor.groupIndex, setSelection(group, () => selected)) },
        commands: group.entries.map((_, fileIndex) =>
          notify({ type: 'file-selected', groupIndex: cursor.groupIndex, fileIndex, selected })
        ),
      };
    }

    case 'request-delete': {
      const pending = selectedPaths(groups);
      if (pending.length === 0) {
        return unchanged(state);
      }
      return {
        state: { ...state, phase: 'confirming', pending },
        commands: [notify({ type: 'delete-requested', paths: pending })],
      };
    }

    default:
      return unchanged(state);
  }
}

function whileConfirming(state: ResolutionState, event: ResolutionEvent): Transition {
  switch (event.type) {
    case 'confirm':
      if (!state.pending) {
        return unchanged(state);
      }
      return {
        state: { ...state, executing: true },
        commands: [{ type: 'delete-files', paths: state.pending }],
      };

    case 'cancel':
    case 'quit':
      return { state: { ...state, phase: 'idle', pending: undefined }, commands: [] };

    default:
      return unchanged(state);
  }
}

function whileExecuting(state: ResolutionState, event: ResolutionEvent): Transition {
  if (event.type !== 'deletion-complete') {
    return unchanged(state);
  }

  const notice = notify({
    type: 'deletion-complete',
    success: event.success,
    ...(event.path !== undefined && { path: event.path }),
    ...(event.error !== undefined && { error: event.error }),
  });

  const allRemoved = event.success && event.path === undefined;
  if (!allRemoved || !state.pending || !state.cursor) {
    return {
      state: { ...state, phase: 'idle', pending: undefined, executing: false },
      commands: [notice],
    };
  }

  const { groups, cursor } = reindexGroups(state.groups, state.cursor, state.pending);
  const next: ResolutionState = { ...state, phase: 'idle', groups, cursor, pending: undefined, executing: false };

  if (groups.length === 0) {
    return { state: { ...next, phase: 'quitting' }, commands: [notice, { type: 'quit' }] };
  }
  return { state: next, commands: [notice] };
}

/**
 * Drop removed paths from every group, discard groups left with one file or
 * none, and move the cursor so it still points into a live group.
 */
export function reindexGroups(
  groups: readonly DuplicateGroup[],
  cursor: ResolutionCursor,
  removed: readonly string[]
): { groups: DuplicateGroup[]; cursor: ResolutionCursor | undefined } {
  const removedSet = new Set(removed);
  const survivors: DuplicateGroup[] = [];
  let droppedAtOrBefore = 0;
  let currentDropped = false;

  groups.forEach((group, index) => {
    const kept = group.entries.filter(entry => !removedSet.has(entry.path));
    if (kept.length <= 1) {
      if (index <= cursor.groupIndex) {
        droppedAtOrBefore++;
      }
      if (index === cursor.groupIndex) {
        currentDropped = true;
      }
      return;
    }

    const deleted = group.entries.filter(entry => removedSet.has(entry.path)).map(entry => entry.path);
    survivors.push({
      hash: group.hash,
      entries: kept,
      deletedFiles: [...group.deletedFiles, ...deleted],
    });
  });

  if (survivors.length === 0) {
    return { groups: survivors, cursor: undefined };
  }

  const groupIndex = clamp(cursor.groupIndex - droppedAtOrBefore, 0, survivors.length - 1);
  const fileCount = survivors[groupIndex]?.entries.length ?? 0;
  const fileIndex = currentDropped ? 0 : clamp(cursor.fileIndex, 0, fileCount - 1);

  return { groups: survivors, cursor: { groupIndex, fileIndex } };
}

function selectGroup(state: ResolutionState, groupIndex: number): Transition {
  const group = state.groups[groupIndex];
  return {
    state: { ...state, cursor: { groupIndex, fileIndex: 0 } },
    commands: group ? [notify({ type: 'group-selected', groupIndex, hash: group.hash })] : [],
  };
}

function setSelection(group: DuplicateGroup, pick: (index: number) => boolean | undefined): DuplicateGroup {
  return {
    ...group,
    entries: group.entries.map((entry, index) => {
      const selected = pick(index);
      return selected === undefined || selected === entry.selected ? entry : { ...entry, selected };
    }),
  };
}

function replaceGroup(groups: readonly DuplicateGroup[], index: number, group: DuplicateGroup): DuplicateGroup[] {
  return groups.map((existing, i) => (i === index ? group : existing));
}

function notify(notice: ResolutionNotice): ResolutionCommand {
  return { type: 'notify', notice };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

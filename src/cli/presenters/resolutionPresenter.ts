import { ResolutionNotice } from '../../types/events.js';
import { decodeFilename } from '../../services/media/filenameCodec.js';
import { ResolutionEvent, ResolutionState, selectedPaths } from '../../services/duplicates/resolutionMachine.js';
import { Theme, paint } from '../theme.js';

/**
 * Shape of a readline keypress
 */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

const HELP_LINES = [
  'up/k down/j  move file      left/p right/n  move group',
  'space  toggle   a  select all   c  clear   s  skip group',
  'enter  delete selected   h/?  toggle help   q  quit',
];

/**
 * Resolution and duration read back from a tagged name, e.g. "(1920x1080, 30min)"
 */
export function describeTag(filePath: string): string | undefined {
  const triple = decodeFilename(filePath);
  return triple ? `(${triple.resolution}, ${triple.durationMinutes}min)` : undefined;
}

function withTag(theme: Theme, filePath: string): string {
  const tag = describeTag(filePath);
  return tag ? `${filePath}  ${paint(theme, 'dim', tag)}` : filePath;
}

/**
 * Translate a keypress into a resolution event for the current phase
 */
export function keyToEvent(state: ResolutionState, key: KeyPress): ResolutionEvent | undefined {
  const name = key.name ?? key.sequence;

  if (state.phase === 'confirming') {
    if (name === 'y') {
      return { type: 'confirm' };
    }
    if (name === 'n' || name === 'escape' || (key.ctrl && name === 'c')) {
      return { type: 'cancel' };
    }
    return undefined;
  }

  if (key.ctrl) {
    return name === 'c' ? { type: 'quit' } : undefined;
  }

  switch (name) {
    case 'up':
    case 'k':
      return { type: 'move-file', delta: -1 };
    case 'down':
    case 'j':
      return { type: 'move-file', delta: 1 };
    case 'left':
    case 'p':
      return { type: 'move-group', delta: -1 };
    case 'right':
    case 'n':
      return { type: 'move-group', delta: 1 };
    case 'space':
    case ' ':
      return { type: 'toggle-selection' };
    case 'a':
      return { type: 'select-all' };
    case 'c':
      return { type: 'clear-all' };
    case 's':
      return { type: 'skip-group' };
    case 'return':
    case 'enter':
      return { type: 'request-delete' };
    case 'h':
    case '?':
      return { type: 'toggle-help' };
    case 'q':
      return { type: 'quit' };
    default:
      return undefined;
  }
}

/**
 * One-line status text for a notice worth showing to the operator
 */
export function describeNotice(notice: ResolutionNotice): string | undefined {
  if (notice.type !== 'deletion-complete') {
    return undefined;
  }
  if (notice.success) {
    return 'Deleted selected files.';
  }
  return `Failed to delete ${notice.path ?? 'file'}: ${notice.error ?? 'unknown error'}`;
}

/**
 * Full-screen text for the current state
 */
export function renderResolution(theme: Theme, state: ResolutionState, status?: string): string {
  const lines: string[] = [];

  if (state.phase === 'quitting') {
    return 'Goodbye!\n';
  }

  const group = state.cursor ? state.groups[state.cursor.groupIndex] : undefined;
  if (!state.cursor || !group) {
    lines.push('No duplicate files found.', '', paint(theme, 'dim', 'q  quit'));
    return `${lines.join('\n')}\n`;
  }

  if (state.phase === 'confirming') {
    const pending = state.pending ?? [];
    if (state.executing) {
      lines.push(`Deleting ${pending.length} file(s)...`);
    } else {
      lines.push(paint(theme, 'bold', `Delete ${pending.length} file(s)?`), '');
      for (const filePath of pending) {
        lines.push(`  ${paint(theme, 'red', filePath)}`);
      }
      lines.push('', 'y  confirm   n/esc  cancel');
    }
    return `${lines.join('\n')}\n`;
  }

  const selectedCount = selectedPaths(state.groups).length;
  lines.push(
    paint(theme, 'bold', `Group ${state.cursor.groupIndex + 1}/${state.groups.length}`) +
      `  hash ${paint(theme, 'cyan', group.hash)}  ${selectedCount} selected`,
    ''
  );

  group.entries.forEach((entry, index) => {
    const pointer = index === state.cursor?.fileIndex ? theme.symbols.cursor : ' ';
    const box = entry.selected ? paint(theme, 'yellow', theme.symbols.selected) : theme.symbols.unselected;
    lines.push(`${pointer} ${box} ${withTag(theme, entry.path)}`);
  });

  if (group.deletedFiles.length > 0) {
    lines.push('', paint(theme, 'dim', `${group.deletedFiles.length} deleted from this group`));
  }

  if (status) {
    lines.push('', status);
  }

  if (state.showHelp) {
    lines.push('', ...HELP_LINES.map(line => paint(theme, 'dim', line)));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Plain listing of duplicate groups, for non-interactive output
 */
export function formatGroupListing(theme: Theme, state: ResolutionState): string {
  if (state.groups.length === 0) {
    return 'No duplicate files found.\n';
  }
  const blocks = state.groups.map(
    (group, index) => `Group ${index + 1} (${group.hash}):\n${group.entries.map(entry => `  ${withTag(theme, entry.path)}`).join('\n')}`
  );
  return `${blocks.join('\n\n')}\n`;
}

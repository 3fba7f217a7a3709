import { EventEmitter } from 'events';
import fs from 'fs/promises';
import { logger } from '../../middleware/logging.js';
import { createErrorLogContext, toError } from '../../utils/errorHandling.js';
import { FileDeleteError } from '../../errors/index.js';
import { ResolutionNotice } from '../../types/events.js';
import { DuplicateIndex } from '../../types/video.js';
import {
  ResolutionCommand,
  ResolutionEvent,
  ResolutionState,
  createResolutionState,
  transition,
} from './resolutionMachine.js';

export type FileRemover = (filePath: string) => Promise<void>;

export interface DeletionOutcome {
  success: boolean;
  /** Path that failed; undefined when the whole batch was removed */
  path?: string;
  error?: string;
}

/**
 * Remove paths one at a time, stopping at the first failure.
 * Files before the failing one are gone; files after it are untouched.
 */
export async function deleteBatch(
  paths: readonly string[],
  remove: FileRemover = filePath => fs.unlink(filePath)
): Promise<DeletionOutcome> {
  for (const filePath of paths) {
    try {
      await remove(filePath);
      logger.info(`Deleted ${filePath}`, { service: 'duplicates' });
    } catch (error) {
      const failure = new FileDeleteError(filePath, toError(error), { service: 'duplicates' });
      logger.error(failure.message, createErrorLogContext(failure));
      return { success: false, path: filePath, error: failure.message };
    }
  }
  return { success: true };
}

/**
 * Duplicate Resolution Session
 *
 * Owns the current resolution state and runs the side effects the reducer
 * asks for. Emits 'change' with every new state, 'notice' for each
 * presentation notice and 'quit' once the session ends.
 */
export class DuplicateResolutionSession extends EventEmitter {
  private state: ResolutionState;
  private readonly remove: FileRemover;

  constructor(index: DuplicateIndex, remove?: FileRemover) {
    super();
    this.state = createResolutionState(index);
    this.remove = remove ?? (filePath => fs.unlink(filePath));
  }

  get current(): ResolutionState {
    return this.state;
  }

  onNotice(listener: (notice: ResolutionNotice) => void): this {
    return this.on('notice', listener);
  }

  onChange(listener: (state: ResolutionState) => void): this {
    return this.on('change', listener);
  }

  onQuit(listener: () => void): this {
    return this.on('quit', listener);
  }

  /**
   * Apply one event. Resolves after any deletion it started has completed
   * and its completion has been applied; never rejects.
   */
  async dispatch(event: ResolutionEvent): Promise<void> {
    const { state, commands } = transition(this.state, event);
    if (state !== this.state) {
      this.state = state;
      this.emit('change', state);
    }

    for (const command of commands) {
      await this.run(command);
    }
  }

  private async run(command: ResolutionCommand): Promise<void> {
    switch (command.type) {
      case 'notify':
        this.emit('notice', command.notice);
        return;
      case 'quit':
        this.emit('quit');
        return;
      case 'delete-files': {
        const outcome = await deleteBatch(command.paths, this.remove);
        await this.dispatch({ type: 'deletion-complete', ...outcome });
        return;
      }
    }
  }
}

/**
 * Duplicate Resolution State Machine Tests
 */

import {
  ResolutionEvent,
  ResolutionState,
  createResolutionState,
  reindexGroups,
  selectedPaths,
  stateName,
  transition,
} from '../../src/services/duplicates/resolutionMachine.js';

function twoGroups(): ResolutionState {
  return createResolutionState(
    new Map([
      ['G1', ['/v/a.mp4', '/v/b.mp4', '/v/c.mp4']],
      ['G2', ['/v/d.mp4', '/v/e.mp4']],
    ])
  );
}

function apply(state: ResolutionState, ...events: ResolutionEvent[]): ResolutionState {
  return events.reduce((current, event) => transition(current, event).state, state);
}

describe('createResolutionState', () => {
  it('should start idle on the first file of the first group with help shown', () => {
    const state = twoGroups();

    expect(stateName(state)).toBe('idle-with-groups');
    expect(state.cursor).toEqual({ groupIndex: 0, fileIndex: 0 });
    expect(state.showHelp).toBe(true);
    expect(state.groups.map(g => g.hash)).toEqual(['G1', 'G2']);
    expect(selectedPaths(state.groups)).toEqual([]);
  });

  it('should start with no groups for an empty index', () => {
    const state = createResolutionState(new Map());

    expect(stateName(state)).toBe('idle-no-groups');
    expect(state.cursor).toBeUndefined();
  });
});

describe('transition', () => {
  describe('navigation', () => {
    it('should clamp the file cursor at both ends', () => {
      let state = apply(twoGroups(), { type: 'move-file', delta: -1 });
      expect(state.cursor).toEqual({ groupIndex: 0, fileIndex: 0 });

      state = apply(state, { type: 'move-file', delta: 1 }, { type: 'move-file', delta: 1 }, { type: 'move-file', delta: 1 });
      expect(state.cursor).toEqual({ groupIndex: 0, fileIndex: 2 });
    });

    it('should reset the file cursor when the group changes', () => {
      const state = apply(twoGroups(), { type: 'move-file', delta: 1 }, { type: 'move-group', delta: 1 });

      expect(state.cursor).toEqual({ groupIndex: 1, fileIndex: 0 });
    });

    it('should announce the newly selected group', () => {
      const { commands } = transition(twoGroups(), { type: 'move-group', delta: 1 });

      expect(commands).toEqual([{ type: 'notify', notice: { type: 'group-selected', groupIndex: 1, hash: 'G2' } }]);
    });

    it('should not move past the first or last group', () => {
      const first = transition(twoGroups(), { type: 'move-group', delta: -1 });
      expect(first.state.cursor).toEqual({ groupIndex: 0, fileIndex: 0 });
      expect(first.commands).toEqual([]);

      const last = apply(twoGroups(), { type: 'move-group', delta: 1 }, { type: 'move-group', delta: 1 });
      expect(last.cursor).toEqual({ groupIndex: 1, fileIndex: 0 });
    });

    it('should advance on skip and quit when skipping the last group', () => {
      const skipped = apply(twoGroups(), { type: 'skip-group' });
      expect(skipped.cursor).toEqual({ groupIndex: 1, fileIndex: 0 });

      const { state, commands } = transition(skipped, { type: 'skip-group' });
      expect(stateName(state)).toBe('quitting');
      expect(commands).toEqual([{ type: 'quit' }]);
    });

    it('should flip the help flag and nothing else', () => {
      const before = twoGroups();
      const after = apply(before, { type: 'toggle-help' });

      expect(after.showHelp).toBe(false);
      expect(after.groups).toBe(before.groups);
      expect(after.cursor).toBe(before.cursor);
    });
  });

  describe('selection', () => {
    it('should toggle the file under the cursor', () => {
      const { state, commands } = transition(apply(twoGroups(), { type: 'move-file', delta: 1 }), {
        type: 'toggle-selection',
      });

      expect(selectedPaths(state.groups)).toEqual(['/v/b.mp4']);
      expect(commands).toEqual([
        { type: 'notify', notice: { type: 'file-selected', groupIndex: 0, fileIndex: 1, selected: true } },
      ]);
      expect(selectedPaths(apply(state, { type: 'toggle-selection' }).groups)).toEqual([]);
    });

    it('should select and clear the whole current group only', () => {
      const selected = apply(
        twoGroups(),
        { type: 'move-group', delta: 1 },
        { type: 'toggle-selection' },
        { type: 'move-group', delta: -1 },
        { type: 'select-all' }
      );
      expect(selectedPaths(selected.groups)).toEqual(['/v/a.mp4', '/v/b.mp4', '/v/c.mp4', '/v/d.mp4']);

      const cleared = apply(selected, { type: 'clear-all' });
      expect(selectedPaths(cleared.groups)).toEqual(['/v/d.mp4']);
    });

    it('should keep selections when moving between groups', () => {
      const state = apply(
        twoGroups(),
        { type: 'toggle-selection' },
        { type: 'move-group', delta: 1 },
        { type: 'move-group', delta: -1 }
      );

      expect(selectedPaths(state.groups)).toEqual(['/v/a.mp4']);
    });

    it('should never mutate the previous state', () => {
      const before = twoGroups();
      apply(before, { type: 'select-all' }, { type: 'request-delete' });

      expect(selectedPaths(before.groups)).toEqual([]);
      expect(before.phase).toBe('idle');
    });
  });

  describe('deletion', () => {
    function withBAndDSelected(): ResolutionState {
      return apply(
        twoGroups(),
        { type: 'move-file', delta: 1 },
        { type: 'toggle-selection' },
        { type: 'move-group', delta: 1 },
        { type: 'toggle-selection' }
      );
    }

    it('should ignore a delete request with nothing selected', () => {
      const { state, commands } = transition(twoGroups(), { type: 'request-delete' });

      expect(stateName(state)).toBe('idle-with-groups');
      expect(commands).toEqual([]);
    });

    it('should snapshot selections from every group when asking for confirmation', () => {
      const { state, commands } = transition(withBAndDSelected(), { type: 'request-delete' });

      expect(stateName(state)).toBe('confirming-deletion');
      expect(state.pending).toEqual(['/v/b.mp4', '/v/d.mp4']);
      expect(commands).toEqual([
        { type: 'notify', notice: { type: 'delete-requested', paths: ['/v/b.mp4', '/v/d.mp4'] } },
      ]);
    });

    it('should return to idle with selections intact on cancel', () => {
      const state = apply(withBAndDSelected(), { type: 'request-delete' }, { type: 'cancel' });

      expect(stateName(state)).toBe('idle-with-groups');
      expect(state.pending).toBeUndefined();
      expect(selectedPaths(state.groups)).toEqual(['/v/b.mp4', '/v/d.mp4']);
    });

    it('should ignore navigation while confirming', () => {
      const confirming = apply(withBAndDSelected(), { type: 'request-delete' });

      expect(transition(confirming, { type: 'move-file', delta: 1 }).state).toBe(confirming);
      expect(transition(confirming, { type: 'toggle-selection' }).state).toBe(confirming);
    });

    it('should issue the delete command on confirm and refuse input while it runs', () => {
      const confirming = apply(withBAndDSelected(), { type: 'request-delete' });
      const { state, commands } = transition(confirming, { type: 'confirm' });

      expect(state.executing).toBe(true);
      expect(commands).toEqual([{ type: 'delete-files', paths: ['/v/b.mp4', '/v/d.mp4'] }]);
      expect(transition(state, { type: 'cancel' }).state).toBe(state);
      expect(transition(state, { type: 'confirm' }).commands).toEqual([]);
      expect(transition(state, { type: 'quit' }).state).toBe(state);
    });

    it('should re-index after a full success and drop collapsed groups', () => {
      const executing = apply(withBAndDSelected(), { type: 'request-delete' }, { type: 'confirm' });

      const { state, commands } = transition(executing, { type: 'deletion-complete', success: true });

      expect(stateName(state)).toBe('idle-with-groups');
      expect(state.groups).toEqual([
        {
          hash: 'G1',
          entries: [
            { path: '/v/a.mp4', selected: false },
            { path: '/v/c.mp4', selected: false },
          ],
          deletedFiles: ['/v/b.mp4'],
        },
      ]);
      // cursor was on G2, which disappeared
      expect(state.cursor).toEqual({ groupIndex: 0, fileIndex: 0 });
      expect(state.executing).toBe(false);
      expect(commands).toEqual([{ type: 'notify', notice: { type: 'deletion-complete', success: true } }]);
    });

    it('should quit once the last group is resolved', () => {
      const state = apply(
        createResolutionState(new Map([['G', ['/v/x.mp4', '/v/y.mp4']]])),
        { type: 'select-all' },
        { type: 'request-delete' },
        { type: 'confirm' }
      );

      const result = transition(state, { type: 'deletion-complete', success: true });

      expect(stateName(result.state)).toBe('quitting');
      expect(result.state.groups).toEqual([]);
      expect(result.state.cursor).toBeUndefined();
      expect(result.commands).toContainEqual({ type: 'quit' });
    });

    it('should keep groups unchanged after a partial failure', () => {
      const executing = apply(withBAndDSelected(), { type: 'request-delete' }, { type: 'confirm' });

      const { state, commands } = transition(executing, {
        type: 'deletion-complete',
        success: false,
        path: '/v/d.mp4',
        error: 'failed to delete /v/d.mp4: EACCES',
      });

      expect(stateName(state)).toBe('idle-with-groups');
      expect(state.groups).toBe(executing.groups);
      expect(state.pending).toBeUndefined();
      expect(commands).toEqual([
        {
          type: 'notify',
          notice: {
            type: 'deletion-complete',
            success: false,
            path: '/v/d.mp4',
            error: 'failed to delete /v/d.mp4: EACCES',
          },
        },
      ]);
    });

    it('should ignore a completion that arrives while idle', () => {
      const state = twoGroups();

      expect(transition(state, { type: 'deletion-complete', success: true }).state).toBe(state);
    });
  });

  describe('quitting', () => {
    it('should quit from idle and ignore everything afterwards', () => {
      const { state, commands } = transition(twoGroups(), { type: 'quit' });

      expect(stateName(state)).toBe('quitting');
      expect(commands).toEqual([{ type: 'quit' }]);
      expect(transition(state, { type: 'move-file', delta: 1 }).state).toBe(state);
    });

    it('should allow quitting with no groups', () => {
      const { state } = transition(createResolutionState(new Map()), { type: 'quit' });

      expect(stateName(state)).toBe('quitting');
    });
  });
});

describe('reindexGroups', () => {
  const group = (hash: string, ...paths: string[]) => ({
    hash,
    entries: paths.map(p => ({ path: p, selected: false })),
    deletedFiles: [],
  });

  it('should shift the cursor back by the groups removed before it', () => {
    const groups = [group('G1', 'a', 'b'), group('G2', 'c', 'd'), group('G3', 'e', 'f', 'g')];

    const result = reindexGroups(groups, { groupIndex: 2, fileIndex: 2 }, ['a', 'c']);

    expect(result.groups.map(g => g.hash)).toEqual(['G3']);
    expect(result.cursor).toEqual({ groupIndex: 0, fileIndex: 2 });
  });

  it('should clamp the file cursor when the current group shrinks', () => {
    const groups = [group('G1', 'a', 'b', 'c', 'd')];

    const result = reindexGroups(groups, { groupIndex: 0, fileIndex: 3 }, ['d']);

    expect(result.cursor).toEqual({ groupIndex: 0, fileIndex: 2 });
    expect(result.groups[0]?.deletedFiles).toEqual(['d']);
  });

  it('should leave the cursor alone when only later groups are removed', () => {
    const groups = [group('G1', 'a', 'b', 'c'), group('G2', 'd', 'e')];

    const result = reindexGroups(groups, { groupIndex: 0, fileIndex: 1 }, ['e']);

    expect(result.groups.map(g => g.hash)).toEqual(['G1']);
    expect(result.cursor).toEqual({ groupIndex: 0, fileIndex: 1 });
  });
});

import readline from 'readline';
import { logger } from '../../middleware/logging.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import { buildDuplicateIndex } from '../../services/duplicates/duplicateIndexService.js';
import { DuplicateResolutionSession } from '../../services/duplicates/resolutionSession.js';
import { duplicatesOptionsSchema, parseOptions } from '../../validation/cliSchemas.js';
import { ParsedArgs } from '../args.js';
import { CliContext, createDiscovery } from '../context.js';
import {
  KeyPress,
  describeNotice,
  formatGroupListing,
  keyToEvent,
  renderResolution,
} from '../presenters/resolutionPresenter.js';

const CLEAR_SCREEN = '\u001b[2J\u001b[H';

export async function runDuplicates(
  args: ParsedArgs,
  ctx: CliContext,
  input: NodeJS.ReadStream = process.stdin
): Promise<number> {
  const options = parseOptions(duplicatesOptionsSchema, { directory: args.positionals[0] }, 'duplicates');

  const index = await buildDuplicateIndex(options.directory, createDiscovery(ctx.config.tools));
  const session = new DuplicateResolutionSession(index);

  if (!input.isTTY) {
    ctx.out.write(formatGroupListing(ctx.theme, session.current));
    return 0;
  }

  return interact(session, ctx, input);
}

/**
 * Drive the session from raw-mode keypresses until it quits
 */
function interact(session: DuplicateResolutionSession, ctx: CliContext, input: NodeJS.ReadStream): Promise<number> {
  return new Promise(resolve => {
    let status: string | undefined;

    const draw = (): void => {
      ctx.out.write(`${CLEAR_SCREEN}${renderResolution(ctx.theme, session.current, status)}`);
    };

    const onKeypress = (_text: string | undefined, key: KeyPress | undefined): void => {
      const event = keyToEvent(session.current, key ?? {});
      if (!event) {
        return;
      }
      status = undefined;
      session.dispatch(event).catch(error => {
        logger.error('Duplicate resolution failed', createErrorLogContext(error, { service: 'cli' }));
      });
    };

    session.onChange(draw);
    session.onNotice(notice => {
      const text = describeNotice(notice);
      if (text) {
        status = text;
        draw();
      }
    });
    session.onQuit(() => {
      input.off('keypress', onKeypress);
      input.setRawMode(false);
      input.pause();
      draw();
      resolve(0);
    });

    readline.emitKeypressEvents(input);
    input.setRawMode(true);
    input.on('keypress', onKeypress);
    input.resume();
    draw();
  });
}

import { checkRequiredBinaries, missingRequired } from '../../utils/binaryCheck.js';
import { CliContext } from '../context.js';
import { paint } from '../theme.js';

export async function runCheck(ctx: CliContext): Promise<number> {
  const results = await checkRequiredBinaries(ctx.config.tools);

  for (const result of results) {
    const mark = result.available
      ? paint(ctx.theme, 'green', ctx.theme.symbols.ok)
      : paint(ctx.theme, result.required ? 'red' : 'yellow', ctx.theme.symbols.fail);
    const detail = result.available ? `version ${result.version ?? 'unknown'}` : 'not found';
    const kind = result.required ? 'required' : 'optional';
    ctx.out.write(`${mark} ${result.binary} (${kind}): ${detail}  ${paint(ctx.theme, 'dim', result.purpose)}\n`);
  }

  return missingRequired(results).length > 0 ? 1 : 0;
}

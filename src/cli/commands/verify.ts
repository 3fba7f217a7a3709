import { summarizeVerification, verifyFiles } from '../../services/verify/verifyService.js';
import { parseOptions, verifyOptionsSchema } from '../../validation/cliSchemas.js';
import { ParsedArgs } from '../args.js';
import { CliContext } from '../context.js';
import { formatVerifyResult, formatVerifySummary } from '../presenters/verifyPresenter.js';

export async function runVerify(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const options = parseOptions(
    verifyOptionsSchema,
    { paths: args.positionals, concurrency: args.options.concurrency },
    'verify'
  );

  const results = await verifyFiles(options.paths, {
    concurrency: options.concurrency ?? ctx.config.verify.concurrency,
  });
  for (const result of results) {
    ctx.out.write(`${formatVerifyResult(ctx.theme, result)}\n`);
  }

  const summary = summarizeVerification(results);
  ctx.out.write(`\n${formatVerifySummary(summary)}\n`);

  return summary.mismatch > 0 || summary.failed > 0 ? 1 : 0;
}

import { logger } from '../../middleware/logging.js';
import { DependencyError } from '../../errors/index.js';
import { checkBinary } from '../../utils/binaryCheck.js';
import { FfprobeService } from '../../services/media/ffprobeService.js';
import { TaggingPipeline, expandInputs, summarizeResults } from '../../services/tagging/taggingPipeline.js';
import { resolveWorkerCount } from '../../utils/networkDrive.js';
import { parseOptions, tagOptionsSchema } from '../../validation/cliSchemas.js';
import { ParsedArgs } from '../args.js';
import { CliContext, createDiscovery } from '../context.js';
import { TaggingPresenter } from '../presenters/taggingPresenter.js';

export async function runTag(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const options = parseOptions(
    tagOptionsSchema,
    { paths: args.positionals, workers: args.options.workers },
    'tag'
  );
  const { tools, tagging } = ctx.config;

  const files = await expandInputs(options.paths, createDiscovery(tools));
  if (files.length === 0) {
    ctx.out.write('No untagged video files found.\n');
    return 0;
  }

  const ffprobe = await checkBinary(tools.ffprobePath, ['-version']);
  if (!ffprobe.available) {
    throw new DependencyError(
      tools.ffprobePath,
      `${tools.ffprobePath} is required for tagging: ${ffprobe.error ?? 'not found'}`,
      { service: 'cli', operation: 'tag' }
    );
  }

  const workers = resolveWorkerCount(files, options.workers ?? tagging.workers);
  logger.info(`Using ${workers} workers`, { service: 'cli', files: files.length });

  const pipeline = new TaggingPipeline({
    prober: new FfprobeService({ binary: tools.ffprobePath, timeoutMs: tools.probeTimeoutMs }),
    progressIntervalMs: tagging.progressIntervalMs,
  });
  const presenter = new TaggingPresenter(ctx.theme, ctx.out);
  pipeline.onEvent(event => presenter.handleEvent(event));
  pipeline.onResult(result => presenter.handleResult(result));

  const summary = summarizeResults(await pipeline.processBatch(files, workers));
  presenter.finish(summary);

  return summary.failed > 0 ? 1 : 0;
}

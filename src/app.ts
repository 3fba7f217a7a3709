import { ConfigManager } from './config/ConfigManager.js';
import { APP_NAME, APP_VERSION } from './config/constants.js';
import { AppConfig } from './config/types.js';
import { logger } from './middleware/logging.js';
import { ApplicationError } from './errors/index.js';
import { createErrorLogContext, getErrorMessage } from './utils/errorHandling.js';
import { ParsedArgs, parseArgs } from './cli/args.js';
import { CliContext } from './cli/context.js';
import { runCheck } from './cli/commands/check.js';
import { runDuplicates } from './cli/commands/duplicates.js';
import { runTag } from './cli/commands/tag.js';
import { runVerify } from './cli/commands/verify.js';
import { OutputStream } from './cli/presenters/taggingPresenter.js';
import { createTheme } from './cli/theme.js';

export const USAGE = `Usage: ${APP_NAME} <command> [options]

Commands:
  tag <paths...> [--workers N]       Tag untagged videos with resolution, duration and CRC-32
  duplicates [dir]                   Review and delete tagged videos sharing a hash
  verify <files...> [--concurrency N]  Recompute CRC-32 and compare with the embedded hash
  check                              Report whether ffprobe and fd are installed

Options:
  -h, --help                         Show this help
  -v, --version                      Show the version
`;

export interface AppStreams {
  out: OutputStream;
  err: OutputStream;
}

/**
 * Command dispatcher. Returns the process exit code; never calls process.exit.
 */
export class App {
  private readonly config: AppConfig;
  private readonly streams: AppStreams;

  constructor(streams: AppStreams = { out: process.stdout, err: process.stderr }) {
    this.config = ConfigManager.getInstance().getConfig();
    this.streams = streams;
  }

  async run(argv: readonly string[]): Promise<number> {
    const args = parseArgs(argv);

    if (args.options.version === true) {
      this.streams.out.write(`${APP_NAME} ${APP_VERSION}\n`);
      return 0;
    }
    if (args.options.help === true || args.command === undefined || args.command === 'help') {
      this.streams.out.write(USAGE);
      return args.command === undefined && args.options.help !== true ? 2 : 0;
    }

    const ctx: CliContext = {
      config: this.config,
      theme: createTheme(Boolean(this.streams.out.isTTY)),
      out: this.streams.out,
    };

    try {
      return await this.dispatch(args, ctx);
    } catch (error) {
      logger.debug('Command failed', createErrorLogContext(error, { command: args.command }));
      this.streams.err.write(`${APP_NAME}: ${getErrorMessage(error)}\n`);
      return error instanceof ApplicationError ? error.exitStatus : 1;
    }
  }

  private async dispatch(args: ParsedArgs, ctx: CliContext): Promise<number> {
    switch (args.command) {
      case 'tag':
        return runTag(args, ctx);
      case 'duplicates':
        return runDuplicates(args, ctx);
      case 'verify':
        return runVerify(args, ctx);
      case 'check':
        return runCheck(ctx);
      default:
        this.streams.err.write(`${APP_NAME}: unknown command '${args.command ?? ''}'\n\n${USAGE}`);
        return 2;
    }
  }
}

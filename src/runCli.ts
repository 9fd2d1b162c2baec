import { HELP, parseCliOptions, type CliOptions } from './cliOptions.js';
import { isLookalikeError } from './core/errors.js';
import { createModuleLogger } from './core/logger.js';
import type { ProgressEvent, ScanTarget } from './core/types.js';
import { formatTarget } from './core/validation.js';
import type { ResolverDeps } from './modules/availabilityResolver.js';
import { executeScan } from './scan/executeScan.js';
import { formatReport, formatSummary } from './services/consoleReport.js';
import { writeCsvReport } from './services/csvExport.js';

const log = createModuleLogger('cli');

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Rewrites the current stderr line; omitted when stderr is not a terminal */
  progress?: (text: string) => void;
}

export interface CliContext {
  io?: CliIO;
  /** Collaborator overrides, used by tests */
  deps?: Partial<ResolverDeps>;
  /** Force console colours on or off */
  color?: boolean;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  progress: process.stderr.isTTY ? (text) => process.stderr.write(`\r${text}`) : undefined,
};

function renderProgress({ completed, total }: ProgressEvent): string {
  const percent = total === 0 ? 100 : Math.floor((completed / total) * 100);
  return `${completed} / ${total} [${percent}%]`;
}

async function runScan(options: CliOptions, target: string, io: CliIO, context: CliContext): Promise<void> {
  const results = await executeScan({
    target,
    limit: options.limit,
    concurrency: options.concurrency,
    dictionaryPath: options.dictionaryPath,
    deps: context.deps,
    onStart: (parsed: ScanTarget, total: number) => {
      if (!options.json) {
        io.out(`checking ${total} variations for '${formatTarget(parsed)}', please wait ...\n`);
      }
    },
    onProgress: io.progress ? (event) => io.progress?.(renderProgress(event)) : undefined,
  });

  if (io.progress) {
    io.progress('\n');
  }

  const filter = {
    availableOnly: options.availableOnly,
    registeredOnly: options.registeredOnly,
    liveOnly: options.liveOnly,
  };

  if (options.json) {
    io.out(JSON.stringify(results.filter(filter), null, 2));
  } else {
    io.out('');
    for (const line of formatReport(results, { ...filter, whois: options.whois, color: context.color })) {
      io.out(line);
    }
    io.out('');
    io.out(formatSummary(results));
  }

  if (options.csvFile) {
    await writeCsvReport(options.csvFile, results, { whois: options.whois });
    if (!options.json) {
      io.out(`saved to ${options.csvFile}`);
    }
  }
}

/**
 * Run the command line and return the process exit status.
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  const io = context.io ?? processIO;

  let options: CliOptions;
  try {
    options = parseCliOptions(argv);
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  if (options.help || !options.target) {
    io.out(HELP);
    return options.help ? 0 : 1;
  }

  try {
    await runScan(options, options.target, io, context);
    return 0;
  } catch (err) {
    if (!isLookalikeError(err)) {
      log.error({ err }, 'Unexpected failure');
    }
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

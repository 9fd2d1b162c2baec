import { parseArgs } from 'node:util';
import { Errors } from './core/errors.js';
import { scan as scanConfig } from './core/env.js';

export const HELP = `
lookalike - Find registered look-alike domains for a brand

USAGE:
  lookalike <domain|url> [options]

OPTIONS:
  --domain <name>       Domain name or URL (alternative to the positional argument)
  --limit <n>           Limit the number of permutations (0 = no limit)
  --concurrency <n>     Parallel lookups (0 = one per CPU core)
  --available           Only display available domain names
  --registered          Only display registered domain names
  --live                Only display registered domain names that also resolve to an IP
  --whois               Show whois information
  --csv <file>          Save results to this CSV file
  --json                Print results as JSON
  --dictionary <file>   Use an alternative substitution dictionary (JSON)
  -h, --help            Show this help message

EXAMPLES:
  lookalike example.com
  lookalike https://www.example.com --registered --whois
  lookalike example.com --limit 50 --csv results.csv
`;

export interface CliOptions {
  target?: string;
  help: boolean;
  limit: number;
  concurrency: number;
  availableOnly: boolean;
  registeredOnly: boolean;
  liveOnly: boolean;
  whois: boolean;
  json: boolean;
  csvFile?: string;
  dictionaryPath?: string;
}

function parseCount(option: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value.trim())) {
    throw Errors.invalidOption(option, 'Must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Parse argv (without the node and script entries). Flags override
 * LOOKALIKE_* environment values.
 */
export function parseCliOptions(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      domain: { type: 'string' },
      limit: { type: 'string' },
      concurrency: { type: 'string' },
      available: { type: 'boolean', default: false },
      registered: { type: 'boolean', default: false },
      live: { type: 'boolean', default: false },
      whois: { type: 'boolean', default: false },
      csv: { type: 'string' },
      json: { type: 'boolean', default: false },
      dictionary: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const dictionaryPath = values.dictionary ?? (scanConfig.DICTIONARY || undefined);

  return {
    target: positionals[0] ?? values.domain,
    help: values.help ?? false,
    limit: parseCount('limit', values.limit, scanConfig.LIMIT),
    concurrency: parseCount('concurrency', values.concurrency, scanConfig.CONCURRENCY),
    availableOnly: values.available ?? false,
    registeredOnly: values.registered ?? false,
    liveOnly: values.live ?? false,
    whois: values.whois ?? false,
    json: values.json ?? false,
    csvFile: values.csv,
    dictionaryPath,
  };
}

import { InputError } from './errors.js';
import { isOutputFormat, type OutputFormat } from './storage/ResultStore.js';

export interface CLIOptions {
  input?: string;
  output?: string;
  workers?: string;
  maxPages?: string;
  emailsOnly: boolean;
  format?: OutputFormat;
  help: boolean;
}

export const USAGE = `Usage: domain-email-harvester --input companies.xlsx [options]

  -i, --input <file>      .xlsx or .csv with a Company column (Domain optional)
  -o, --output <file>     result file (default: output/results.<format>)
  -f, --format <format>   xlsx | csv | json (default: from --output, else xlsx)
  -w, --workers <n>       concurrent companies (MAX_WORKERS)
      --max-pages <n>     pages crawled per company (MAX_FALLBACK_PAGES)
      --emails-only       omit companies without an e-mail from the output
  -h, --help              show this help`;

function valueFor(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new InputError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CLIOptions {
  const options: CLIOptions = { emailsOnly: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--input' || arg === '-i') {
      options.input = valueFor(argv, i, arg);
      i += 1;
    } else if (arg === '--output' || arg === '-o') {
      options.output = valueFor(argv, i, arg);
      i += 1;
    } else if (arg === '--workers' || arg === '-w') {
      options.workers = valueFor(argv, i, arg);
      i += 1;
    } else if (arg === '--max-pages') {
      options.maxPages = valueFor(argv, i, arg);
      i += 1;
    } else if (arg === '--format' || arg === '-f') {
      const value = valueFor(argv, i, arg).toLowerCase();
      if (!isOutputFormat(value)) {
        throw new InputError(`Unknown output format "${value}" (expected xlsx, csv or json)`);
      }
      options.format = value;
      i += 1;
    } else if (arg === '--emails-only') {
      options.emailsOnly = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new InputError(`Unknown argument "${arg}"`);
    }
  }

  return options;
}

/** Environment overlay so CLI numbers pass through the same validation as `.env` values. */
export function envOverrides(options: CLIOptions): Record<string, string> {
  return {
    ...(options.workers !== undefined ? { MAX_WORKERS: options.workers } : {}),
    ...(options.maxPages !== undefined ? { MAX_FALLBACK_PAGES: options.maxPages } : {})
  };
}

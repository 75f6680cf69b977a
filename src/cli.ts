/**
 * Command-line arguments for gmail-merge.
 */

import { parseArgs } from 'node:util';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_COLUMNS, splitList } from './recipients/index.js';
import type { ColumnMapping } from './recipients/index.js';

export const USAGE = `Usage: gmail-merge --csv <path> --subject <text|@file> --html <text|@file> [options]

Required:
  --csv <path>            Recipient table (header row required)
  --subject <text|@file>  Subject template, e.g. "Hello {firstname}"
  --html <text|@file>     HTML body template

Options:
  --text <text|@file>     Plain-text alternative body
  --sender <address>      From address (default: me, the authorized account)
  --attach <paths>        Comma-separated files attached to every message
  --col_to <name>         Recipient column (default: email)
  --col_cc <name>         Cc column (default: cc)
  --col_bcc <name>        Bcc column (default: bcc)
  --col_attach <name>     Attachment column (default: attachment)
  --limit <n>             Process only the first n recipients (0 = all)
  --dry_run               Preview every message; send nothing
  --help                  Show this message`;

export interface CliOptions {
  csv: string;
  subject: string;
  html: string;
  text?: string;
  sender: string;
  attach: string[];
  columns: ColumnMapping;
  limit: number;
  dryRun: boolean;
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

function invalid(message: string): ConfigError {
  return new ConfigError(`${message}\n\n${USAGE}`, 'CLI_INVALID_ARGS');
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined) return 0;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw invalid(`--limit must be a non-negative integer (got "${raw}")`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        csv: { type: 'string' },
        subject: { type: 'string' },
        html: { type: 'string' },
        text: { type: 'string' },
        sender: { type: 'string' },
        attach: { type: 'string' },
        col_to: { type: 'string' },
        col_cc: { type: 'string' },
        col_bcc: { type: 'string' },
        col_attach: { type: 'string' },
        limit: { type: 'string' },
        dry_run: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    // parseArgs throws TypeError for unknown options and missing values
    throw invalid(errorMessage(err));
  }
}

/**
 * @throws ConfigError on unknown options, missing required options or bad values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values } = readArgs(argv);
  if (values.help) return { kind: 'help' };

  const missing = (['csv', 'subject', 'html'] as const).filter(name => !values[name]);
  if (missing.length > 0) {
    throw invalid(`Missing required option(s): ${missing.map(name => `--${name}`).join(', ')}`);
  }

  const options: CliOptions = {
    csv: values.csv ?? '',
    subject: values.subject ?? '',
    html: values.html ?? '',
    sender: values.sender || 'me',
    attach: splitList(values.attach),
    columns: {
      email: values.col_to || DEFAULT_COLUMNS.email,
      cc: values.col_cc || DEFAULT_COLUMNS.cc,
      bcc: values.col_bcc || DEFAULT_COLUMNS.bcc,
      attachment: values.col_attach || DEFAULT_COLUMNS.attachment,
    },
    limit: parseLimit(values.limit),
    dryRun: values.dry_run ?? false,
  };
  if (values.text !== undefined) options.text = values.text;

  return { kind: 'run', options };
}

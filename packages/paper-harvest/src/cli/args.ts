import type { ConfigOverrides, TransportMode } from '../config.js';

export interface CliArgs {
  showHelp: boolean;
  showVersion: boolean;
  transport?: TransportMode;
  downloadDir?: string;
}

/** A command line the server cannot start from; the usage text is printed with it. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const TRANSPORT_OPTIONS: TransportMode[] = ['stdio', 'http', 'both'];
const TRANSPORT_SET = new Set<string>(TRANSPORT_OPTIONS);

const isTransportMode = (value: string): value is TransportMode => TRANSPORT_SET.has(value);

const parseTransport = (value: string): TransportMode => {
  const normalized = value.trim().toLowerCase();

  if (!isTransportMode(normalized)) {
    throw new CliUsageError(`Invalid transport "${value}". Expected one of: ${TRANSPORT_OPTIONS.join(', ')}.`);
  }

  return normalized;
};

const parseDirectory = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new CliUsageError('Empty value for --download-dir.');
  }
  return trimmed;
};

/** Flags that take a value, accepted as `--flag value` or `--flag=value`. */
const VALUE_FLAGS: Record<string, (args: CliArgs, value: string) => void> = {
  '--transport': (args, value) => {
    args.transport = parseTransport(value);
  },
  '--download-dir': (args, value) => {
    args.downloadDir = parseDirectory(value);
  }
};

export const CLI_USAGE = `paper-harvest MCP server

Usage:
  paper-harvest [--transport <stdio|http|both>] [--download-dir <dir>]
  paper-harvest --help
  paper-harvest --version

Options:
  --transport <mode>    Override HARVEST_TRANSPORT for this run
  --download-dir <dir>  Override ACQUIRE_DOWNLOAD_DIR for this run
  -h, --help            Show help
  -v, --version         Print package version`;

export const parseCliArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {
    showHelp: false,
    showVersion: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]?.trim();

    if (!arg) {
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      args.showHelp = true;
      continue;
    }

    if (arg === '-v' || arg === '--version') {
      args.showVersion = true;
      continue;
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const apply = VALUE_FLAGS[flag];
    if (!apply) {
      throw new CliUsageError(`Unknown argument "${arg}".`);
    }

    if (separator !== -1) {
      apply(args, arg.slice(separator + 1));
      continue;
    }

    const nextValue = argv[index + 1];
    if (!nextValue) {
      throw new CliUsageError(`Missing value after ${flag}.`);
    }
    apply(args, nextValue);
    index += 1;
  }

  return args;
};

/** Environment overrides implied by the flags; empty when none were given. */
export const toConfigOverrides = (args: CliArgs): ConfigOverrides => ({
  ...(args.transport ? { HARVEST_TRANSPORT: args.transport } : {}),
  ...(args.downloadDir ? { ACQUIRE_DOWNLOAD_DIR: args.downloadDir } : {})
});

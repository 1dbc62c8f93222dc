import { parseArgs } from "node:util";

import { ConfigurationError } from "@name-sanitizer/core-domain";
import type { RunFlags } from "@name-sanitizer/core-application";

export type CliArgs = {
  help: boolean;
  init: boolean;
  configPath?: string;
  flags: RunFlags;
};

export const USAGE = `Usage: name-sanitizer -d <directory> [options]

Renames files and folders in a remote store so their names are valid on Windows.

Options:
  -d, --directory <path>    remote directory to sanitize (e.g. /Shared/Team)
  -s, --safe-mode           only log what would be renamed
  -o, --overwrite           on conflict, delete the existing entry (USE WITH CAUTION)
  -r, --replace-with <c>    replacement for invalid characters (default "_")
      --max-suffix <n>      suffixes to try on conflict: _1 .. _n (default 1)
  -v, --verbose             debug logging
  -l, --logfile <file>      also append the log to a file
  -c, --config <file>       config file (default name-sanitizer.config.json)
  -i, --init                authorize and test the connection
      --strict              exit with code 2 if anything failed
  -h, --help                show this help

The WebDAV password is read from NAME_SANITIZER_WEBDAV_PASSWORD
(or "webdav.password" in the config file).`;

function parseCount(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`--max-suffix must be a positive integer, got "${raw}"`);
  }
  return n;
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      directory: { type: "string", short: "d" },
      "safe-mode": { type: "boolean", short: "s" },
      overwrite: { type: "boolean", short: "o" },
      "replace-with": { type: "string", short: "r" },
      "max-suffix": { type: "string" },
      verbose: { type: "boolean", short: "v" },
      logfile: { type: "string", short: "l" },
      config: { type: "string", short: "c" },
      init: { type: "boolean", short: "i" },
      strict: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  }).values;
}

export function parseCliArgs(argv: string[]): CliArgs {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (err) {
    // parseArgs lança TypeError com code ERR_PARSE_ARGS_*
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), err);
  }

  return {
    help: values.help ?? false,
    init: values.init ?? false,
    configPath: values.config,
    flags: {
      directory: values.directory,
      dryRun: values["safe-mode"],
      overwrite: values.overwrite,
      replaceWith: values["replace-with"],
      maxSuffixAttempts: parseCount(values["max-suffix"]),
      verbose: values.verbose,
      logFile: values.logfile,
      strict: values.strict,
    },
  };
}

import path from "node:path";

import { ConfigurationError, formatRemotePath, ROOT_PATH } from "@name-sanitizer/core-domain";
import {
  ConsoleLogger,
  DEFAULT_CONFIG_FILE,
  GoogleAuth,
  SanitizeService,
  createFileStore,
  describeError,
  hasFailures,
  loadSanitizerConfig,
  resolveRunConfig,
  resolveStoreConfig,
  type LogLevel,
  type Logger,
  type SanitizerFileConfig,
} from "@name-sanitizer/core-application";

import { USAGE, parseCliArgs } from "./args";

export const EXIT_OK = 0;
export const EXIT_STARTUP_FAILURE = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export type CliDeps = {
  cwd: string;
  makeLogger: (opts: { level: LogLevel; logFile?: string }) => Logger;
};

const defaultDeps: CliDeps = {
  cwd: process.cwd(),
  makeLogger: (opts) => new ConsoleLogger(opts),
};

/**
 * Testa a conexão listando a raiz. No Drive, apaga o token salvo antes para
 * pedir consentimento de novo.
 */
async function initConnection(file: SanitizerFileConfig, baseDir: string, logger: Logger): Promise<void> {
  const storeConfig = resolveStoreConfig(file, baseDir);

  if (storeConfig.kind === "drive") {
    await new GoogleAuth({
      tokenDirAbs: storeConfig.tokenDir,
      credentialsPathAbs: storeConfig.credentialsPath,
    }).forgetTokens();
  }

  const store = await createFileStore(storeConfig, logger);
  await store.list(ROOT_PATH);
  logger.info("Connection successful! - You are ready to go.");
}

export async function runCli(argv: string[], deps: Partial<CliDeps> = {}): Promise<number> {
  const { cwd, makeLogger } = { ...defaultDeps, ...deps };
  // até a config estar resolvida, só o console
  let logger: Logger = makeLogger({ level: "info" });

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return EXIT_OK;
    }

    const configPath = path.resolve(cwd, args.configPath ?? DEFAULT_CONFIG_FILE);
    const file = await loadSanitizerConfig(configPath, { required: args.configPath !== undefined });
    const baseDir = path.dirname(configPath);

    if (args.init) {
      await initConnection(file, baseDir, logger);
      if (args.flags.directory === undefined) return EXIT_OK;
    }

    const logFile = args.flags.logFile === undefined ? undefined : path.resolve(cwd, args.flags.logFile);
    const config = resolveRunConfig(file, { ...args.flags, logFile }, baseDir);
    logger = makeLogger({ level: config.logLevel, logFile: config.logFile });

    const store = await createFileStore(config.store, logger);
    const summary = await new SanitizeService({ store, logger }).sanitizeOnce({
      directory: config.directory,
      rules: config.rules,
      options: config.rewriter,
    });

    if (config.strict && hasFailures(summary)) {
      logger.error(`Finished ${formatRemotePath(config.directory)} with failures`);
      return EXIT_PARTIAL_FAILURE;
    }
    return EXIT_OK;
  } catch (err) {
    logger.error(describeError(err));
    if (err instanceof ConfigurationError) logger.error("Run with --help for usage.");
    return EXIT_STARTUP_FAILURE;
  }
}

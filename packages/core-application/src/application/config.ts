import fs from "node:fs/promises";
import path from "node:path";

import {
  ConfigurationError,
  createSanitizationRules,
  parseRemotePath,
  type RemotePath,
  type SanitizationRules,
} from "@name-sanitizer/core-domain";

import type { LogLevel } from "../ports/logger";
import type { TreeRewriterOptions } from "../services/tree-rewriter";
import { getBoolean, getNumber, getString, isRecord } from "./guards";

export const DEFAULT_CONFIG_FILE = "name-sanitizer.config.json";
export const DEFAULT_SECRETS_DIR = path.join(".name-sanitizer", "secrets");

export type StoreKind = "webdav" | "drive" | "folder";

/** Variável de ambiente com a senha do WebDAV; tem prioridade sobre o arquivo. */
export const WEBDAV_PASSWORD_ENV = "NAME_SANITIZER_WEBDAV_PASSWORD";

/** Conteúdo do arquivo JSON; tudo opcional, flags da CLI têm prioridade. */
export type SanitizerFileConfig = {
  store?: StoreKind;
  folderRoot?: string;
  webdav?: {
    url?: string;
    username?: string;
    password?: string;
  };
  drive?: {
    credentialsPath?: string;
    tokenDir?: string;
    rootFolderId?: string;
  };
  replaceWith?: string;
  overwrite?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  logFile?: string;
  maxSuffixAttempts?: number;
};

export type RunFlags = {
  directory?: string;
  dryRun?: boolean;
  overwrite?: boolean;
  replaceWith?: string;
  verbose?: boolean;
  logFile?: string;
  maxSuffixAttempts?: number;
  strict?: boolean;
};

export type StoreConfig =
  | { kind: "webdav"; url: string; username?: string; password?: string }
  | { kind: "folder"; root: string }
  | { kind: "drive"; credentialsPath: string; tokenDir: string; rootFolderId: string };

export type RunConfig = {
  directory: RemotePath;
  store: StoreConfig;
  rules: SanitizationRules;
  rewriter: TreeRewriterOptions;
  logLevel: LogLevel;
  logFile?: string;
  strict: boolean;
};

function optional<T>(
  raw: Record<string, unknown>,
  key: string,
  read: (v: unknown) => T | undefined,
  expected: string,
  source: string
): T | undefined {
  const v = raw[key];
  if (v === undefined || v === null) return undefined;
  const out = read(v);
  if (out === undefined) {
    throw new ConfigurationError(`${source}: "${key}" must be ${expected}`);
  }
  return out;
}

function readStoreKind(v: unknown): StoreKind | undefined {
  return v === "webdav" || v === "drive" || v === "folder" ? v : undefined;
}

export function parseSanitizerConfig(raw: unknown, source: string): SanitizerFileConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${source}: expected a JSON object`);
  }

  const cfg: SanitizerFileConfig = {
    store: optional(raw, "store", readStoreKind, '"webdav", "drive" or "folder"', source),
    folderRoot: optional(raw, "folderRoot", getString, "a string", source),
    replaceWith: optional(raw, "replaceWith", getString, "a string", source),
    overwrite: optional(raw, "overwrite", getBoolean, "a boolean", source),
    dryRun: optional(raw, "dryRun", getBoolean, "a boolean", source),
    verbose: optional(raw, "verbose", getBoolean, "a boolean", source),
    logFile: optional(raw, "logFile", getString, "a string", source),
    maxSuffixAttempts: optional(raw, "maxSuffixAttempts", getNumber, "a number", source),
  };

  const webdav = raw["webdav"];
  if (webdav !== undefined && webdav !== null) {
    if (!isRecord(webdav)) throw new ConfigurationError(`${source}: "webdav" must be an object`);
    cfg.webdav = {
      url: optional(webdav, "url", getString, "a string", `${source} (webdav)`),
      username: optional(webdav, "username", getString, "a string", `${source} (webdav)`),
      password: optional(webdav, "password", getString, "a string", `${source} (webdav)`),
    };
  }

  const drive = raw["drive"];
  if (drive !== undefined && drive !== null) {
    if (!isRecord(drive)) throw new ConfigurationError(`${source}: "drive" must be an object`);
    cfg.drive = {
      credentialsPath: optional(drive, "credentialsPath", getString, "a string", `${source} (drive)`),
      tokenDir: optional(drive, "tokenDir", getString, "a string", `${source} (drive)`),
      rootFolderId: optional(drive, "rootFolderId", getString, "a string", `${source} (drive)`),
    };
  }

  return cfg;
}

/**
 * Lê o arquivo de configuração. Se ele não existir e não for obrigatório,
 * devolve uma config vazia (só defaults + flags).
 */
export async function loadSanitizerConfig(
  filePath: string,
  opts: { required?: boolean } = {}
): Promise<SanitizerFileConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (!opts.required) return {};
    throw new ConfigurationError(`Could not read config file ${filePath}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON`, err);
  }
  return parseSanitizerConfig(parsed, filePath);
}

export type Env = Record<string, string | undefined>;

export function resolveStoreConfig(file: SanitizerFileConfig, baseDir: string, env: Env = process.env): StoreConfig {
  const store = file.store ?? "webdav";

  if (store === "webdav") {
    const url = file.webdav?.url;
    if (!url) {
      throw new ConfigurationError('"webdav.url" is required when "store" is "webdav"');
    }
    return {
      kind: "webdav",
      url,
      username: file.webdav?.username,
      password: env[WEBDAV_PASSWORD_ENV] ?? file.webdav?.password,
    };
  }

  if (store === "folder") {
    if (!file.folderRoot) {
      throw new ConfigurationError('"folderRoot" is required when "store" is "folder"');
    }
    return { kind: "folder", root: path.resolve(baseDir, file.folderRoot) };
  }

  const secretsDir = path.resolve(baseDir, DEFAULT_SECRETS_DIR);
  return {
    kind: "drive",
    credentialsPath: path.resolve(baseDir, file.drive?.credentialsPath ?? path.join(secretsDir, "google.credentials.json")),
    tokenDir: path.resolve(baseDir, file.drive?.tokenDir ?? secretsDir),
    rootFolderId: file.drive?.rootFolderId ?? "root",
  };
}

export function resolveRunConfig(
  file: SanitizerFileConfig,
  flags: RunFlags,
  baseDir: string,
  env: Env = process.env
): RunConfig {
  const directory = flags.directory?.trim();
  if (!directory) {
    throw new ConfigurationError("A directory to sanitize is required (-d/--directory)");
  }

  const maxSuffixAttempts = flags.maxSuffixAttempts ?? file.maxSuffixAttempts ?? 1;
  if (!Number.isInteger(maxSuffixAttempts) || maxSuffixAttempts < 1) {
    throw new ConfigurationError(`maxSuffixAttempts must be a positive integer, got ${maxSuffixAttempts}`);
  }

  // flags são relativas ao cwd; o arquivo, ao diretório dele
  const logFile = flags.logFile
    ? path.resolve(flags.logFile)
    : file.logFile
      ? path.resolve(baseDir, file.logFile)
      : undefined;

  return {
    directory: parseRemotePath(directory),
    store: resolveStoreConfig(file, baseDir, env),
    rules: createSanitizationRules({ replacement: flags.replaceWith ?? file.replaceWith }),
    rewriter: {
      dryRun: flags.dryRun ?? file.dryRun ?? false,
      overwrite: flags.overwrite ?? file.overwrite ?? false,
      maxSuffixAttempts,
    },
    logLevel: (flags.verbose ?? file.verbose) ? "debug" : "info",
    logFile,
    strict: flags.strict ?? false,
  };
}

import { ConfigurationError } from "../errors";

// https://docs.microsoft.com/en-us/windows/win32/fileio/naming-a-file
export const WINDOWS_ILLEGAL_CHARACTERS = ["\\", "/", ":", "*", "?", '"', "<", ">", "|"] as const;

export const WINDOWS_RESERVED_NAMES = [
  "CON", "PRN", "AUX", "NUL",
  "COM1", "COM2", "COM3", "COM4", "COM5", "COM6", "COM7", "COM8", "COM9",
  "COM¹", "COM²", "COM³",
  "LPT1", "LPT2", "LPT3", "LPT4", "LPT5", "LPT6", "LPT7", "LPT8", "LPT9",
  "LPT¹", "LPT²", "LPT³",
] as const;

export const DEFAULT_REPLACEMENT = "_";
export const RESERVED_FALLBACK = "_reserved";

export interface SanitizationRules {
  readonly illegalCharacters: ReadonlySet<string>;
  readonly replacement: string;
  /** Em maiúsculas; a comparação é case-insensitive. */
  readonly reservedNames: ReadonlySet<string>;
  readonly reservedFallback: string;
}

export function createSanitizationRules(opts: { replacement?: string } = {}): SanitizationRules {
  const replacement = opts.replacement ?? DEFAULT_REPLACEMENT;
  const illegalCharacters = new Set<string>(WINDOWS_ILLEGAL_CHARACTERS);

  if ([...replacement].length !== 1) {
    throw new ConfigurationError(
      `Replacement must be exactly one character, got "${replacement}"`
    );
  }
  if (illegalCharacters.has(replacement)) {
    throw new ConfigurationError(`Replacement "${replacement}" is itself an illegal character`);
  }

  return Object.freeze({
    illegalCharacters,
    replacement,
    reservedNames: new Set<string>(WINDOWS_RESERVED_NAMES),
    reservedFallback: RESERVED_FALLBACK,
  });
}

export const DEFAULT_SANITIZATION_RULES: SanitizationRules = createSanitizationRules();

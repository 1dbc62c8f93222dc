import type { RemotePath } from "../value-objects/remote-path";
import { nameOf, withName } from "../value-objects/remote-path";
import type { SanitizationRules } from "../value-objects/sanitization-rules";

/**
 * Torna um nome compatível com Windows:
 * 1) troca caracteres inválidos pelo caractere de substituição
 * 2) nomes reservados (CON, LPT1, ...) viram o fallback
 *
 * Pontos e espaços no fim do nome não são removidos.
 */
export function sanitizeName(name: string, rules: SanitizationRules): string {
  let out = "";
  for (const ch of name) {
    out += rules.illegalCharacters.has(ch) ? rules.replacement : ch;
  }

  if (rules.reservedNames.has(out.toUpperCase())) {
    return rules.reservedFallback;
  }
  return out;
}

/**
 * Só o último segmento muda; os ancestrais já foram tratados quando visitados.
 */
export function sanitizePath(p: RemotePath, rules: SanitizationRules): RemotePath {
  const name = nameOf(p);
  const next = sanitizeName(name, rules);
  return next === name ? p : withName(p, next);
}

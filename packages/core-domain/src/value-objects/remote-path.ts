/**
 * Caminho no store remoto, sempre sem escape de transporte.
 * Segmentos podem conter qualquer caractere (inclusive "/" ou "\"),
 * por isso o caminho é uma lista e não uma string.
 */
export type RemotePath = readonly string[];

export const ROOT_PATH: RemotePath = Object.freeze([]);

export function parseRemotePath(raw: string): RemotePath {
  return raw
    .trim()
    .split("/")
    .filter((s) => s.length > 0);
}

export function formatRemotePath(p: RemotePath): string {
  return "/" + p.join("/");
}

export function childPath(parent: RemotePath, name: string): RemotePath {
  return [...parent, name];
}

export function nameOf(p: RemotePath): string {
  const last = p[p.length - 1];
  if (last === undefined) {
    throw new RangeError("The store root has no name");
  }
  return last;
}

export function parentOf(p: RemotePath): RemotePath {
  if (p.length === 0) {
    throw new RangeError("The store root has no parent");
  }
  return p.slice(0, -1);
}

export function withName(p: RemotePath, name: string): RemotePath {
  return [...parentOf(p), name];
}

export function samePath(a: RemotePath, b: RemotePath): boolean {
  return a.length === b.length && a.every((s, i) => s === b[i]);
}

export function isWithin(p: RemotePath, ancestor: RemotePath): boolean {
  return p.length >= ancestor.length && ancestor.every((s, i) => s === p[i]);
}

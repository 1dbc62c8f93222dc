import type { RemotePath } from "../value-objects/remote-path";

export type EntryKind = "file" | "directory";

export interface Entry {
  path: RemotePath;
  kind: EntryKind;
}

/** Um item de listagem: só o nome, o caminho vem do diretório listado. */
export interface RemoteListing {
  name: string;
  kind: EntryKind;
}

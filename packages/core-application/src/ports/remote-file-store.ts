import type { RemoteListing, RemotePath } from "@name-sanitizer/core-domain";
import type { TransportError } from "../application/errors";

/**
 * Resultado de um move. Colisão não é exceção: o chamador decide o que fazer.
 */
export type MoveOutcome =
  | { type: "moved" }
  | { type: "collision"; at: RemotePath }
  | { type: "failed"; error: TransportError };

/**
 * Store remoto visto pelo core. Caminhos chegam sempre sem escape;
 * cada adapter escapa o que o seu transporte exige.
 */
export interface RemoteFileStore {
  /** Filhos diretos, refletindo o estado atual do servidor. Lança TransportError. */
  list(path: RemotePath): Promise<RemoteListing[]>;

  /** Renomeia/move; um diretório leva a subárvore inteira junto. */
  move(source: RemotePath, destination: RemotePath): Promise<MoveOutcome>;

  /** Remove uma entrada. Lança TransportError. */
  delete(path: RemotePath): Promise<void>;

  exists(path: RemotePath): Promise<boolean>;
}

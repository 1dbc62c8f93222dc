import { createClient } from "webdav";
import { formatRemotePath, type RemoteListing, type RemotePath } from "@name-sanitizer/core-domain";

import type { MoveOutcome, RemoteFileStore } from "../ports/remote-file-store";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { TransportError, describeError } from "../application/errors";
import { withRetry } from "../application/with-retry";
import { defaultNetworkRetryPolicy } from "../application/default-network-retry-policy";
import { sleep as realSleep } from "../infra/sleep";
import { httpTransportError, statusOf } from "./http-errors";

/**
 * Tipagem mínima do que usamos do WebDAVClient (o client real satisfaz isso
 * estruturalmente, e os testes podem passar um fake).
 */
export type DavStat = {
  basename: string;
  type: "file" | "directory";
};

export interface DavClient {
  getDirectoryContents(path: string): Promise<DavStat[] | { data: DavStat[] }>;
  moveFile(from: string, to: string, options?: { headers?: Record<string, string> }): Promise<void>;
  deleteFile(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

export type WebdavConnection = {
  /** URL da raiz, ex.: https://cloud.example.com/remote.php/dav/files/alice/ */
  url: string;
  username?: string;
  password?: string;
};

export type WebdavFileStoreOptions = {
  retryPolicy?: RetryPolicy;
  sleep?: Sleeper;
  logger?: Logger;
};

/** MOVE com `Overwrite: F` recusado porque o destino já existe (412). */
export class DestinationExistsError extends TransportError {}

export function toDavTransportError(err: unknown): TransportError {
  if (!(err instanceof TransportError) && statusOf(err) === 412) {
    return new DestinationExistsError(err instanceof Error ? err.message : String(err), err);
  }
  return httpTransportError(err, "WebDAV");
}

/**
 * Os caminhos vão para o client sem escape: ele aplica o percent-encoding de
 * cada segmento ao montar a URL (e decodifica os nomes das listagens).
 * Escapar aqui também codificaria duas vezes nomes com "%".
 */
export function toDavPath(p: RemotePath): string {
  return formatRemotePath(p);
}

/**
 * Store sobre WebDAV (Nextcloud e afins). Cada listagem é um PROPFIND de um
 * nível; renomear é MOVE, que leva a subárvore inteira junto.
 */
export class WebdavFileStore implements RemoteFileStore {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper;
  private readonly logger?: Logger;

  constructor(private readonly client: DavClient, opts: WebdavFileStoreOptions = {}) {
    this.retryPolicy = opts.retryPolicy ?? defaultNetworkRetryPolicy();
    this.sleep = opts.sleep ?? realSleep;
    this.logger = opts.logger;
  }

  private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          throw toDavTransportError(err);
        }
      },
      this.retryPolicy,
      this.sleep,
      (ctx) =>
        this.logger?.warn(
          `WebDAV ${label} failed (attempt ${ctx.attempt}), retrying in ${ctx.nextDelayMs}ms: ${describeError(ctx.lastError)}`
        )
    );
  }

  async list(p: RemotePath): Promise<RemoteListing[]> {
    const res = await this.call("list", () => this.client.getDirectoryContents(toDavPath(p)));
    const stats = Array.isArray(res) ? res : res.data;
    return stats.map((s): RemoteListing => ({
      name: s.basename,
      kind: s.type === "directory" ? "directory" : "file",
    }));
  }

  async move(source: RemotePath, destination: RemotePath): Promise<MoveOutcome> {
    try {
      // sem Overwrite: F o servidor substituiria o destino em silêncio
      await this.call("move", () =>
        this.client.moveFile(toDavPath(source), toDavPath(destination), { headers: { Overwrite: "F" } })
      );
      return { type: "moved" };
    } catch (err) {
      if (err instanceof DestinationExistsError) return { type: "collision", at: destination };
      return { type: "failed", error: toDavTransportError(err) };
    }
  }

  async delete(p: RemotePath): Promise<void> {
    await this.call("delete", () => this.client.deleteFile(toDavPath(p)));
  }

  async exists(p: RemotePath): Promise<boolean> {
    return this.call("exists", () => this.client.exists(toDavPath(p)));
  }
}

export function createWebdavFileStore(
  connection: WebdavConnection,
  opts: WebdavFileStoreOptions = {}
): WebdavFileStore {
  const client = createClient(connection.url, {
    username: connection.username,
    password: connection.password,
  });
  return new WebdavFileStore(client, opts);
}

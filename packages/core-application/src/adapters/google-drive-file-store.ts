import type { OAuth2Client } from "google-auth-library";
import {
  formatRemotePath,
  nameOf,
  parentOf,
  samePath,
  type RemoteListing,
  type RemotePath,
} from "@name-sanitizer/core-domain";

import type { MoveOutcome, RemoteFileStore } from "../ports/remote-file-store";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import { RemoteNotFoundError, RemoteRateLimitedError, TransportError, describeError } from "../application/errors";
import { withRetry } from "../application/with-retry";
import { defaultNetworkRetryPolicy } from "../application/default-network-retry-policy";
import { sleep as realSleep } from "../infra/sleep";
import { createDriveClient, DRIVE_FOLDER_MIME } from "./google-drive-client";
import { httpTransportError, retryAfterOf, statusOf } from "./http-errors";

/**
 * Tipagem mínima do que usamos de drive_v3.Drive (o client real satisfaz isso
 * estruturalmente, e os testes podem passar um fake).
 */
export type DriveFileResource = {
  id?: string | null;
  name?: string | null;
  mimeType?: string | null;
};

export interface DriveFilesApi {
  list(params: {
    q: string;
    pageSize?: number;
    pageToken?: string;
    fields?: string;
    spaces?: string;
  }): Promise<{ data: { files?: DriveFileResource[]; nextPageToken?: string | null } }>;
  update(params: {
    fileId: string;
    requestBody: { name: string };
    addParents?: string;
    removeParents?: string;
    fields?: string;
  }): Promise<unknown>;
  delete(params: { fileId: string }): Promise<unknown>;
}

export interface DriveApi {
  files: DriveFilesApi;
}

export type GoogleDriveFileStoreOptions = {
  /** Pasta que corresponde ao caminho "/". Default: "root" (Meu Drive). */
  rootFolderId?: string;
  retryPolicy?: RetryPolicy;
  sleep?: Sleeper;
  logger?: Logger;
};

/**
 * Valores literais em queries do Drive usam aspas simples;
 * barra invertida e aspas precisam de escape.
 */
export function escapeQueryValue(v: string): string {
  return v.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** Traduz erros do Gaxios para a taxonomia de transporte. */
export function toTransportError(err: unknown): TransportError {
  // o Drive sinaliza cota estourada com 403
  if (!(err instanceof TransportError) && statusOf(err) === 403) {
    const message = err instanceof Error ? err.message : String(err);
    if (/rate ?limit/i.test(message)) return new RemoteRateLimitedError(message, retryAfterOf(err), err);
  }
  return httpTransportError(err, "Drive");
}

/**
 * Store sobre o Google Drive. O Drive endereça por id, então cada caminho é
 * resolvido nome a nome a partir da pasta raiz, sempre contra o estado atual
 * do servidor (sem cache).
 */
export class GoogleDriveFileStore implements RemoteFileStore {
  private readonly rootFolderId: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper;
  private readonly logger?: Logger;

  constructor(private readonly drive: DriveApi, opts: GoogleDriveFileStoreOptions = {}) {
    this.rootFolderId = opts.rootFolderId ?? "root";
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
          throw toTransportError(err);
        }
      },
      this.retryPolicy,
      this.sleep,
      (ctx) =>
        this.logger?.warn(
          `Drive ${label} failed (attempt ${ctx.attempt}), retrying in ${ctx.nextDelayMs}ms: ${describeError(ctx.lastError)}`
        )
    );
  }

  /**
   * Procura `name` dentro de `parentId`. O Drive aceita irmãos com o mesmo nome;
   * nesse caso vale o primeiro e o resto fica de fora da travessia (avisado).
   */
  private async findChild(parentId: string, name: string, at: RemotePath): Promise<DriveFileResource | null> {
    const res = await this.call("lookup", () =>
      this.drive.files.list({
        q: [`'${escapeQueryValue(parentId)}' in parents`, `name = '${escapeQueryValue(name)}'`, "trashed = false"].join(" and "),
        pageSize: 2,
        fields: "files(id,name,mimeType)",
        spaces: "drive",
      })
    );
    const files = res.data.files ?? [];
    if (files.length > 1) {
      this.logger?.warn(`Duplicate name on Drive: ${formatRemotePath(at)} matches more than one entry, using the first`);
    }
    return files[0] ?? null;
  }

  private async resolveId(p: RemotePath): Promise<string> {
    let id = this.rootFolderId;
    for (let i = 0; i < p.length; i++) {
      const segment = p[i] ?? "";
      const found = await this.findChild(id, segment, p.slice(0, i + 1));
      if (!found?.id) {
        throw new RemoteNotFoundError(`${formatRemotePath(p.slice(0, i + 1))} not found on Drive`);
      }
      id = found.id;
    }
    return id;
  }

  async list(p: RemotePath): Promise<RemoteListing[]> {
    const folderId = await this.resolveId(p);
    const out: RemoteListing[] = [];
    let pageToken: string | undefined;

    do {
      const res = await this.call("list", () =>
        this.drive.files.list({
          q: `'${escapeQueryValue(folderId)}' in parents and trashed = false`,
          pageSize: 1000,
          pageToken,
          fields: "nextPageToken, files(id,name,mimeType)",
          spaces: "drive",
        })
      );

      for (const f of res.data.files ?? []) {
        if (!f.name) continue;
        out.push({ name: f.name, kind: f.mimeType === DRIVE_FOLDER_MIME ? "directory" : "file" });
      }
      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken);

    return out;
  }

  async move(source: RemotePath, destination: RemotePath): Promise<MoveOutcome> {
    try {
      const fileId = await this.resolveId(source);
      const fromParent = await this.resolveId(parentOf(source));
      const toParent = samePath(parentOf(source), parentOf(destination))
        ? fromParent
        : await this.resolveId(parentOf(destination));

      const name = nameOf(destination);
      if (await this.findChild(toParent, name, destination)) {
        return { type: "collision", at: destination };
      }

      // pastas levam os filhos junto: no Drive o vínculo é por parent id
      await this.call("update", () =>
        this.drive.files.update({
          fileId,
          requestBody: { name },
          ...(toParent !== fromParent ? { addParents: toParent, removeParents: fromParent } : {}),
          fields: "id",
        })
      );
      return { type: "moved" };
    } catch (err) {
      return { type: "failed", error: toTransportError(err) };
    }
  }

  async delete(p: RemotePath): Promise<void> {
    const fileId = await this.resolveId(p);
    await this.call("delete", () => this.drive.files.delete({ fileId }));
  }

  async exists(p: RemotePath): Promise<boolean> {
    try {
      await this.resolveId(p);
      return true;
    } catch (err) {
      if (err instanceof RemoteNotFoundError) return false;
      throw err;
    }
  }
}

export function createGoogleDriveFileStore(
  auth: OAuth2Client,
  opts: GoogleDriveFileStoreOptions = {}
): GoogleDriveFileStore {
  return new GoogleDriveFileStore(createDriveClient(auth), opts);
}

import fs from "node:fs/promises";
import path from "node:path";

import {
  formatRemotePath,
  type RemoteListing,
  type RemotePath,
} from "@name-sanitizer/core-domain";

import type { MoveOutcome, RemoteFileStore } from "../ports/remote-file-store";
import { RemoteNotFoundError, TransportError } from "../application/errors";

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function toTransportError(action: string, p: RemotePath, err: unknown): TransportError {
  const msg = `Could not ${action} ${formatRemotePath(p)}`;
  const code = errorCode(err);
  if (code === "ENOENT" || code === "ENOTDIR") return new RemoteNotFoundError(`${msg}: not found`, err);
  return new TransportError(code ? `${msg}: ${code}` : msg, err);
}

async function exists(p: string) {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Store montado no sistema de arquivos local (ex.: compartilhamento WebDAV
 * via davfs). Links simbólicos aparecem como arquivos e não são seguidos.
 */
export class MountedFolderFileStore implements RemoteFileStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  private abs(p: RemotePath): string {
    return path.join(this.rootDir, ...p);
  }

  async list(p: RemotePath): Promise<RemoteListing[]> {
    try {
      const entries = await fs.readdir(this.abs(p), { withFileTypes: true });
      return entries.map((e): RemoteListing => ({ name: e.name, kind: e.isDirectory() ? "directory" : "file" }));
    } catch (err) {
      throw toTransportError("list", p, err);
    }
  }

  async move(source: RemotePath, destination: RemotePath): Promise<MoveOutcome> {
    const to = this.abs(destination);
    // rename do POSIX substitui arquivos em silêncio; checa antes
    if (await exists(to)) return { type: "collision", at: destination };

    try {
      await fs.rename(this.abs(source), to);
      return { type: "moved" };
    } catch (err) {
      const code = errorCode(err);
      if (code === "EEXIST" || code === "ENOTEMPTY") return { type: "collision", at: destination };
      return { type: "failed", error: toTransportError("move", source, err) };
    }
  }

  async delete(p: RemotePath): Promise<void> {
    try {
      await fs.rm(this.abs(p), { recursive: true });
    } catch (err) {
      throw toTransportError("delete", p, err);
    }
  }

  async exists(p: RemotePath): Promise<boolean> {
    return exists(this.abs(p));
  }
}

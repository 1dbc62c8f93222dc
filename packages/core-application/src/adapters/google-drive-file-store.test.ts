import { describe, it, expect } from "vitest";

import {
  GoogleDriveFileStore,
  escapeQueryValue,
  toTransportError,
  type DriveApi,
  type DriveFileResource,
} from "./google-drive-file-store";
import { DRIVE_FOLDER_MIME } from "./google-drive-client";
import {
  NetworkError,
  RemoteNotFoundError,
  RemoteRateLimitedError,
  RemoteServerError,
  TransportError,
} from "../application/errors";
import { defaultNetworkRetryPolicy } from "../application/default-network-retry-policy";
import { RecordingLogger } from "../testing/recording-logger";

type FakeFile = { id: string; name: string; mimeType: string; parent: string };

function unescapeQueryValue(v: string): string {
  return v.replace(/\\(.)/g, "$1");
}

/**
 * Drive fake: entende só as queries que o store monta
 * ("'<id>' in parents [and name = '<nome>'] and trashed = false").
 */
class FakeDrive implements DriveApi {
  readonly updates: Array<{ fileId: string; name: string; addParents?: string; removeParents?: string }> = [];
  readonly deleted: string[] = [];
  failuresBeforeSuccess = 0;
  pageSize = 1000;
  private seq = 0;

  constructor(readonly items: FakeFile[] = []) {}

  folder(name: string, parent = "root"): string {
    const id = `id${++this.seq}`;
    this.items.push({ id, name, mimeType: DRIVE_FOLDER_MIME, parent });
    return id;
  }

  file(name: string, parent = "root"): string {
    const id = `id${++this.seq}`;
    this.items.push({ id, name, mimeType: "text/plain", parent });
    return id;
  }

  files = {
    list: async (params: { q: string; pageSize?: number; pageToken?: string }) => {
      if (this.failuresBeforeSuccess > 0) {
        this.failuresBeforeSuccess--;
        throw Object.assign(new Error("Backend Error"), { response: { status: 503 } });
      }
      const parent = /^'((?:\\.|[^'\\])*)' in parents/.exec(params.q)?.[1];
      const name = / and name = '((?:\\.|[^'\\])*)'/.exec(params.q)?.[1];
      const matches: DriveFileResource[] = this.items
        .filter((f) => parent !== undefined && f.parent === unescapeQueryValue(parent))
        .filter((f) => name === undefined || f.name === unescapeQueryValue(name))
        .map((f) => ({ id: f.id, name: f.name, mimeType: f.mimeType }));

      const size = Math.min(params.pageSize ?? 100, this.pageSize);
      const start = params.pageToken ? Number(params.pageToken) : 0;
      const page = matches.slice(start, start + size);
      const next = start + size < matches.length ? String(start + size) : null;
      return { data: { files: page, nextPageToken: next } };
    },
    update: async (params: { fileId: string; requestBody: { name: string }; addParents?: string; removeParents?: string }) => {
      this.updates.push({
        fileId: params.fileId,
        name: params.requestBody.name,
        addParents: params.addParents,
        removeParents: params.removeParents,
      });
      const f = this.items.find((i) => i.id === params.fileId);
      if (!f) throw Object.assign(new Error("File not found"), { response: { status: 404 } });
      f.name = params.requestBody.name;
      if (params.addParents) f.parent = params.addParents;
      return {};
    },
    delete: async (params: { fileId: string }) => {
      this.deleted.push(params.fileId);
      const idx = this.items.findIndex((i) => i.id === params.fileId);
      if (idx >= 0) this.items.splice(idx, 1);
      return {};
    },
  };
}

const noSleep = async () => {};

function storeFor(drive: FakeDrive, logger?: RecordingLogger) {
  return new GoogleDriveFileStore(drive, {
    sleep: noSleep,
    retryPolicy: defaultNetworkRetryPolicy({ jitterRatio: 0 }),
    logger,
  });
}

describe("GoogleDriveFileStore", () => {
  it("lists a folder resolved by path, across pages", async () => {
    const drive = new FakeDrive();
    const photos = drive.folder("Photos");
    drive.file("a*.jpg", photos);
    drive.folder("2024?", photos);
    drive.file("b.jpg", photos);
    drive.pageSize = 2;

    const listing = await storeFor(drive).list(["Photos"]);
    expect(listing).toEqual([
      { name: "a*.jpg", kind: "file" },
      { name: "2024?", kind: "directory" },
      { name: "b.jpg", kind: "file" },
    ]);
  });

  it("resolves names containing quotes and backslashes", async () => {
    const drive = new FakeDrive();
    const odd = drive.folder("it's a\\b");
    drive.file("inner", odd);

    expect(await storeFor(drive).list(["it's a\\b"])).toEqual([{ name: "inner", kind: "file" }]);
  });

  it("renames in place without touching parents", async () => {
    const drive = new FakeDrive();
    const docs = drive.folder("docs");
    const id = drive.file("a:b", docs);

    expect(await storeFor(drive).move(["docs", "a:b"], ["docs", "a_b"])).toEqual({ type: "moved" });
    expect(drive.updates).toEqual([{ fileId: id, name: "a_b", addParents: undefined, removeParents: undefined }]);
  });

  it("reparents when the destination folder differs", async () => {
    const drive = new FakeDrive();
    const from = drive.folder("from");
    const to = drive.folder("to");
    const id = drive.file("x", from);

    expect(await storeFor(drive).move(["from", "x"], ["to", "x"])).toEqual({ type: "moved" });
    expect(drive.updates).toEqual([{ fileId: id, name: "x", addParents: to, removeParents: from }]);
  });

  it("reports a collision without updating", async () => {
    const drive = new FakeDrive();
    drive.file("y");
    drive.file("y*");

    expect(await storeFor(drive).move(["y*"], ["y"])).toEqual({ type: "collision", at: ["y"] });
    expect(drive.updates).toEqual([]);
  });

  it("fails the move of a missing entry with a not-found error", async () => {
    const outcome = await storeFor(new FakeDrive()).move(["ghost"], ["ghost_"]);
    expect(outcome.type).toBe("failed");
    if (outcome.type === "failed") expect(outcome.error).toBeInstanceOf(RemoteNotFoundError);
  });

  it("deletes by resolved id", async () => {
    const drive = new FakeDrive();
    const id = drive.file("y");
    const store = storeFor(drive);

    await store.delete(["y"]);
    expect(drive.deleted).toEqual([id]);
    expect(await store.exists(["y"])).toBe(false);
  });

  it("warns when a name matches several siblings and uses the first", async () => {
    const drive = new FakeDrive();
    const first = drive.folder("dup");
    const second = drive.folder("dup");
    drive.file("one", first);
    drive.file("two", second);
    const logger = new RecordingLogger();

    expect(await storeFor(drive, logger).list(["dup"])).toEqual([{ name: "one", kind: "file" }]);
    expect(logger.messages("warn")).toEqual([
      "Duplicate name on Drive: /dup matches more than one entry, using the first",
    ]);
  });

  it("retries server errors and logs each retry", async () => {
    const drive = new FakeDrive();
    drive.file("a");
    drive.failuresBeforeSuccess = 2;
    const logger = new RecordingLogger();

    expect(await storeFor(drive, logger).list([])).toEqual([{ name: "a", kind: "file" }]);
    expect(logger.messages("warn")).toEqual([
      "Drive list failed (attempt 1), retrying in 500ms: RemoteServerError: Backend Error",
      "Drive list failed (attempt 2), retrying in 1000ms: RemoteServerError: Backend Error",
    ]);
  });
});

describe("escapeQueryValue", () => {
  it("escapes backslashes before quotes", () => {
    expect(escapeQueryValue("a\\'b")).toBe("a\\\\\\'b");
  });
});

describe("toTransportError", () => {
  const gaxios = (status: number | undefined, message = "boom", headers: Record<string, string> = {}) =>
    Object.assign(new Error(message), status === undefined ? { code: "ECONNRESET" } : { response: { status, headers } });

  it("maps status codes to the transport taxonomy", () => {
    expect(toTransportError(gaxios(undefined))).toBeInstanceOf(NetworkError);
    expect(toTransportError(gaxios(404))).toBeInstanceOf(RemoteNotFoundError);
    expect(toTransportError(gaxios(502))).toBeInstanceOf(RemoteServerError);
    expect(toTransportError(gaxios(403, "User rate limit exceeded"))).toBeInstanceOf(RemoteRateLimitedError);

    const forbidden = toTransportError(gaxios(403, "Insufficient permissions"));
    expect(forbidden.constructor).toBe(TransportError);
    expect(forbidden.message).toBe("Drive request failed (403): Insufficient permissions");
  });

  it("reads retry-after on rate limits", () => {
    const err = toTransportError(gaxios(429, "Too many requests", { "retry-after": "7" }));
    expect(err).toBeInstanceOf(RemoteRateLimitedError);
    if (err instanceof RemoteRateLimitedError) expect(err.retryAfterSeconds).toBe(7);
  });
});

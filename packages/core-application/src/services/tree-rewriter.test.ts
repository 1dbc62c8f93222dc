import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi } from "vitest";
import { DEFAULT_SANITIZATION_RULES } from "@name-sanitizer/core-domain";

import { TreeRewriter, type TreeRewriterOptions } from "./tree-rewriter";
import { InMemoryFileStore } from "../testing/in-memory-file-store";
import { RecordingLogger } from "../testing/recording-logger";
import { ConsoleLogger } from "../adapters/console-logger";

function setup(store: InMemoryFileStore, options: Partial<TreeRewriterOptions> = {}) {
  const logger = new RecordingLogger();
  const rewriter = new TreeRewriter({ store, rules: DEFAULT_SANITIZATION_RULES, logger, options });
  return { rewriter, logger };
}

describe("TreeRewriter.processItem", () => {
  it("returns clean paths untouched and logs at debug", async () => {
    const store = new InMemoryFileStore().addFile("x");
    const { rewriter, logger } = setup(store);

    expect(await rewriter.processItem(["x"])).toEqual(["x"]);
    expect(store.mutations()).toEqual([]);
    expect(logger.messages("debug")).toEqual(["Skipped: /x"]);
  });

  it("renames and returns the new path", async () => {
    const store = new InMemoryFileStore().addFile("who?.txt");
    const { rewriter, logger } = setup(store);

    expect(await rewriter.processItem(["who?.txt"])).toEqual(["who_.txt"]);
    expect(store.paths()).toEqual(["/who_.txt"]);
    expect(logger.messages("info")).toEqual(["Renamed: '/who?.txt' to '/who_.txt'"]);
  });

  it("resolves a collision with the _1 suffix and leaves the existing entry alone", async () => {
    const store = new InMemoryFileStore().addFile("x").addFile("y_").addFile("y*");
    const { rewriter, logger } = setup(store);

    expect(await rewriter.processItem(["y*"])).toEqual(["y__1"]);
    expect(store.paths()).toEqual(["/x", "/y_", "/y__1"]);
    expect(store.mutations()).toEqual([
      { op: "move", path: "/y*", destination: "/y_" },
      { op: "move", path: "/y*", destination: "/y__1" },
    ]);
    expect(logger.messages("warn")).toEqual(["Conflict: '/y_' already exists. Appending '_1' to the name"]);
    expect(rewriter.getSummary().conflictsResolved).toBe(1);
  });

  it("retries once by default and gives up when _1 is taken too", async () => {
    const store = new InMemoryFileStore().addFile("y_").addFile("y__1").addFile("y*");
    const { rewriter, logger } = setup(store);

    expect(await rewriter.processItem(["y*"])).toEqual(["y*"]);
    expect(store.paths()).toEqual(["/y_", "/y__1", "/y*"]);
    expect(logger.messages("error")).toEqual([
      "Could not rename '/y*': every suffix up to 'y__1' already exists",
    ]);
    expect(rewriter.getSummary().failed).toBe(1);
  });

  it("keeps counting suffixes when maxSuffixAttempts allows it", async () => {
    const store = new InMemoryFileStore().addFile("y_").addFile("y__1").addFile("y*");
    const { rewriter, logger } = setup(store, { maxSuffixAttempts: 3 });

    expect(await rewriter.processItem(["y*"])).toEqual(["y__2"]);
    expect(store.paths()).toEqual(["/y_", "/y__1", "/y__2"]);
    expect(logger.messages("warn")).toEqual([
      "Conflict: '/y_' already exists. Appending '_1' to the name",
      "Conflict: '/y__1' already exists. Appending '_2' to the name",
    ]);
  });

  it("deletes the existing entry and retries when overwrite is enabled", async () => {
    const store = new InMemoryFileStore().addFile("y_").addDirectory("y*").addFile("y*/inner");
    const { rewriter, logger } = setup(store, { overwrite: true });

    expect(await rewriter.processItem(["y*"])).toEqual(["y_"]);
    expect(store.mutations()).toEqual([
      { op: "move", path: "/y*", destination: "/y_" },
      { op: "delete", path: "/y_" },
      { op: "move", path: "/y*", destination: "/y_" },
    ]);
    expect(store.paths()).toEqual(["/y_", "/y_/inner"]);
    expect(await store.list(["y_"])).toEqual([{ name: "inner", kind: "file" }]);
    expect(logger.messages("warn")).toEqual(["Conflict: Overwriting '/y_'"]);
    expect(rewriter.getSummary().overwritten).toBe(1);
  });

  it("abandons the rename when the overwrite delete fails", async () => {
    const store = new InMemoryFileStore().addFile("y_").addFile("y*").failDelete("y_");
    const { rewriter, logger } = setup(store, { overwrite: true });

    expect(await rewriter.processItem(["y*"])).toEqual(["y*"]);
    expect(store.paths()).toEqual(["/y_", "/y*"]);
    expect(logger.messages("error")).toEqual([
      "Could not rename '/y*': could not delete '/y_': NetworkError: connection reset while deleting /y_",
    ]);
  });

  it("returns the original path when the move fails", async () => {
    const store = new InMemoryFileStore().addFile("a:b").failMove("a:b");
    const { rewriter, logger } = setup(store);

    expect(await rewriter.processItem(["a:b"])).toEqual(["a:b"]);
    expect(logger.messages("error")).toEqual([
      "Could not rename '/a:b': NetworkError: connection reset while moving /a:b",
    ]);
  });

  it("issues no mutation in dry-run mode but returns the planned path", async () => {
    const store = new InMemoryFileStore().addFile("y_").addFile("y*");
    const { rewriter, logger } = setup(store, { dryRun: true, overwrite: true });

    expect(await rewriter.processItem(["y*"])).toEqual(["y_"]);
    expect(store.calls).toEqual([]);
    expect(logger.messages("info")).toEqual(["Would rename: '/y*' to '/y_'"]);
  });
});

describe("TreeRewriter.processRecursive", () => {
  it("addresses children through the renamed parent", async () => {
    const store = new InMemoryFileStore().addDirectory("A:").addFile("A:/b*d");
    const { rewriter } = setup(store);

    await rewriter.processRecursive([]);

    expect(store.calls).toEqual([
      { op: "list", path: "/" },
      { op: "move", path: "/A:", destination: "/A_" },
      { op: "list", path: "/A_" },
      { op: "move", path: "/A_/b*d", destination: "/A_/b_d" },
    ]);
    expect(store.paths()).toEqual(["/A_", "/A_/b_d"]);
  });

  it("descends into directories renamed to the reserved fallback", async () => {
    const store = new InMemoryFileStore().addDirectory("CON").addFile("CON/a:b");
    const { rewriter } = setup(store);

    await rewriter.processRecursive([]);

    expect(store.paths()).toEqual(["/_reserved", "/_reserved/a_b"]);
  });

  it("descends into a suffixed directory after a collision", async () => {
    const store = new InMemoryFileStore()
      .addDirectory("docs_")
      .addDirectory("docs?")
      .addFile("docs?/n|1.md");
    const { rewriter } = setup(store);

    await rewriter.processRecursive([]);

    expect(store.paths()).toEqual(["/docs_", "/docs__1", "/docs__1/n_1.md"]);
  });

  it("keeps traversing through the original path when a directory rename fails", async () => {
    const store = new InMemoryFileStore().addDirectory("d*").addFile("d*/e?").failMove("d*");
    const { rewriter } = setup(store);

    await rewriter.processRecursive([]);

    expect(store.paths()).toEqual(["/d*", "/d*/e_"]);
  });

  it("plans nested renames in dry-run mode without touching the store", async () => {
    const store = new InMemoryFileStore()
      .addDirectory("A:")
      .addFile("A:/b*d")
      .addDirectory("A:/c?")
      .addFile("A:/c?/e|f");
    const { rewriter, logger } = setup(store, { dryRun: true });

    await rewriter.processRecursive([]);

    expect(store.mutations()).toEqual([]);
    expect(store.calls).toEqual([
      { op: "list", path: "/" },
      { op: "list", path: "/A:" },
      { op: "list", path: "/A:/c?" },
    ]);
    expect(logger.messages("info")).toEqual([
      "Would rename: '/A:' to '/A_'",
      "Would rename: '/A_/b*d' to '/A_/b_d'",
      "Would rename: '/A_/c?' to '/A_/c_'",
      "Would rename: '/A_/c_/e|f' to '/A_/c_/e_f'",
    ]);
  });

  it("isolates a listing failure to its own subtree", async () => {
    const store = new InMemoryFileStore()
      .addDirectory("bad")
      .addFile("bad/x*")
      .addDirectory("good")
      .addFile("good/y?")
      .failListing("bad");
    const { rewriter, logger } = setup(store);

    await rewriter.processRecursive([]);

    expect(store.paths()).toEqual(["/bad", "/bad/x*", "/good", "/good/y_"]);
    expect(logger.messages("error")).toEqual([
      "Could not list '/bad': NetworkError: connection reset while listing /bad",
    ]);
  });
});

describe("TreeRewriter.run", () => {
  it("reports a summary of the run", async () => {
    const store = new InMemoryFileStore()
      .addFile("ok.txt")
      .addFile("y_")
      .addFile("y*")
      .addDirectory("bad")
      .failListing("bad");
    const { rewriter, logger } = setup(store);

    const summary = await rewriter.run([]);

    expect(summary).toEqual({
      visited: 4,
      skipped: 3,
      renamed: 1,
      planned: 0,
      conflictsResolved: 1,
      overwritten: 0,
      failed: 0,
      listingFailures: 1,
    });
    const info = logger.messages("info");
    expect(info[0]).toBe("Starting to sanitize filenames in /");
    expect(info[info.length - 1]).toBe(
      "Finished /: visited=4 skipped=3 renamed=1 planned=0 conflictsResolved=1 overwritten=0 failed=0 listingFailures=1"
    );
  });

  it("finishes the whole tree when the log file cannot be written", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tree-rewriter-log-"));

    try {
      const store = new InMemoryFileStore().addFile("a:").addFile("b*");
      const rewriter = new TreeRewriter({
        store,
        rules: DEFAULT_SANITIZATION_RULES,
        logger: new ConsoleLogger({ logFile: dir }),
      });

      expect((await rewriter.run([])).renamed).toBe(2);
      expect(store.paths()).toEqual(["/a_", "/b_"]);
    } finally {
      vi.restoreAllMocks();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("rejects a non-positive suffix bound", () => {
    expect(() => setup(new InMemoryFileStore(), { maxSuffixAttempts: 0 })).toThrow(RangeError);
  });
});

import {
  childPath,
  formatRemotePath,
  nameOf,
  sanitizePath,
  samePath,
  withName,
  type RemoteListing,
  type RemotePath,
  type SanitizationRules,
} from "@name-sanitizer/core-domain";

import type { Logger } from "../ports/logger";
import type { MoveOutcome, RemoteFileStore } from "../ports/remote-file-store";
import { describeError } from "../application/errors";

export type TreeRewriterOptions = {
  /** Só loga o que seria feito; nenhum move/delete é emitido. */
  dryRun: boolean;
  /** Em colisão, apaga o destino e tenta de novo. Destrutivo. */
  overwrite: boolean;
  /** Quantos sufixos (_1, _2, ...) tentar em colisão sem overwrite. */
  maxSuffixAttempts: number;
};

export const DEFAULT_TREE_REWRITER_OPTIONS: Readonly<TreeRewriterOptions> = Object.freeze({
  dryRun: false,
  overwrite: false,
  maxSuffixAttempts: 1,
});

export type SanitizeRunSummary = {
  visited: number;
  skipped: number;
  renamed: number;
  planned: number;
  conflictsResolved: number;
  overwritten: number;
  failed: number;
  listingFailures: number;
};

function emptySummary(): SanitizeRunSummary {
  return {
    visited: 0,
    skipped: 0,
    renamed: 0,
    planned: 0,
    conflictsResolved: 0,
    overwritten: 0,
    failed: 0,
    listingFailures: 0,
  };
}

const fmt = formatRemotePath;

/**
 * Percorre o store em profundidade, uma listagem por nível, renomeando o que
 * não é compatível com Windows.
 *
 * Os filhos de um diretório são sempre endereçados pelo caminho dele DEPOIS
 * do rename; nada é listado de forma recursiva antecipadamente, porque renomear
 * um diretório invalida o caminho remoto de tudo que está abaixo dele.
 * Tudo é sequencial: cada chamada ao store termina antes da próxima começar.
 */
export class TreeRewriter {
  private readonly store: RemoteFileStore;
  private readonly rules: SanitizationRules;
  private readonly options: Readonly<TreeRewriterOptions>;
  private readonly logger: Logger;
  private summary: SanitizeRunSummary = emptySummary();

  constructor(params: {
    store: RemoteFileStore;
    rules: SanitizationRules;
    logger: Logger;
    options?: Partial<TreeRewriterOptions>;
  }) {
    this.store = params.store;
    this.rules = params.rules;
    this.logger = params.logger;
    this.options = Object.freeze({ ...DEFAULT_TREE_REWRITER_OPTIONS, ...params.options });

    if (!Number.isInteger(this.options.maxSuffixAttempts) || this.options.maxSuffixAttempts < 1) {
      throw new RangeError(`maxSuffixAttempts must be a positive integer, got ${this.options.maxSuffixAttempts}`);
    }
  }

  async run(root: RemotePath): Promise<SanitizeRunSummary> {
    this.summary = emptySummary();
    this.logger.info(`Starting to sanitize filenames in ${fmt(root)}${this.options.dryRun ? " (safe mode)" : ""}`);

    await this.processRecursive(root);

    const s = this.summary;
    this.logger.info(
      `Finished ${fmt(root)}: visited=${s.visited} skipped=${s.skipped} renamed=${s.renamed} ` +
        `planned=${s.planned} conflictsResolved=${s.conflictsResolved} overwritten=${s.overwritten} ` +
        `failed=${s.failed} listingFailures=${s.listingFailures}`
    );
    return { ...s };
  }

  getSummary(): SanitizeRunSummary {
    return { ...this.summary };
  }

  /**
   * Processa uma entrada e devolve o caminho pelo qual os filhos dela devem
   * ser endereçados daqui pra frente.
   *
   * `address` é onde a entrada está de fato no store. Só difere de `path` em
   * safe mode, quando um ancestral teria sido renomeado mas não foi.
   */
  async processItem(path: RemotePath, address: RemotePath = path): Promise<RemotePath> {
    this.summary.visited++;
    const candidate = sanitizePath(path, this.rules);

    if (samePath(candidate, path)) {
      this.summary.skipped++;
      this.logger.debug(`Skipped: ${fmt(path)}`);
      return path;
    }

    if (this.options.dryRun) {
      this.summary.planned++;
      this.logger.info(`Would rename: '${fmt(path)}' to '${fmt(candidate)}'`);
      return candidate;
    }

    const outcome = await this.store.move(address, candidate);
    switch (outcome.type) {
      case "moved":
        this.summary.renamed++;
        this.logger.info(`Renamed: '${fmt(path)}' to '${fmt(candidate)}'`);
        return candidate;
      case "collision":
        return this.options.overwrite
          ? this.overwriteExisting(address, path, candidate)
          : this.moveWithSuffix(address, path, candidate);
      case "failed":
        return this.fail(path, describeError(outcome.error));
    }
  }

  /**
   * Lista os filhos de `address` e processa cada um. Falha de listagem aborta
   * só esta subárvore.
   */
  async processRecursive(path: RemotePath, address: RemotePath = path): Promise<void> {
    let children: RemoteListing[];
    try {
      children = await this.store.list(address);
    } catch (err) {
      this.summary.listingFailures++;
      this.logger.error(`Could not list '${fmt(path)}': ${describeError(err)}`);
      return;
    }

    for (const child of children) {
      const itemPath = childPath(path, child.name);
      const itemAddress = childPath(address, child.name);

      const next = await this.processItem(itemPath, itemAddress);
      if (child.kind !== "directory") continue;

      // em safe mode nada foi movido: lista pelo endereço antigo,
      // mas os filhos herdam o caminho planejado
      await this.processRecursive(next, this.options.dryRun ? itemAddress : next);
    }
  }

  private async moveWithSuffix(
    address: RemotePath,
    path: RemotePath,
    candidate: RemotePath
  ): Promise<RemotePath> {
    const base = nameOf(candidate);
    let occupied = candidate;

    for (let n = 1; n <= this.options.maxSuffixAttempts; n++) {
      const target = withName(candidate, `${base}_${n}`);
      this.logger.warn(`Conflict: '${fmt(occupied)}' already exists. Appending '_${n}' to the name`);

      const outcome: MoveOutcome = await this.store.move(address, target);
      if (outcome.type === "moved") {
        this.summary.renamed++;
        this.summary.conflictsResolved++;
        this.logger.info(`Renamed: '${fmt(path)}' to '${fmt(target)}'`);
        return target;
      }
      if (outcome.type === "failed") {
        return this.fail(path, describeError(outcome.error));
      }
      occupied = outcome.at;
    }

    return this.fail(
      path,
      `every suffix up to '${base}_${this.options.maxSuffixAttempts}' already exists`
    );
  }

  private async overwriteExisting(
    address: RemotePath,
    path: RemotePath,
    candidate: RemotePath
  ): Promise<RemotePath> {
    this.logger.warn(`Conflict: Overwriting '${fmt(candidate)}'`);

    try {
      await this.store.delete(candidate);
    } catch (err) {
      return this.fail(path, `could not delete '${fmt(candidate)}': ${describeError(err)}`);
    }

    const outcome = await this.store.move(address, candidate);
    switch (outcome.type) {
      case "moved":
        this.summary.renamed++;
        this.summary.overwritten++;
        this.logger.info(`Renamed: '${fmt(path)}' to '${fmt(candidate)}'`);
        return candidate;
      case "collision":
        return this.fail(path, `'${fmt(candidate)}' still exists after delete`);
      case "failed":
        return this.fail(path, describeError(outcome.error));
    }
  }

  private fail(path: RemotePath, reason: string): RemotePath {
    this.summary.failed++;
    this.logger.error(`Could not rename '${fmt(path)}': ${reason}`);
    return path;
  }
}

import {
  formatRemotePath,
  type RemotePath,
  type SanitizationRules,
} from "@name-sanitizer/core-domain";

import type { Logger } from "../ports/logger";
import type { RemoteFileStore } from "../ports/remote-file-store";
import { RemoteNotFoundError } from "../application/errors";
import { TreeRewriter, type SanitizeRunSummary, type TreeRewriterOptions } from "./tree-rewriter";

export class SanitizeService {
  constructor(
    private readonly deps: {
      store: RemoteFileStore;
      logger: Logger;
    }
  ) {}

  /**
   * Uma passada completa sobre `directory`. Só falha antes de começar
   * (diretório inexistente); durante a travessia os erros viram logs.
   */
  async sanitizeOnce(params: {
    directory: RemotePath;
    rules: SanitizationRules;
    options: TreeRewriterOptions;
  }): Promise<SanitizeRunSummary> {
    const { store, logger } = this.deps;

    if (!(await store.exists(params.directory))) {
      throw new RemoteNotFoundError(`Directory ${formatRemotePath(params.directory)} does not exist`);
    }

    const rewriter = new TreeRewriter({
      store,
      rules: params.rules,
      logger,
      options: params.options,
    });
    return rewriter.run(params.directory);
  }
}

export function hasFailures(summary: SanitizeRunSummary): boolean {
  return summary.failed > 0 || summary.listingFailures > 0;
}

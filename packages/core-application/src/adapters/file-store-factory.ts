import type { StoreConfig } from "../application/config";
import type { Logger } from "../ports/logger";
import type { RemoteFileStore } from "../ports/remote-file-store";
import { GoogleAuth } from "./google-auth";
import { createGoogleDriveFileStore } from "./google-drive-file-store";
import { MountedFolderFileStore } from "./mounted-folder-file-store";
import { createWebdavFileStore } from "./webdav-file-store";

export async function createFileStore(config: StoreConfig, logger: Logger): Promise<RemoteFileStore> {
  if (config.kind === "folder") {
    return new MountedFolderFileStore(config.root);
  }
  if (config.kind === "webdav") {
    return createWebdavFileStore(
      { url: config.url, username: config.username, password: config.password },
      { logger }
    );
  }

  const auth = await new GoogleAuth({
    tokenDirAbs: config.tokenDir,
    credentialsPathAbs: config.credentialsPath,
    logger,
  }).getAuthorizedClient();

  return createGoogleDriveFileStore(auth, { rootFolderId: config.rootFolderId, logger });
}

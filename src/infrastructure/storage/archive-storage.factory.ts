import { StorageConfig } from "../../core/domain/entities/config.entity.js";
import { IArchiveStorage } from "../../core/domain/repositories/archive-storage.repository.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { FileArchiveStorage } from "./file-archive-storage.repository.js";
import { SqliteArchiveStorage } from "./sqlite-archive-storage.repository.js";

export function createArchiveStorage(
  config: StorageConfig,
  logger: ILogger,
): IArchiveStorage {
  const storageLogger = logger.child({ storage: config.backend });
  switch (config.backend) {
    case "file":
      return new FileArchiveStorage(config.dir, storageLogger);
    case "kvstore":
      return new SqliteArchiveStorage(config.kvPath, storageLogger);
  }
}

import { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  getArchiveConfig(): Config["archive"];
  getStorageConfig(): Config["storage"];
  getS3Config(): Config["s3"];
  getLoggingConfig(): Config["logging"];
}

import { defaultConfigPath } from "../services/config.service.js";

/**
 * Resolves the configuration file path based on environment variables or default locations.
 */
export function getConfigPath() {
  return process.env.CONFIG_PATH || defaultConfigPath();
}

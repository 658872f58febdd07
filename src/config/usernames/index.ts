/**
 * Username configuration module.
 *
 * Usage:
 *   import { readUsernameConfigFile } from "./config/index.js";
 *
 *   const { usernames, ignoredKeys } = readUsernameConfigFile("config.json");
 *   usernames.furaffinity; // "MyName"
 */

export {
  UsernameConfigFileSchema,
  type UsernameConfigFile,
  type UsernameConfig,
} from "./schema.js";

export {
  loadUsernameConfig,
  validateUsernameConfig,
  readUsernameConfigFile,
  UsernameConfigError,
  type ConfigValidationIssue,
  type LoadedUsernameConfig,
} from "./loader.js";

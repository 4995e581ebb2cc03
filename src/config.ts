/**
 * Environment loading for the CLI.
 *
 * Settings such as JUDGE_MODEL are read from process.env when their modules
 * load, so the env file must be loaded before the CLI is imported.
 */

import { config } from "dotenv";

export const ENV_FILE = ".env";

/**
 * Load `path` into process.env. Variables already set are kept.
 *
 * @returns false when the file could not be read
 */
export function loadEnvironment(path: string = ENV_FILE): boolean {
  const result = config({ path });
  return result.error === undefined;
}

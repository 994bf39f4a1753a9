import * as path from "path";

export interface ZkConfig {
  /** Root of the compiled circuit artifacts and key files */
  buildDir: string;
  /** Emit debug-level logs */
  debug: boolean;
}

export const DEFAULT_BUILD_DIR = "./circuits/build";

/**
 * Read configuration from environment variables.
 * @param env - Defaults to `process.env`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ZkConfig {
  const buildDir = env.ZK_BUILD_DIR?.trim() || DEFAULT_BUILD_DIR;
  const debug = env.ZK_DEBUG !== undefined && env.ZK_DEBUG !== "" && env.ZK_DEBUG !== "0";
  return {
    buildDir: path.resolve(buildDir),
    debug,
  };
}

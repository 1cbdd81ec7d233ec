/**
 * Centralized configuration paths
 *
 * Global keel state lives in $KEEL_HOME (default ~/.keel/).
 * Per-project state lives in <project>/.keel/.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for global keel configuration
 */
export function getKeelHome(): string {
  return process.env["KEEL_HOME"] || join(homedir(), ".keel");
}

/**
 * Global configuration paths
 */
export function getConfigPaths(): { home: string; config: string } {
  const home = getKeelHome();
  return {
    /** Base directory: ~/.keel/ */
    home,

    /** Main config file: ~/.keel/config.json */
    config: join(home, "config.json"),
  };
}

/**
 * Per-project keel directory
 */
export function getProjectDir(projectPath: string): string {
  return join(projectPath, ".keel");
}

/**
 * Project config file: <project>/.keel/config.json
 */
export function getProjectConfigPath(projectPath: string): string {
  return join(getProjectDir(projectPath), "config.json");
}

/**
 * Session store root derived from the project path when none is given
 */
export function getDefaultSessionStoreDir(projectPath: string): string {
  return join(getProjectDir(projectPath), "sessions");
}

/**
 * Constants module for pipeline-docker.
 *
 * Timeouts, container layout and defaults shared by all commands (SSOT).
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

// === Version (SSOT: package.json) ===
function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}
export const VERSION: string = readPackageVersion();

// === Docker Timeouts (milliseconds) ===
export const DOCKER_COMMAND_TIMEOUT = 30_000; // Quick docker commands (version, images, ps, kill)
export const PRUNE_TIMEOUT = 60_000; // Prune operations

// === Container layout ===
export const CONTAINER_USER = "pipeline";
export const CONTAINER_ROOT = `/home/${CONTAINER_USER}`;
export const CONTAINER_JUPYTER_PORT = 8888;

/** Project directories mounted into run-style containers. */
export const DOCKER_DEFAULT_VOLUMES: readonly string[] = [
  "conf/local",
  "data",
  "logs",
  "notebooks",
  "references",
  "results",
];

// === Host defaults ===
export const DEFAULT_HOST_PORT = 8888;
export const PORT_PROBE_HOST = "127.0.0.1";
/** Pipeline CLI executable inside the image. */
export const DEFAULT_PIPELINE_CLI = "pipeline";

// Windows hosts have no numeric IDs; the container user falls back to these.
export const WINDOWS_DEFAULT_UID = 999;
export const WINDOWS_DEFAULT_GID = 0;

// === Build ===
export const BUILD_ARG = {
  UID: "PIPELINE_UID",
  GID: "PIPELINE_GID",
} as const;

/** Files copied into the project before `docker build`. */
export const TEMPLATE_FILES: readonly string[] = ["Dockerfile", ".dockerignore"];

/** Directory holding the Dockerfile templates (package root, beside src/ and dist/). */
export function getTemplateDir(): string {
  return fileURLToPath(new URL("../template", import.meta.url));
}

// === Configuration files ===
export const PROJECT_CONFIG_FILES: readonly string[] = [
  "pipeline-docker.yaml",
  "pipeline-docker.yml",
  ".pipeline-docker.yaml",
];
export const GLOBAL_CONFIG_PATH = join(homedir(), ".pipeline-docker", "config.yaml");

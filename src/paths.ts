/**
 * Host path utilities.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, plugin, commands
 */

import { existsSync, statSync } from "node:fs";
import { basename, resolve } from "node:path";
import { platform } from "node:process";

import { PathError } from "./errors.js";

/**
 * Get environment dict for running Docker commands.
 *
 * On Windows with Git Bash (MSYS2), path translation must be disabled
 * so `-v C:/project/data:/home/pipeline/data` reaches Docker untouched.
 */
export function getDockerEnv(): NodeJS.ProcessEnv {
  const envCopy = { ...process.env };

  if (platform === "win32") {
    envCopy.MSYS_NO_PATHCONV = "1";
    envCopy.MSYS2_ARG_CONV_EXCL = "*";
  }

  return envCopy;
}

/**
 * Validate and resolve a project path.
 *
 * @returns Resolved absolute path.
 * @throws PathError if path doesn't exist or is not a directory.
 */
export function resolveProjectPath(path: string): string {
  const projectPath = resolve(path);

  if (!existsSync(projectPath)) {
    throw new PathError(`Project path does not exist: ${projectPath}`);
  }
  if (!statSync(projectPath).isDirectory()) {
    throw new PathError(`Project path must be a directory: ${projectPath}`);
  }

  return projectPath;
}

/** Project name: the project directory's base name, used as the default image tag. */
export function getProjectName(projectPath: string): string {
  return basename(projectPath);
}

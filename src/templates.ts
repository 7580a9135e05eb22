/**
 * Copy Dockerfile templates into a project without clobbering the user's
 * own versions.
 */

import { copyFileSync, existsSync } from "node:fs";
import { join } from "node:path";

import { log, style } from "./logger.js";

/**
 * Copy each named file from `templatePath` into `projectPath`.
 *
 * A file that already exists in the project is left untouched. With
 * `verbose`, every file is reported as created or skipped.
 *
 * @returns Absolute paths of the files that were created.
 */
export function copyTemplateFiles(
  projectPath: string,
  templatePath: string,
  names: readonly string[],
  verbose = false
): string[] {
  const created: string[] = [];

  for (const name of names) {
    const dest = join(projectPath, name);

    if (existsSync(dest)) {
      if (verbose) {
        log.dim(`\`${dest}\` already exists and won't be overwritten.`);
      }
      continue;
    }

    copyFileSync(join(templatePath, name), dest);
    created.push(dest);
    if (verbose) {
      log.info(`Creating \`${dest}\`: ${style.green("SUCCESS")}`);
    }
  }

  return created;
}

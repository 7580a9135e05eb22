/**
 * `docker build`: copy the Dockerfile templates into the project and build
 * an image whose user matches the host user's IDs.
 */

import { BUILD_ARG, TEMPLATE_FILES } from "../constants.js";
import { composeDockerRunArgs } from "../docker/run-args.js";
import { log } from "../logger.js";
import { getUidGid } from "../platform.js";
import { copyTemplateFiles } from "../templates.js";
import { type CommandContext, type CommonOptions, resolveImageName, userDockerArgs } from "./context.js";

export interface BuildCommandOptions extends CommonOptions {
  uid?: number;
  gid?: number;
}

/**
 * Compose the `docker build` arguments, without the `build` keyword.
 *
 * The UID/GID build args are always passed; the `-t` tag only when the user
 * did not tag the image through --docker-args.
 */
export function getDockerBuildArgs(ctx: CommandContext, options: BuildCommandOptions): string[] {
  const [uid, gid] = getUidGid(options.uid ?? ctx.config.uid, options.gid ?? ctx.config.gid, ctx.host);
  const image = resolveImageName(ctx, options.image);

  const args = composeDockerRunArgs({
    requiredArgs: [
      ["--build-arg", `${BUILD_ARG.UID}=${uid}`],
      ["--build-arg", `${BUILD_ARG.GID}=${gid}`],
    ],
    optionalArgs: [["-t", image]],
    userArgs: userDockerArgs(ctx, options.dockerArgs),
  });

  return [...args, ctx.projectPath];
}

/**
 * Build the project image.
 *
 * @returns Exit code of `docker build`.
 */
export async function dockerBuild(ctx: CommandContext, options: BuildCommandOptions): Promise<number> {
  copyTemplateFiles(ctx.projectPath, ctx.templateDir, TEMPLATE_FILES, ctx.verbose);

  const args = getDockerBuildArgs(ctx, options);
  log.bold(`Building image for ${ctx.projectName}...`);

  const exitCode = await ctx.docker.build(args);
  if (exitCode === 0) {
    log.success("Image built");
  }
  return exitCode;
}

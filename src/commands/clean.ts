/**
 * `docker clean`: stop this project's containers and prune leftovers.
 */

import { makeContainerName } from "../docker/run-args.js";
import { log } from "../logger.js";
import { type CommandContext, resolveImageName } from "./context.js";

export interface CleanCommandOptions {
  image?: string;
  /** Skip `docker container prune` / `docker image prune`. */
  prune: boolean;
}

/**
 * Kill running containers started by the run-style commands for the image,
 * then remove stopped containers and dangling images.
 *
 * @returns 0 when every kill succeeded, 1 otherwise.
 */
export async function dockerClean(ctx: CommandContext, options: CleanCommandOptions): Promise<number> {
  const prefix = `${makeContainerName(resolveImageName(ctx, options.image))}-`;
  const containers = (await ctx.docker.listContainers(prefix)).filter((name) => name.startsWith(prefix));

  let failed = 0;
  for (const name of containers) {
    if (await ctx.docker.kill(name)) {
      log.dim(`Killed ${name}`);
    } else {
      log.warn(`Failed to kill ${name}`);
      failed++;
    }
  }

  if (options.prune) {
    log.dim("Pruning stopped containers and dangling images...");
    await ctx.docker.prune();
  }

  if (containers.length === 0) {
    log.dim("No running containers for this project");
  } else {
    log.success(`Stopped ${containers.length - failed} container(s)`);
  }
  return failed === 0 ? 0 : 1;
}

/**
 * Shared state and phases for docker subcommands.
 *
 * Every command receives a CommandContext built once per invocation by the
 * plugin layer; the helpers here resolve the image, check the host port and
 * assemble the default volume mounts.
 */

import type { PluginConfig } from "../config-file.js";
import { CONTAINER_ROOT, DEFAULT_PIPELINE_CLI, DOCKER_DEFAULT_VOLUMES } from "../constants.js";
import type { DockerClient } from "../docker/client.js";
import type { ComposeRunArgsOptions } from "../docker/run-args.js";
import { ImageNotFoundError, PortInUseError } from "../errors.js";
import type { HostIdentity, PortProbe } from "../platform.js";
import { splitArgs } from "../validation.js";

export interface CommandContext {
  readonly projectPath: string;
  readonly projectName: string;
  readonly verbose: boolean;
  readonly config: PluginConfig;
  readonly docker: DockerClient;
  readonly probePort: PortProbe;
  readonly host: HostIdentity;
  readonly templateDir: string;
}

/** Options every docker subcommand accepts. */
export interface CommonOptions {
  /** Image tag override. */
  image?: string;
  /** Tokens from --docker-args, already shell-split. */
  dockerArgs: string[];
}

/** Image tag: --image, then the configured image, then the project name. */
export function resolveImageName(ctx: CommandContext, image?: string): string {
  return image || ctx.config.image || ctx.projectName;
}

/**
 * Resolve the image tag and make sure it has been built.
 *
 * @throws ImageNotFoundError if the image is not present locally.
 */
export async function requireImage(ctx: CommandContext, image?: string): Promise<string> {
  const name = resolveImageName(ctx, image);
  if (!(await ctx.docker.imageExists(name))) {
    throw new ImageNotFoundError(name);
  }
  return name;
}

/**
 * @throws PortInUseError if something already listens on the host port.
 */
export async function ensurePortFree(ctx: CommandContext, port: number): Promise<number> {
  if (await ctx.probePort(port)) {
    throw new PortInUseError(port);
  }
  return port;
}

/** User docker arguments: configured `dockerArgs` first, then --docker-args. */
export function userDockerArgs(ctx: CommandContext, dockerArgs: readonly string[]): string[] {
  const configured = ctx.config.dockerArgs ? splitArgs(ctx.config.dockerArgs) : [];
  return [...configured, ...dockerArgs];
}

/** Project directories mounted into run-style containers. */
export function mountInfo(
  ctx: CommandContext
): Required<Pick<ComposeRunArgsOptions, "hostRoot" | "containerRoot" | "mountVolumes">> {
  return {
    hostRoot: ctx.projectPath,
    containerRoot: ctx.config.containerRoot ?? CONTAINER_ROOT,
    mountVolumes: ctx.config.volumes ?? DOCKER_DEFAULT_VOLUMES,
  };
}

/** Pipeline CLI executable inside the image. */
export function pipelineCli(ctx: CommandContext): string {
  return ctx.config.cli ?? DEFAULT_PIPELINE_CLI;
}

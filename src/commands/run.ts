/**
 * Run-style commands: the pipeline, an IPython shell, Jupyter servers and
 * arbitrary commands, each inside a fresh container with the project
 * directories mounted.
 */

import { CONTAINER_JUPYTER_PORT, DEFAULT_HOST_PORT } from "../constants.js";
import { type ArgumentPair, addJupyterArgs, composeDockerRunArgs, makeContainerName } from "../docker/run-args.js";
import { log } from "../logger.js";
import {
  type CommandContext,
  type CommonOptions,
  ensurePortFree,
  mountInfo,
  pipelineCli,
  requireImage,
  userDockerArgs,
} from "./context.js";

export type JupyterKind = "notebook" | "lab";

export interface JupyterCommandOptions extends CommonOptions {
  port?: number;
}

/** One container launch: docker flags, then the image, then the command inside it. */
interface ContainerLaunch {
  /** Suffix of the generated container name. */
  suffix: string;
  interactive: boolean;
  requiredArgs?: readonly ArgumentPair[];
  command: readonly string[];
}

/**
 * Compose the full `docker run` argument list, without the `run` keyword.
 */
export function getDockerRunArgs(
  ctx: CommandContext,
  image: string,
  options: CommonOptions,
  launch: ContainerLaunch
): string[] {
  const optionalArgs: ArgumentPair[] = [["--rm"]];
  if (launch.interactive) {
    optionalArgs.push(["-it"]);
  }
  optionalArgs.push(["--name", makeContainerName(image, launch.suffix)]);

  const runArgs = composeDockerRunArgs({
    requiredArgs: launch.requiredArgs,
    optionalArgs,
    userArgs: userDockerArgs(ctx, options.dockerArgs),
    ...mountInfo(ctx),
  });

  return [...runArgs, image, ...launch.command];
}

async function launch(ctx: CommandContext, options: CommonOptions, spec: ContainerLaunch): Promise<number> {
  const image = await requireImage(ctx, options.image);
  const args = getDockerRunArgs(ctx, image, options, spec);
  log.dim(`Starting ${makeContainerName(image, spec.suffix)}...`);
  return ctx.docker.run(args);
}

/** `docker run`: run the pipeline in a container. */
export function dockerRun(ctx: CommandContext, options: CommonOptions, args: readonly string[]): Promise<number> {
  return launch(ctx, options, {
    suffix: "run",
    interactive: false,
    command: [pipelineCli(ctx), "run", ...args],
  });
}

/** `docker ipython`: interactive IPython session in a container. */
export function dockerIpython(ctx: CommandContext, options: CommonOptions, args: readonly string[]): Promise<number> {
  return launch(ctx, options, {
    suffix: "ipython",
    interactive: true,
    command: [pipelineCli(ctx), "ipython", ...args],
  });
}

/**
 * `docker jupyter notebook|lab`: serve Jupyter from a container, published
 * on the host port.
 *
 * @throws PortInUseError if the host port is taken.
 */
export async function dockerJupyter(
  ctx: CommandContext,
  kind: JupyterKind,
  options: JupyterCommandOptions,
  args: readonly string[]
): Promise<number> {
  const port = await ensurePortFree(ctx, options.port ?? ctx.config.port ?? DEFAULT_HOST_PORT);
  log.info(`Jupyter ${kind} will be published on http://localhost:${port}`);

  return launch(ctx, options, {
    suffix: `jupyter-${kind}`,
    interactive: true,
    requiredArgs: [["-p", `${port}:${CONTAINER_JUPYTER_PORT}`]],
    command: [pipelineCli(ctx), "jupyter", kind, ...addJupyterArgs(args)],
  });
}

/**
 * `docker cmd`: run an arbitrary command in a container. With no arguments
 * the image's default command runs.
 */
export function dockerCmd(ctx: CommandContext, options: CommonOptions, args: readonly string[]): Promise<number> {
  return launch(ctx, options, {
    suffix: "cmd",
    interactive: false,
    command: args,
  });
}

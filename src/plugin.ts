/**
 * Plugin entry point: attaches the `docker` command group to a host
 * commander program.
 *
 * Subcommands are declared in an explicit table; registration maps each
 * entry onto a commander Command, builds a CommandContext when the action
 * runs and relays the Docker exit code.
 */

import { Command, Option } from "commander";

import { loadPluginConfig } from "./config-file.js";
import { getTemplateDir } from "./constants.js";
import { dockerBuild } from "./commands/build.js";
import { dockerClean } from "./commands/clean.js";
import type { CommandContext } from "./commands/context.js";
import { dockerCmd, dockerIpython, dockerJupyter, dockerRun } from "./commands/run.js";
import type { DockerClient } from "./docker/client.js";
import { ExecaDockerClient } from "./docker/executor.js";
import { logExitCode } from "./error-handler.js";
import { DockerNotRunningError } from "./errors.js";
import { enableVerboseMode, isVerbose, setPrefix } from "./logger.js";
import { getProjectName, resolveProjectPath } from "./paths.js";
import { getHostIdentity, type HostIdentity, isPortInUse, type PortProbe } from "./platform.js";
import { parseNumericId, parsePort, splitArgs } from "./validation.js";

/** Collaborators of the plugin; every field has a production default. */
export interface PluginOptions {
  /** Docker client shared by all commands (default: ExecaDockerClient). */
  docker?: DockerClient;
  /** Host port probe for jupyter commands (default: TCP connect). */
  probePort?: PortProbe;
  /** Host platform and IDs (default: read from the running process). */
  hostIdentity?: () => HostIdentity;
  /** Project directory, or a function returning it (default: cwd at action time). */
  projectPath?: string | (() => string);
  /** Global config file (default: ~/.pipeline-docker/config.yaml). */
  globalConfigPath?: string;
  /** Directory holding the Dockerfile templates (default: package template/). */
  templateDir?: string;
  /** Receives a non-zero Docker exit code (default: sets process.exitCode). */
  setExitCode?: (code: number) => void;
  /** Prefix plugin output with [pipeline-docker] (for hosts with their own output). */
  prefixOutput?: boolean;
}

/** Option values after commander has run the argument parsers. */
type ParsedOptions = {
  image?: string;
  dockerArgs: string[];
  port?: number;
  uid?: number;
  gid?: number;
  prune?: boolean;
};

interface DockerCommandSpec {
  /** Command path below `docker`, e.g. ["jupyter", "notebook"]. */
  path: readonly string[];
  description: string;
  options: () => Option[];
  /** Unknown options and trailing operands are forwarded into the container. */
  forwardArgs: boolean;
  action: (ctx: CommandContext, options: ParsedOptions, args: string[]) => Promise<number>;
}

const GROUP_DESCRIPTIONS: Record<string, string> = {
  jupyter: "Run jupyter notebook / lab in a Docker container.",
};

function imageOption(): Option {
  return new Option("--image <name>", "Docker image tag. Default is the project directory name.");
}

function dockerArgsOption(help = "Optional arguments to be passed to `docker run` command."): Option {
  return new Option("--docker-args <args>", help).argParser(splitArgs).default([], "none");
}

function portOption(): Option {
  return new Option("--port <port>", "Host port to publish to. (default: 8888)").argParser(parsePort);
}

function idOption(flag: "--uid" | "--gid", kind: "User" | "Group"): Option {
  return new Option(
    `${flag} <id>`,
    `${kind} ID for the pipeline user inside the container. Default is the current user's ${kind === "User" ? "UID" : "GID"}.`
  ).argParser(parseNumericId);
}

function forwardHelp(inside: string): string {
  return `Any extra arguments unspecified in this help are passed to the pipeline CLI's \`${inside}\` command inside the container as is.`;
}

const DOCKER_COMMANDS: readonly DockerCommandSpec[] = [
  {
    path: ["build"],
    description: "Build a Docker image for the project.",
    options: () => [
      idOption("--uid", "User"),
      idOption("--gid", "Group"),
      imageOption(),
      dockerArgsOption("Optional arguments to be passed to `docker build` command."),
    ],
    forwardArgs: false,
    action: (ctx, options) => dockerBuild(ctx, options),
  },
  {
    path: ["run"],
    description: `Run the pipeline in the Docker container.\n${forwardHelp("run")}`,
    options: () => [imageOption(), dockerArgsOption()],
    forwardArgs: true,
    action: (ctx, options, args) => dockerRun(ctx, options, args),
  },
  {
    path: ["ipython"],
    description: `Run ipython in the Docker container.\n${forwardHelp("ipython")}`,
    options: () => [imageOption(), dockerArgsOption()],
    forwardArgs: true,
    action: (ctx, options, args) => dockerIpython(ctx, options, args),
  },
  {
    path: ["jupyter", "notebook"],
    description: `Run jupyter notebook in the Docker container.\n${forwardHelp("jupyter notebook")}`,
    options: () => [imageOption(), portOption(), dockerArgsOption()],
    forwardArgs: true,
    action: (ctx, options, args) => dockerJupyter(ctx, "notebook", options, args),
  },
  {
    path: ["jupyter", "lab"],
    description: `Run jupyter lab in the Docker container.\n${forwardHelp("jupyter lab")}`,
    options: () => [imageOption(), portOption(), dockerArgsOption()],
    forwardArgs: true,
    action: (ctx, options, args) => dockerJupyter(ctx, "lab", options, args),
  },
  {
    path: ["cmd"],
    description:
      "Run arbitrary command from ARGS in the Docker container.\n" +
      "If ARGS are not specified, the image's default command (the pipeline run) is invoked.",
    options: () => [imageOption(), dockerArgsOption()],
    forwardArgs: true,
    action: (ctx, options, args) => dockerCmd(ctx, options, args),
  },
  {
    path: ["clean"],
    description: "Kill the project's running containers and prune stopped containers and dangling images.",
    options: () => [imageOption(), new Option("--no-prune", "Only kill containers, skip pruning")],
    forwardArgs: false,
    action: (ctx, options) => dockerClean(ctx, { image: options.image, prune: options.prune !== false }),
  },
];

function findOrCreateGroup(parent: Command, name: string): Command {
  const existing = parent.commands.find((cmd) => cmd.name() === name);
  if (existing) {
    return existing;
  }
  return parent.command(name).description(GROUP_DESCRIPTIONS[name] ?? "");
}

/**
 * Register the `docker` command group on a host program.
 *
 * Hosts that declare their own short options should call
 * `program.enablePositionalOptions()`, so that flags meant for the command
 * inside the container (`-v`, `-p`, ...) are not taken by the host.
 *
 * @returns The `docker` group command.
 */
export function registerDockerCommands(program: Command, options: PluginOptions = {}): Command {
  const docker = options.docker ?? new ExecaDockerClient();
  const probePort = options.probePort ?? isPortInUse;
  const readIdentity = options.hostIdentity ?? getHostIdentity;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  if (options.prefixOutput) {
    setPrefix(true);
  }

  const group = program
    .command("docker")
    .description("Dockerize your pipeline project.")
    .hook("preAction", async () => {
      if (!(await docker.isRunning())) {
        throw new DockerNotRunningError();
      }
    });

  const buildContext = (command: Command): CommandContext => {
    const rawPath =
      typeof options.projectPath === "function" ? options.projectPath() : (options.projectPath ?? process.cwd());
    const projectPath = resolveProjectPath(rawPath);
    // A host program's own --verbose also prints the composed docker command
    const flags = command.optsWithGlobals<{ verbose?: boolean; quiet?: boolean }>();
    if (flags.verbose && !flags.quiet) {
      enableVerboseMode();
    }
    return {
      projectPath,
      projectName: getProjectName(projectPath),
      verbose: isVerbose(),
      config: loadPluginConfig(projectPath, options.globalConfigPath),
      docker,
      probePort,
      host: readIdentity(),
      templateDir: options.templateDir ?? getTemplateDir(),
    };
  };

  for (const spec of DOCKER_COMMANDS) {
    let parent = group;
    for (const name of spec.path.slice(0, -1)) {
      parent = findOrCreateGroup(parent, name);
    }

    const leafName = spec.path[spec.path.length - 1] ?? "";
    const command = parent.command(leafName).description(spec.description);
    for (const option of spec.options()) {
      command.addOption(option);
    }
    if (spec.forwardArgs) {
      command.argument("[args...]", "arguments forwarded into the container").allowUnknownOption();
    }

    command.action(async () => {
      const ctx = buildContext(command);
      const forwarded = spec.forwardArgs ? [...command.args] : [];
      const exitCode = await spec.action(ctx, command.opts<ParsedOptions>(), forwarded);
      if (exitCode !== 0) {
        logExitCode(exitCode, "docker");
        setExitCode(exitCode);
      }
    });
  }

  return group;
}

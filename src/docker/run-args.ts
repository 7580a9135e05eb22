/**
 * Argument composition for docker build/run invocations.
 *
 * Merges required flags, generated volume mounts, optional defaults and the
 * user's own `--docker-args` into one ordered token list. Pure functions,
 * no I/O.
 */

import { join, resolve } from "node:path";

import { ConfigError } from "../errors.js";

/** A flag and its value; a missing, null or empty value makes it a switch. */
export type ArgumentPair = readonly [flag: string, value?: string | null];

export interface ComposeRunArgsOptions {
  /** Host directory that mount sub-paths are relative to. */
  hostRoot?: string | null;
  /** Container directory that mount sub-paths are relative to. */
  containerRoot?: string | null;
  /** Sub-paths mounted as `-v <hostRoot>/<sub>:<containerRoot>/<sub>`. */
  mountVolumes?: readonly string[];
  /** Always emitted, even when the user passed the same flag. */
  requiredArgs?: readonly ArgumentPair[];
  /** Emitted only when the user did not pass the flag. */
  optionalArgs?: readonly ArgumentPair[];
  /** Raw tokens from `--docker-args`, appended last. */
  userArgs?: readonly string[];
}

/** Flag name of a token: everything before the first `=`. */
function flagName(token: string): string {
  const eq = token.indexOf("=");
  return eq === -1 ? token : token.slice(0, eq);
}

/**
 * Compose the argument list for `docker build` or `docker run`.
 *
 * Order: required flags, mount bindings, optional flags, user tokens.
 * An optional flag is skipped when any user token has the same flag name,
 * so `--name=foo` and `--name foo` both suppress a generated `--name`.
 * Aliases (`-p` vs `--publish`) are not recognised.
 *
 * @throws ConfigError if mount volumes are given without both roots.
 */
export function composeDockerRunArgs(options: ComposeRunArgsOptions = {}): string[] {
  const {
    hostRoot,
    containerRoot,
    mountVolumes = [],
    requiredArgs = [],
    optionalArgs = [],
    userArgs = [],
  } = options;

  const userFlags = new Set(userArgs.map(flagName));
  const combined: string[] = [];

  const addArg = ([name, value]: ArgumentPair, force: boolean): void => {
    if (force || !userFlags.has(name)) {
      combined.push(name);
      if (value) {
        combined.push(value);
      }
    }
  };

  for (const arg of requiredArgs) {
    addArg(arg, true);
  }

  if (mountVolumes.length > 0) {
    if (!hostRoot || !containerRoot) {
      throw new ConfigError(
        "Both `hostRoot` and `containerRoot` must be specified in " +
          "`composeDockerRunArgs` call if `mountVolumes` are provided."
      );
    }
    const absoluteHostRoot = resolve(hostRoot);
    for (const volume of mountVolumes) {
      addArg(["-v", `${join(absoluteHostRoot, volume)}:${containerRoot}/${volume}`], true);
    }
  }

  for (const arg of optionalArgs) {
    addArg(arg, false);
  }

  return [...combined, ...userArgs];
}

/**
 * Append the arguments a notebook server needs to be reachable from the host.
 *
 * `--ip 0.0.0.0` is added unless the user set `--ip` in either form;
 * `--no-browser` is added unless that exact token is present.
 */
export function addJupyterArgs(runArgs: readonly string[]): string[] {
  const args = [...runArgs];
  if (!args.some((arg) => flagName(arg) === "--ip")) {
    args.push("--ip", "0.0.0.0");
  }
  if (!args.includes("--no-browser")) {
    args.push("--no-browser");
  }
  return args;
}

/**
 * Build a Docker-safe container name: parts joined with `-`, every run of
 * non-alphanumeric characters collapsed to a single `-`.
 */
export function makeContainerName(...parts: string[]): string {
  return parts
    .join("-")
    .replace(/[^a-zA-Z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

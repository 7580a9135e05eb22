/**
 * Docker command execution with consistent error handling.
 *
 * Core execution layer - every Docker CLI call flows through
 * ExecaDockerClient.
 */

import { execa } from "execa";

import { DOCKER_COMMAND_TIMEOUT, PRUNE_TIMEOUT } from "../constants.js";
import { DockerNotFoundError, DockerTimeoutError } from "../errors.js";
import { log } from "../logger.js";
import { getDockerEnv } from "../paths.js";
import type { DockerClient, DockerResult } from "./client.js";

/** Short command description for error messages. */
function describe(args: readonly string[]): string {
  return `docker ${args.slice(0, 3).join(" ")}${args.length > 3 ? "..." : ""}`;
}

/** True when execa failed to spawn the binary because it is not on PATH. */
function isNotFound(result: object): boolean {
  return "code" in result && result.code === "ENOENT";
}

/**
 * DockerClient backed by the local Docker CLI.
 *
 * Queries capture their output and time out after `timeout` ms; build and
 * run inherit the parent's stdio and wait for the child without a limit.
 */
export class ExecaDockerClient implements DockerClient {
  private readonly binary: string;
  private readonly timeout: number;

  constructor(options: { binary?: string; timeout?: number } = {}) {
    this.binary = options.binary ?? "docker";
    this.timeout = options.timeout ?? DOCKER_COMMAND_TIMEOUT;
  }

  /**
   * Run a Docker query and capture its output. Never rejects on a non-zero
   * exit code.
   *
   * @throws DockerNotFoundError if the docker binary is not found.
   * @throws DockerTimeoutError if the command times out.
   */
  async capture(args: readonly string[], timeout = this.timeout): Promise<DockerResult> {
    const result = await execa(this.binary, args, {
      timeout,
      env: getDockerEnv(),
      reject: false,
    });

    if (isNotFound(result)) {
      throw new DockerNotFoundError(`Docker not found in PATH. Command: ${describe(args)}`);
    }
    if (result.timedOut) {
      throw new DockerTimeoutError(`Docker command timed out after ${timeout}ms. Command: ${describe(args)}`);
    }

    return {
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }

  /**
   * Run a Docker command attached to the terminal and return its exit code.
   *
   * @throws DockerNotFoundError if the docker binary is not found.
   */
  async attach(args: readonly string[]): Promise<number> {
    log.debug(`$ ${this.binary} ${args.join(" ")}`);

    const result = await execa(this.binary, args, {
      stdio: "inherit",
      env: getDockerEnv(),
      reject: false,
    });

    if (isNotFound(result)) {
      throw new DockerNotFoundError(`Docker not found in PATH. Command: ${describe(args)}`);
    }
    return result.exitCode ?? 1;
  }

  async isRunning(): Promise<boolean> {
    try {
      const result = await this.capture(["version"]);
      return result.exitCode === 0;
    } catch (error: unknown) {
      if (error instanceof DockerNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  async imageExists(image: string): Promise<boolean> {
    const result = await this.capture(["images", "-q", image]);
    return result.exitCode === 0 && result.stdout.trim().length > 0;
  }

  build(args: readonly string[]): Promise<number> {
    return this.attach(["build", ...args]);
  }

  run(args: readonly string[]): Promise<number> {
    return this.attach(["run", ...args]);
  }

  async listContainers(nameFilter: string): Promise<string[]> {
    const result = await this.capture(["ps", "--format", "{{.Names}}", "--filter", `name=${nameFilter}`]);
    if (result.exitCode !== 0) {
      log.debug(`docker ps failed: ${result.stderr.trim()}`);
      return [];
    }
    return result.stdout.trim().split("\n").filter(Boolean);
  }

  async kill(container: string): Promise<boolean> {
    const result = await this.capture(["kill", container]);
    if (result.exitCode !== 0) {
      log.debug(`docker kill ${container} failed: ${result.stderr.trim()}`);
    }
    return result.exitCode === 0;
  }

  async prune(): Promise<void> {
    for (const args of [["container", "prune", "-f"], ["image", "prune", "-f"]]) {
      const result = await this.capture(args, PRUNE_TIMEOUT);
      if (result.exitCode !== 0) {
        log.warn(`${describe(args)} exited with code ${result.exitCode}`);
      }
    }
  }
}

/**
 * Transport-agnostic Docker client.
 *
 * Commands receive one client handle, created once per process, instead of
 * reaching for a global. Tests substitute a recording fake.
 */

/** Result of a captured Docker query. */
export interface DockerResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface DockerClient {
  /** True when `docker version` reaches a daemon. */
  isRunning(): Promise<boolean>;

  /** True when `docker images -q <image>` lists at least one image. */
  imageExists(image: string): Promise<boolean>;

  /**
   * Run `docker build` with the given arguments (without the `build`
   * keyword), streaming output to the terminal.
   *
   * @returns Exit code of the Docker process.
   */
  build(args: readonly string[]): Promise<number>;

  /**
   * Run `docker run` with the given arguments (without the `run` keyword),
   * attached to the terminal.
   *
   * @returns Exit code of the container.
   */
  run(args: readonly string[]): Promise<number>;

  /** Names of running containers matching a `name=` filter. */
  listContainers(nameFilter: string): Promise<string[]>;

  /** Kill a running container. Returns false if Docker refused. */
  kill(container: string): Promise<boolean>;

  /** Remove stopped containers and dangling images. */
  prune(): Promise<void>;
}

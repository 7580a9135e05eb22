/**
 * Docker operations for pipeline-docker.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - client.ts: DockerClient interface
 * - executor.ts: execa-backed implementation
 * - run-args.ts: argument composition
 */

export type { DockerClient, DockerResult } from "./client.js";
export { ExecaDockerClient } from "./executor.js";
export {
  type ArgumentPair,
  type ComposeRunArgsOptions,
  addJupyterArgs,
  composeDockerRunArgs,
  makeContainerName,
} from "./run-args.js";

/**
 * pipeline-docker - Docker packaging commands for a data-pipeline CLI.
 *
 * This is the library entry point; host CLIs call registerDockerCommands.
 */

export { VERSION, DOCKER_DEFAULT_VOLUMES, CONTAINER_ROOT } from "./constants.js";
export { registerDockerCommands, type PluginOptions } from "./plugin.js";
export {
  type ArgumentPair,
  type ComposeRunArgsOptions,
  type DockerClient,
  type DockerResult,
  ExecaDockerClient,
  addJupyterArgs,
  composeDockerRunArgs,
  makeContainerName,
} from "./docker/index.js";
export { loadPluginConfig, type PluginConfig } from "./config-file.js";
export { copyTemplateFiles } from "./templates.js";
export { getUidGid, isPortInUse, type HostIdentity } from "./platform.js";
export {
  PluginError,
  ConfigError,
  PathError,
  ValidationError,
  PortInUseError,
  DockerError,
  DockerNotFoundError,
  DockerNotRunningError,
  DockerTimeoutError,
  ImageNotFoundError,
} from "./errors.js";

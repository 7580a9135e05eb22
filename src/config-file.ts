/**
 * Configuration file support for pipeline-docker.
 *
 * Config file locations (in order of precedence):
 *   1. ./pipeline-docker.yaml, ./pipeline-docker.yml, ./.pipeline-docker.yaml
 *      (project-specific, first found wins)
 *   2. ~/.pipeline-docker/config.yaml (global)
 *
 * CLI flags take precedence over both.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, plugin, commands
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { parse as parseYaml } from "yaml";

import { GLOBAL_CONFIG_PATH, PROJECT_CONFIG_FILES } from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

/**
 * Plugin configuration options.
 * All fields are optional - CLI flags take precedence.
 */
export interface PluginConfig {
  /** Image tag; defaults to the project directory name. */
  image?: string;
  /** Pipeline CLI executable inside the image. */
  cli?: string;
  /** Container directory the project volumes are mounted under. */
  containerRoot?: string;
  /** Project sub-directories mounted into run-style containers. */
  volumes?: string[];
  /** Host port for jupyter commands. */
  port?: number;
  uid?: number;
  gid?: number;
  /** Extra docker arguments placed before --docker-args. */
  dockerArgs?: string;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Map a parsed YAML document onto PluginConfig. Fields of the wrong type
 * are dropped with a warning.
 */
export function toPluginConfig(parsed: Record<string, unknown>, source: string): PluginConfig {
  const config: PluginConfig = {};
  const skip = (key: string, expected: string): void => {
    log.warn(`Ignoring \`${key}\` in ${source}: expected ${expected}`);
  };

  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case "image":
      case "cli":
      case "containerRoot":
      case "dockerArgs":
        if (typeof value === "string" && value !== "") {config[key] = value;} else {skip(key, "a non-empty string");}
        break;
      case "volumes":
        if (isStringArray(value)) {config.volumes = value;} else {skip(key, "a list of strings");}
        break;
      case "port":
      case "uid":
      case "gid":
        if (isNonNegativeInteger(value)) {config[key] = value;} else {skip(key, "a non-negative integer");}
        break;
      default:
        log.debug(`Unknown key \`${key}\` in ${source}`);
    }
  }

  return config;
}

/**
 * Load configuration from file.
 *
 * @returns null if the file does not exist.
 * @throws ConfigError if the file is not a YAML mapping.
 */
export function loadConfigFile(path: string): PluginConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Failed to parse config file ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a mapping of settings`);
  }

  return toPluginConfig({ ...parsed }, path);
}

function loadProjectConfig(projectPath: string): PluginConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations; later ones override earlier ones field by field.
 */
export function mergeConfigs(...configs: (PluginConfig | null)[]): PluginConfig {
  const result: PluginConfig = {};

  for (const config of configs) {
    if (!config) {continue;}
    for (const [key, value] of Object.entries(config)) {
      if (value !== undefined) {
        Object.assign(result, { [key]: value });
      }
    }
  }

  return result;
}

/**
 * Load plugin configuration: global config, then project config on top.
 *
 * @param projectPath - Project directory path.
 * @param globalPath - Global config file (overridable for tests).
 */
export function loadPluginConfig(projectPath: string, globalPath = GLOBAL_CONFIG_PATH): PluginConfig {
  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }
  return mergeConfigs(globalConfig, loadProjectConfig(projectPath));
}

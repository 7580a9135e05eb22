/**
 * Unified exception hierarchy for pipeline-docker.
 *
 * All custom exceptions inherit from PluginError so the CLI layer can turn
 * them into user-facing messages with a non-zero exit code.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other modules.
 */

/**
 * Base exception for all plugin errors.
 */
export class PluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PluginError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Mount volumes requested without host/container roots
 *   - Configuration file that is not a YAML mapping
 */
export class ConfigError extends PluginError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Project path does not exist or is not a directory. */
export class PathError extends PluginError {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Port outside 1-65535
 *   - Non-numeric UID/GID
 *   - Unbalanced quotes in --docker-args
 */
export class ValidationError extends PluginError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Raised when the requested host port is already bound. */
export class PortInUseError extends PluginError {
  readonly port: number;

  constructor(port: number) {
    super(
      `Port ${port} is already in use on the host. ` +
        "Please specify an alternative port number."
    );
    this.name = "PortInUseError";
    this.port = port;
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all Docker-related exceptions.
 */
export class DockerError extends PluginError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when Docker is not installed or not in PATH. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Docker not found in PATH") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when a Docker query times out. */
export class DockerTimeoutError extends DockerError {
  constructor(message = "Docker operation timed out") {
    super(message);
    this.name = "DockerTimeoutError";
  }
}

/** Raised when the Docker daemon does not respond. */
export class DockerNotRunningError extends DockerError {
  constructor(message = "Cannot connect to the Docker daemon. Is the Docker daemon running?") {
    super(message);
    this.name = "DockerNotRunningError";
  }
}

/** Raised when a run-style command targets an image that was never built. */
export class ImageNotFoundError extends DockerError {
  readonly image: string;

  constructor(image: string) {
    super(
      `Unable to find image \`${image}\` locally. ` +
        "Please build it first by running `docker build` from this plugin."
    );
    this.name = "ImageNotFoundError";
    this.image = image;
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 *
 * @param error - Unknown error to extract details from.
 * @param maxLength - Maximum length of returned string (default: 1000).
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

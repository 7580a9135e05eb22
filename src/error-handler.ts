/**
 * Error reporting for pipeline-docker.
 *
 * Describes container exit codes and turns errors that escape a command
 * into a user-facing message and a non-zero exit code.
 */

import { extractErrorDetails, PluginError } from "./errors.js";
import { log } from "./logger.js";

/** Known Docker/container exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    description: "Container exited successfully",
    severity: "info",
  },
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "General error or command failure",
    suggestion: "Check the output above for details",
    severity: "error",
  },
  125: {
    code: 125,
    name: "DOCKER_ERROR",
    description: "Docker could not start the container",
    suggestion: "Check the arguments passed with --docker-args",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Command not executable",
    suggestion: "Check file permissions (chmod +x)",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found",
    suggestion: "Verify the command exists in the image PATH; rebuild the image after changing requirements",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "OOM_KILLED",
    description: "Container was killed (OOM or manual stop)",
    suggestion: "Try raising the limit: --docker-args=\"--memory 8g\"",
    severity: "warn",
  },
  139: {
    code: 139,
    name: "SEGFAULT",
    description: "Container crashed (segmentation fault)",
    severity: "error",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Container terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Exited with code ${code}`,
      severity: "warn" as const,
    }
  );
}

/** SIGINT (Ctrl+C) or SIGTERM: not an error. */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143;
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }

  const info = getExitCodeInfo(code);
  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const message = context ? `${info.description} (${context})` : info.description;
  if (info.severity === "error") {
    log.error(message);
  } else {
    log.warn(message);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Report an error that escaped a command and set a failing exit code.
 *
 * Plugin errors are shown as their message; anything else is unexpected and
 * also gets its stack trace at debug level.
 */
export function handleFatalError(error: unknown, setExitCode: (code: number) => void): void {
  if (error instanceof PluginError) {
    log.error(`Error: ${error.message}`);
  } else {
    log.error(`Unexpected error: ${extractErrorDetails(error)}`);
    if (error instanceof Error && error.stack) {
      log.debug(error.stack);
    }
  }
  setExitCode(1);
}

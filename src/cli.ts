#!/usr/bin/env node
/**
 * CLI entry point for pipeline-docker.
 *
 * Hosts the `docker` command group on its own for projects whose pipeline
 * CLI does not load plugins.
 */

import { Command } from "commander";

import { VERSION } from "./constants.js";
import { handleFatalError } from "./error-handler.js";
import { enableQuietMode, enableVerboseMode } from "./logger.js";
import { registerDockerCommands } from "./plugin.js";

const setExitCode = (code: number): void => {
  process.exitCode = code;
};

const program = new Command();

program
  .name("pipeline-docker")
  .description("Package and run a data-pipeline project with Docker")
  .version(VERSION)
  .option("-v, --verbose", "Show template copies and the composed docker command")
  .option("-q, --quiet", "Suppress all plugin output (exit code only)")
  .option("-C, --chdir <dir>", "Change to directory before running (like git -C)")
  // Root options must come before the subcommand; later flags belong to the container.
  .enablePositionalOptions()
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean; chdir?: string }>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.verbose) {
      enableVerboseMode();
    }
    if (opts.chdir) {
      process.chdir(opts.chdir);
    }
  });

registerDockerCommands(program, { setExitCode });

program.parseAsync().catch((error: unknown) => {
  handleFatalError(error, setExitCode);
});

import { Command } from "commander";

import { registerSessionsCommand } from "./sessions.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("certrun")
    .description("Inspect resumable certification test sessions")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override config path (defaults to .certrun/config.yaml, then $CERTRUN_HOME/config.yaml)",
    )
    .option("-v, --verbose", "Print every engine event to stderr", false)
    .option("--debug", "Show error causes and stack traces", false);

  registerSessionsCommand(program);

  return program;
}

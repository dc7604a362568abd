#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return Boolean(program.opts<{ debug?: boolean }>().debug);
}

function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const { exitCode } = error;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  void main(process.argv);
}

import type { CertrunConfig } from "../core/config.js";
import { loadConfigForCli } from "../core/config-loader.js";

export type GlobalCliOptions = {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
};

export type CliContext = {
  config: CertrunConfig;
  verbose: boolean;
};

export function loadCliContext(globals: GlobalCliOptions, cwd?: string): CliContext {
  const { config } = loadConfigForCli({ explicitPath: globals.config, cwd });
  return { config, verbose: globals.verbose ?? false };
}

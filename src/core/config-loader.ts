import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { CertrunConfigSchema, type CertrunConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { defaultSessionRoot, homeConfigPath, repoConfigPath, type PathsContext } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "repo" | "home" | "defaults";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function describeYamlLocation(error: unknown): string {
  if (error instanceof yaml.YAMLException && error.mark) {
    return ` (line ${error.mark.line + 1}, column ${error.mark.column + 1})`;
  }
  return "";
}

// =============================================================================
// PUBLIC API
// =============================================================================

/** Explicit path first, then `<cwd>/.certrun/config.yaml`, then the home config. */
export function resolveConfigPath(
  args: { explicitPath?: string; cwd?: string; paths?: PathsContext } = {},
): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const repoConfig = repoConfigPath(args.cwd ?? process.cwd());
  if (fs.existsSync(repoConfig)) {
    return { configPath: repoConfig, source: "repo" };
  }

  const homeConfig = homeConfigPath(args.paths);
  if (fs.existsSync(homeConfig)) {
    return { configPath: homeConfig, source: "home" };
  }

  return { configPath: null, source: "defaults" };
}

export function loadCertrunConfig(configPath: string, paths?: PathsContext): CertrunConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config not found at ${absolutePath}.`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      `Failed to parse YAML config at ${absolutePath}${describeYamlLocation(err)}: ${detail}`,
      err,
    );
  }

  // An empty file means "all defaults".
  const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });
  const parsed = CertrunConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
  }

  const configDir = path.dirname(absolutePath);
  const cfg = parsed.data;
  return {
    ...cfg,
    session_root: cfg.session_root
      ? path.resolve(configDir, cfg.session_root)
      : defaultSessionRoot(paths),
    base_dir: configDir,
  };
}

export function defaultCertrunConfig(paths?: PathsContext, cwd?: string): CertrunConfig {
  const cfg = CertrunConfigSchema.parse({});
  return {
    ...cfg,
    session_root: defaultSessionRoot(paths),
    base_dir: path.resolve(cwd ?? process.cwd()),
  };
}

/** Resolves and loads the config, falling back to defaults when none exists. */
export function loadConfigForCli(
  args: { explicitPath?: string; cwd?: string; paths?: PathsContext } = {},
): { config: CertrunConfig; resolution: ConfigResolution } {
  const resolution = resolveConfigPath(args);
  const config =
    resolution.configPath === null
      ? defaultCertrunConfig(args.paths, args.cwd)
      : loadCertrunConfig(resolution.configPath, args.paths);
  return { config, resolution };
}

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  defaultCertrunConfig,
  loadCertrunConfig,
  loadConfigForCli,
  resolveConfigPath,
} from "./config-loader.js";
import { ConfigError } from "./errors.js";

const ENV_NAME = "CERTRUN_TEST_SESSION_ROOT";

afterEach(() => {
  delete process.env[ENV_NAME];
});

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "certrun-config-"));
}

function writeConfig(dir: string, content: string): string {
  const configPath = path.join(dir, "config.yaml");
  fs.writeFileSync(configPath, content, "utf8");
  return configPath;
}

describe("loadCertrunConfig", () => {
  it("applies defaults and resolves paths against the config directory", () => {
    const dir = makeTempDir();
    process.env[ENV_NAME] = "sessions";
    const configPath = writeConfig(
      dir,
      [
        "session_root: ${CERTRUN_TEST_SESSION_ROOT}",
        "catalog:",
        "  - jobs/*.yaml",
        "resume:",
        "  ignore_checksum: true",
        "",
      ].join("\n"),
    );

    const config = loadCertrunConfig(configPath);

    expect(config.session_root).toBe(path.join(dir, "sessions"));
    expect(config.base_dir).toBe(dir);
    expect(config.catalog).toEqual(["jobs/*.yaml"]);
    expect(config.manual_overhead_seconds).toBe(30);
    expect(config.resume).toEqual({
      check_references: false,
      rewrite_legacy_paths: false,
      ignore_checksum: true,
    });
  });

  it("treats an empty file as all defaults", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(dir, "");

    const config = loadCertrunConfig(configPath, { certrunHome: dir });

    expect(config.session_root).toBe(path.join(dir, "sessions"));
    expect(config.catalog).toEqual([]);
  });

  it("fails when a referenced environment variable is unset", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(dir, "session_root: ${CERTRUN_TEST_SESSION_ROOT}\n");

    expect(() => loadCertrunConfig(configPath)).toThrow(
      `Environment variable CERTRUN_TEST_SESSION_ROOT is not set but is referenced in ${configPath} (session_root).`,
    );
  });

  it("lists schema problems", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(dir, "bogus: 1\nmanual_overhead_seconds: -5\n");

    expect(() => loadCertrunConfig(configPath)).toThrow(ConfigError);
    expect(() => loadCertrunConfig(configPath)).toThrow(/^Invalid config at .*:\n/);
    expect(() => loadCertrunConfig(configPath)).toThrow("<root>: Unrecognized keys: bogus");
  });

  it("reports YAML syntax errors", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(dir, "catalog: [unterminated\n");

    expect(() => loadCertrunConfig(configPath)).toThrow(
      `Failed to parse YAML config at ${configPath}`,
    );
  });

  it("reports a missing file", () => {
    const missing = path.join(makeTempDir(), "nope.yaml");

    expect(() => loadCertrunConfig(missing)).toThrow(`Config not found at ${missing}.`);
  });
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path", () => {
    expect(resolveConfigPath({ explicitPath: "/etc/certrun.yaml" })).toEqual({
      configPath: "/etc/certrun.yaml",
      source: "explicit",
    });
  });

  it("finds the repo config before the home config", () => {
    const cwd = makeTempDir();
    const home = makeTempDir();
    fs.mkdirSync(path.join(cwd, ".certrun"));
    const repoConfig = writeConfig(path.join(cwd, ".certrun"), "catalog: []\n");
    writeConfig(home, "catalog: []\n");

    expect(resolveConfigPath({ cwd, paths: { certrunHome: home } })).toEqual({
      configPath: repoConfig,
      source: "repo",
    });
  });

  it("falls back to the home config, then to defaults", () => {
    const cwd = makeTempDir();
    const home = makeTempDir();

    expect(resolveConfigPath({ cwd, paths: { certrunHome: home } }).source).toBe("defaults");

    const homeConfig = writeConfig(home, "catalog: []\n");
    expect(resolveConfigPath({ cwd, paths: { certrunHome: home } })).toEqual({
      configPath: homeConfig,
      source: "home",
    });
  });
});

describe("loadConfigForCli", () => {
  it("uses defaults when no config exists", () => {
    const cwd = makeTempDir();
    const home = makeTempDir();

    const { config, resolution } = loadConfigForCli({ cwd, paths: { certrunHome: home } });

    expect(resolution.source).toBe("defaults");
    expect(config).toEqual(defaultCertrunConfig({ certrunHome: home }, cwd));
    expect(config.session_root).toBe(path.join(home, "sessions"));
  });
});

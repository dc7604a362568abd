import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadJobCatalog } from "./catalog-loader.js";
import { CatalogError } from "./errors.js";

function makeCatalogDir(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "certrun-catalog-"));
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
  }
  return dir;
}

describe("loadJobCatalog", () => {
  it("loads YAML lists and JSON job objects in file order", async () => {
    const dir = makeCatalogDir({
      "jobs/b.json": JSON.stringify({ jobs: [{ id: "net/ping", plugin: "shell" }] }),
      "jobs/a.yaml": [
        "- id: audio/detect",
        "  plugin: resource",
        "- id: audio/playback",
        "  plugin: user-verify",
        "  depends: audio/detect",
        "",
      ].join("\n"),
      "other/c.yaml": "- id: ignored\n  plugin: shell\n",
    });

    const result = await loadJobCatalog(["jobs/*.yaml", "jobs/*.json"], dir);

    expect(result.files).toEqual([path.join(dir, "jobs/a.yaml"), path.join(dir, "jobs/b.json")]);
    expect(result.jobs.map((job) => job.id)).toEqual(["audio/detect", "audio/playback", "net/ping"]);
    expect(result.jobs[1].dependencies).toEqual(["audio/detect"]);
    expect(result.issues).toEqual([]);
  });

  it("skips empty files", async () => {
    const dir = makeCatalogDir({ "empty.yaml": "" });

    const result = await loadJobCatalog(["*.yaml"], dir);

    expect(result.jobs).toEqual([]);
    expect(result.issues).toEqual([]);
  });

  it("collects issues when not strict", async () => {
    const dir = makeCatalogDir({
      "a.yaml": "- id: good\n  plugin: shell\n- id: bad\n  plugin: robot\n",
      "b.yaml": "just a string\n",
      "c.yaml": "- id: [unterminated\n",
    });

    const result = await loadJobCatalog(["*.yaml"], dir, { strict: false });

    expect(result.jobs.map((job) => job.id)).toEqual(["good"]);
    expect(result.issues).toHaveLength(3);
    expect(result.issues[0]).toMatchObject({ file: path.join(dir, "a.yaml"), index: 1 });
    expect(result.issues[0].message).toMatch(/^Invalid job definition bad: /);
    expect(result.issues[1]).toEqual({
      file: path.join(dir, "b.yaml"),
      message: "Catalog file must be a list of job definitions",
    });
    expect(result.issues[2].message).toMatch(/^Failed to parse catalog file: /);
  });

  it("throws on the first broken file when strict", async () => {
    const dir = makeCatalogDir({ "a.yaml": "- id: bad\n  plugin: robot\n" });

    const load = loadJobCatalog(["*.yaml"], dir);

    await expect(load).rejects.toBeInstanceOf(CatalogError);
    await expect(load).rejects.toThrow(`${path.join(dir, "a.yaml")}[0]: Invalid job definition bad:`);
  });
});

import test, { afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { configPath, expandPath, loadConfig, parseSimpleYaml, updateConfigValue } from "../src/config";
import { makeTempDir } from "./helpers";

const previous = process.env.RELEASE_PREP_CONFIG_PATH;

function useTempConfig(): string {
  const file = path.join(makeTempDir(), "config.yml");
  process.env.RELEASE_PREP_CONFIG_PATH = file;
  return file;
}

afterEach(() => {
  if (previous === undefined) {
    delete process.env.RELEASE_PREP_CONFIG_PATH;
  } else {
    process.env.RELEASE_PREP_CONFIG_PATH = previous;
  }
});

test("parses sections, comments and quoted values", () => {
  const parsed = parseSimpleYaml(
    [
      "# release-prep configuration",
      "workspace:",
      '  default_root: "/srv/repos"  # working copies',
      "git:",
      "  bin: git",
      "  remote: 'upstream'",
      "  unknown: ignored"
    ].join("\n")
  );
  assert.deepEqual(parsed, { workspace: { default_root: "/srv/repos" }, git: { bin: "git", remote: "upstream" } });
});

test("defaults apply when no config file exists", () => {
  const file = useTempConfig();
  const config = loadConfig();
  assert.equal(configPath(), file);
  assert.equal(config.projects.file, path.join(path.dirname(file), "projects.json"));
  assert.equal(config.workspace.default_root, path.join(os.homedir(), "release-prep", "repos"));
  assert.deepEqual(config.git, { bin: "git", remote: "origin" });
});

test("config set writes the file and rejects unknown keys", () => {
  const file = useTempConfig();
  const updated = updateConfigValue("git.remote", "upstream");
  assert.equal(updated?.git.remote, "upstream");
  assert.equal(fs.existsSync(file), true);
  assert.equal(loadConfig().git.remote, "upstream");
  assert.equal(updateConfigValue("ai.model", "x"), null);
});

test("home shortcuts are expanded", () => {
  assert.equal(expandPath("~/repos"), path.join(os.homedir(), "repos"));
  assert.equal(expandPath("{{home}}/repos"), path.resolve(os.homedir(), "repos"));
});

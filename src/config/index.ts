import fs from "fs";
import os from "os";
import path from "path";

export type ReleasePrepConfig = {
  workspace: {
    default_root: string;
  };
  projects: {
    file: string;
  };
  git: {
    bin: string;
    remote: string;
  };
};

type PartialConfig = {
  workspace?: Partial<ReleasePrepConfig["workspace"]>;
  projects?: Partial<ReleasePrepConfig["projects"]>;
  git?: Partial<ReleasePrepConfig["git"]>;
};

export const CONFIG_KEYS = ["workspace.default_root", "projects.file", "git.bin", "git.remote"] as const;

function inferUserName(home: string): string {
  const normalized = home.replace(/\\/g, "/").split("/").filter((part) => part.length > 0);
  return normalized.length > 0 ? normalized[normalized.length - 1] : "user";
}

function configDir(): string {
  return process.env.APPDATA
    ? path.join(process.env.APPDATA, "release-prep")
    : path.join(os.homedir(), ".config", "release-prep");
}

export function configPath(): string {
  const override = process.env.RELEASE_PREP_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(configDir(), "config.yml");
}

export function defaultConfig(): ReleasePrepConfig {
  return {
    workspace: {
      default_root: path.join(os.homedir(), "release-prep", "repos")
    },
    projects: {
      file: path.join(path.dirname(configPath()), "projects.json")
    },
    git: {
      bin: "git",
      remote: "origin"
    }
  };
}

export function expandPath(value: string): string {
  let out = value.trim();
  const home = os.homedir();
  const user = inferUserName(home);
  out = out.replace(/\{\{user\}\}/gi, user);
  out = out.replace(/\{\{home\}\}/gi, home);
  if (out === "~") {
    out = home;
  } else if (out.startsWith("~/")) {
    out = path.join(home, out.slice(2));
  }
  return path.resolve(out);
}

export function parseSimpleYaml(raw: string): PartialConfig {
  const result: PartialConfig = {};
  let section = "";
  const lines = raw.split(/\r?\n/);
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(trimmed);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.+?)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const key = valueMatch[1];
    const value = valueMatch[2].replace(/\s+#.*$/, "").replace(/^["']|["']$/g, "");
    if (section === "workspace" && key === "default_root") {
      result.workspace = { default_root: value };
    } else if (section === "projects" && key === "file") {
      result.projects = { file: value };
    } else if (section === "git" && key === "bin") {
      result.git = { ...result.git, bin: value };
    } else if (section === "git" && key === "remote") {
      result.git = { ...result.git, remote: value };
    }
  }
  return result;
}

export function renderYaml(config: ReleasePrepConfig): string {
  return [
    "# release-prep configuration",
    "# You can use {{user}}, {{home}} or ~/ in paths",
    "workspace:",
    `  default_root: ${config.workspace.default_root}`,
    "projects:",
    `  file: ${config.projects.file}`,
    "git:",
    `  bin: ${config.git.bin}`,
    `  remote: ${config.git.remote}`,
    ""
  ].join("\n");
}

function nonEmpty(value: string | undefined): string | null {
  const clean = (value ?? "").trim();
  return clean ? clean : null;
}

export function mergeConfig(base: ReleasePrepConfig, input: PartialConfig): ReleasePrepConfig {
  const root = nonEmpty(input.workspace?.default_root);
  const projectsFile = nonEmpty(input.projects?.file);
  return {
    workspace: {
      default_root: root ? expandPath(root) : base.workspace.default_root
    },
    projects: {
      file: projectsFile ? expandPath(projectsFile) : base.projects.file
    },
    git: {
      bin: nonEmpty(input.git?.bin) ?? base.git.bin,
      remote: nonEmpty(input.git?.remote) ?? base.git.remote
    }
  };
}

export function loadConfig(): ReleasePrepConfig {
  const defaults = defaultConfig();
  const file = configPath();
  if (!fs.existsSync(file)) {
    return defaults;
  }
  const raw = fs.readFileSync(file, "utf-8");
  return mergeConfig(defaults, parseSimpleYaml(raw));
}

export function saveConfig(config: ReleasePrepConfig): string {
  const file = configPath();
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(config), "utf-8");
  return file;
}

export function ensureConfig(): ReleasePrepConfig {
  const existing = loadConfig();
  if (!fs.existsSync(configPath())) {
    saveConfig(existing);
  }
  return existing;
}

export function updateConfigValue(key: string, value: string): ReleasePrepConfig | null {
  const current = ensureConfig();
  const next: ReleasePrepConfig = {
    workspace: { ...current.workspace },
    projects: { ...current.projects },
    git: { ...current.git }
  };
  const normalized = key.trim().toLowerCase();
  if (normalized === "workspace.default_root") {
    next.workspace.default_root = expandPath(value);
  } else if (normalized === "projects.file") {
    next.projects.file = expandPath(value);
  } else if (normalized === "git.bin") {
    next.git.bin = value.trim() || next.git.bin;
  } else if (normalized === "git.remote") {
    next.git.remote = value.trim() || next.git.remote;
  } else {
    return null;
  }
  saveConfig(next);
  return next;
}

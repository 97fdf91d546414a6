import fs from "fs";
import path from "path";
import { ReleasePrepConfig, expandPath, loadConfig } from "../config";
import { ErrorCode, ErrorCodes, describeError } from "../errors";
import { Project } from "../types";
import { validateJson } from "../validation/validate";
import { parseProjectType } from "../versioning";

const SCHEMA_FILE = "projects.schema.json";

/** Registry entry as stored on disk. */
export type ProjectEntry = {
  name: string;
  type: string;
  git_url: string;
  dev_branch: string;
  release_branch: string;
  local_path?: string;
  project_file_path: string;
};

export type RegistryFailure = { ok: false; code: ErrorCode; error: string };
export type RegistryResult<T> = ({ ok: true } & T) | RegistryFailure;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value.trim() : "";
}

function toEntry(record: Record<string, unknown>): ProjectEntry {
  const localPath = text(record, "local_path");
  return {
    name: text(record, "name"),
    type: text(record, "type"),
    git_url: text(record, "git_url"),
    dev_branch: text(record, "dev_branch"),
    release_branch: text(record, "release_branch"),
    ...(localPath ? { local_path: localPath } : {}),
    project_file_path: text(record, "project_file_path")
  };
}

export function resolveLocalPath(entry: ProjectEntry, defaultRoot: string): string {
  if (!entry.local_path) {
    return path.join(defaultRoot, entry.name);
  }
  const raw = entry.local_path;
  if (path.isAbsolute(raw) || raw.startsWith("~") || raw.startsWith("{{")) {
    return expandPath(raw);
  }
  return path.resolve(defaultRoot, raw);
}

export function toProject(entry: ProjectEntry, defaultRoot: string): Project | null {
  const type = parseProjectType(entry.type);
  if (!type) {
    return null;
  }
  return {
    name: entry.name,
    type,
    gitUrl: entry.git_url,
    devBranch: entry.dev_branch,
    releaseBranch: entry.release_branch,
    localPath: resolveLocalPath(entry, defaultRoot),
    projectFilePath: entry.project_file_path
  };
}

export function readRegistry(config: ReleasePrepConfig = loadConfig()): RegistryResult<{ entries: ProjectEntry[] }> {
  const file = config.projects.file;
  if (!fs.existsSync(file)) {
    return { ok: true, entries: [] };
  }
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    return { ok: false, code: ErrorCodes.REGISTRY_READ, error: `Could not read ${file}: ${describeError(error)}` };
  }
  const validation = validateJson(SCHEMA_FILE, data);
  if (!validation.valid) {
    return {
      ok: false,
      code: ErrorCodes.REGISTRY_INVALID,
      error: `Invalid project registry ${file}: ${validation.errors.join("; ")}`
    };
  }
  const rawProjects = isRecord(data) && Array.isArray(data.projects) ? data.projects : [];
  return { ok: true, entries: rawProjects.filter(isRecord).map(toEntry) };
}

export function loadProjects(config: ReleasePrepConfig = loadConfig()): RegistryResult<{ projects: Project[] }> {
  const registry = readRegistry(config);
  if (!registry.ok) {
    return registry;
  }
  const projects: Project[] = [];
  for (const entry of registry.entries) {
    const project = toProject(entry, config.workspace.default_root);
    if (project) {
      projects.push(project);
    }
  }
  return { ok: true, projects };
}

export function findProject(name: string, config: ReleasePrepConfig = loadConfig()): RegistryResult<{ project: Project }> {
  const loaded = loadProjects(config);
  if (!loaded.ok) {
    return loaded;
  }
  const wanted = name.trim().toLowerCase();
  const project = loaded.projects.find((candidate) => candidate.name.toLowerCase() === wanted);
  if (!project) {
    const known = loaded.projects.map((candidate) => candidate.name);
    return {
      ok: false,
      code: ErrorCodes.PROJECT_NOT_FOUND,
      error: `Project not found: ${name}. Known projects: ${known.length > 0 ? known.join(", ") : "none"}`
    };
  }
  return { ok: true, project };
}

export function addProject(entry: ProjectEntry, config: ReleasePrepConfig = loadConfig()): RegistryResult<{ file: string }> {
  const registry = readRegistry(config);
  if (!registry.ok) {
    return registry;
  }
  const normalized = { ...entry, type: parseProjectType(entry.type) ?? entry.type };
  const wanted = normalized.name.trim().toLowerCase();
  if (registry.entries.some((existing) => existing.name.toLowerCase() === wanted)) {
    return { ok: false, code: ErrorCodes.PROJECT_EXISTS, error: `Project already registered: ${normalized.name}` };
  }
  const next = { projects: [...registry.entries, normalized] };
  const validation = validateJson(SCHEMA_FILE, next);
  if (!validation.valid) {
    return { ok: false, code: ErrorCodes.REGISTRY_INVALID, error: `Invalid project: ${validation.errors.join("; ")}` };
  }
  const file = config.projects.file;
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, `${JSON.stringify(next, null, 2)}\n`, "utf-8");
  return { ok: true, file };
}

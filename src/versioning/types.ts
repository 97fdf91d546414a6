import { Project, ProjectType } from "../types";

export type IncrementKind = "major" | "minor" | "patch";

export type VersionLookup =
  | { found: true; version: string; file: string }
  | { found: false; reason: string };

export type PlatformKind = "android" | "ios" | "other";

export type FileOutcome = {
  file: string;
  platform: PlatformKind;
  status: "updated" | "failed" | "skipped";
  detail: string;
  tags: string[];
  warnings: string[];
};

export type VersionUpdateResult = {
  ok: boolean;
  message: string;
  files?: FileOutcome[];
};

export type VersionService = {
  id: ProjectType;
  label: string;
  getCurrentVersion: (project: Project) => VersionLookup;
  updateVersion: (project: Project, newVersion: string) => VersionUpdateResult;
  incrementVersion: (version: string, kind?: IncrementKind) => string;
};

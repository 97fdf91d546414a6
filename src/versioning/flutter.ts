import fs from "fs";
import path from "path";
import { Project } from "../types";
import { describeError } from "../errors";
import { incrementVersion } from "./increment";
import { VersionLookup, VersionService, VersionUpdateResult } from "./types";

const VERSION_READ_PATTERN = /^version:\s+(\d+\.\d+\.\d+(?:\+\d+)?)/m;
const VERSION_LINE_PATTERN = /^version:\s+\d+\.\d+\.\d+.*$/m;

function pubspecPath(project: Project): string {
  return path.join(project.localPath, project.projectFilePath);
}

export function readFlutterVersion(content: string): string | null {
  const match = VERSION_READ_PATTERN.exec(content);
  return match ? match[1] : null;
}

export function writeFlutterVersion(content: string, newVersion: string): string | null {
  if (!VERSION_LINE_PATTERN.test(content)) {
    return null;
  }
  return content.replace(VERSION_LINE_PATTERN, () => `version: ${newVersion}`);
}

function getCurrentVersion(project: Project): VersionLookup {
  const file = pubspecPath(project);
  if (!fs.existsSync(file)) {
    return { found: false, reason: `Project file not found: ${file}` };
  }
  try {
    const version = readFlutterVersion(fs.readFileSync(file, "utf-8"));
    if (!version) {
      return {
        found: false,
        reason: `No "version: X.Y.Z+N" line at the start of a line in ${project.projectFilePath}`
      };
    }
    return { found: true, version, file: project.projectFilePath };
  } catch (error) {
    return { found: false, reason: `Could not read ${file}: ${describeError(error)}` };
  }
}

function updateVersion(project: Project, newVersion: string): VersionUpdateResult {
  const file = pubspecPath(project);
  if (!fs.existsSync(file)) {
    return { ok: false, message: `Project file not found: ${file}` };
  }
  try {
    const updated = writeFlutterVersion(fs.readFileSync(file, "utf-8"), newVersion);
    if (updated === null) {
      return {
        ok: false,
        message: `No version line found in ${project.projectFilePath}. Expected a line such as "version: 1.0.0+1" in pubspec.yaml.`
      };
    }
    fs.writeFileSync(file, updated, "utf-8");
    return { ok: true, message: `Version updated to ${newVersion} in ${project.projectFilePath}` };
  } catch (error) {
    return { ok: false, message: `Failed to update version in ${file}: ${describeError(error)}` };
  }
}

export const flutterVersionService: VersionService = {
  id: "flutter",
  label: "Flutter",
  getCurrentVersion,
  updateVersion,
  incrementVersion
};

import fs from "fs";
import path from "path";
import { Project } from "../types";
import { describeError } from "../errors";
import { incrementVersion } from "./increment";
import { firstPropertyValue, hasProperty, parseMsBuild, propertyGroups, findProperty, replaceElementText } from "./msbuild-xml";
import { VersionLookup, VersionService, VersionUpdateResult } from "./types";

const DISPLAY_VERSION_TAG = "ApplicationDisplayVersion";
const BUILD_COUNTER_TAG = "ApplicationVersion";

export type MauiVersionEdit =
  | { ok: true; content: string; previousBuild: number | null; nextBuild: number | null }
  | { ok: false; error: string };

function csprojPath(project: Project): string {
  return path.join(project.localPath, project.projectFilePath);
}

function parseBuildCounter(raw: string): number {
  const clean = raw.trim();
  return /^\d+$/.test(clean) && Number.isSafeInteger(Number(clean)) ? Number(clean) : 1;
}

/**
 * Computes the edited descriptor in memory. Nothing is returned for writing
 * unless the display version tag exists.
 */
export function editMauiVersion(content: string, newVersion: string): MauiVersionEdit {
  const parsed = parseMsBuild(content);
  if (!parsed.ok) {
    return { ok: false, error: parsed.error };
  }
  const document = parsed.document;
  if (!hasProperty(document, DISPLAY_VERSION_TAG)) {
    return {
      ok: false,
      error: `No <${DISPLAY_VERSION_TAG}> element found in a PropertyGroup. Add <${DISPLAY_VERSION_TAG}>1.0.0</${DISPLAY_VERSION_TAG}> and <${BUILD_COUNTER_TAG}>1</${BUILD_COUNTER_TAG}>.`
    };
  }

  // Highest counter across all groups, conditional ones included.
  let previousBuild: number | null = null;
  for (const group of propertyGroups(document)) {
    const element = findProperty(document, group, BUILD_COUNTER_TAG);
    if (element) {
      previousBuild = Math.max(previousBuild ?? 0, parseBuildCounter(element.text));
    }
  }

  const display = replaceElementText(content, DISPLAY_VERSION_TAG, newVersion);
  if (display.count === 0) {
    return { ok: false, error: `<${DISPLAY_VERSION_TAG}> must contain plain text to be rewritten` };
  }
  let next = display.content;
  let nextBuild: number | null = null;
  if (previousBuild !== null) {
    nextBuild = previousBuild + 1;
    next = replaceElementText(next, BUILD_COUNTER_TAG, String(nextBuild)).content;
  }
  return { ok: true, content: next, previousBuild, nextBuild };
}

function getCurrentVersion(project: Project): VersionLookup {
  const file = csprojPath(project);
  if (!fs.existsSync(file)) {
    return { found: false, reason: `Project file not found: ${file}` };
  }
  try {
    const parsed = parseMsBuild(fs.readFileSync(file, "utf-8"));
    if (!parsed.ok) {
      return { found: false, reason: `${project.projectFilePath}: ${parsed.error}` };
    }
    const version = firstPropertyValue(parsed.document, [DISPLAY_VERSION_TAG]);
    if (!version) {
      return { found: false, reason: `No <${DISPLAY_VERSION_TAG}> value in ${project.projectFilePath}` };
    }
    return { found: true, version, file: project.projectFilePath };
  } catch (error) {
    return { found: false, reason: `Could not read ${file}: ${describeError(error)}` };
  }
}

function updateVersion(project: Project, newVersion: string): VersionUpdateResult {
  const file = csprojPath(project);
  if (!fs.existsSync(file)) {
    return { ok: false, message: `Project file not found: ${file}` };
  }
  try {
    const edit = editMauiVersion(fs.readFileSync(file, "utf-8"), newVersion);
    if (!edit.ok) {
      return { ok: false, message: `${project.projectFilePath}: ${edit.error}` };
    }
    fs.writeFileSync(file, edit.content, "utf-8");
    const build =
      edit.previousBuild !== null && edit.nextBuild !== null
        ? ` (${BUILD_COUNTER_TAG}: ${edit.previousBuild} → ${edit.nextBuild})`
        : ` (no <${BUILD_COUNTER_TAG}> build counter present)`;
    return { ok: true, message: `Version updated to ${newVersion} in ${project.projectFilePath}${build}` };
  } catch (error) {
    return { ok: false, message: `Failed to update version in ${file}: ${describeError(error)}` };
  }
}

export const dotnetMauiVersionService: VersionService = {
  id: "dotnet_maui",
  label: ".NET MAUI",
  getCurrentVersion,
  updateVersion,
  incrementVersion
};

import fs from "fs";
import path from "path";
import { Project } from "../types";
import { describeError } from "../errors";
import { logInfo, logWarn } from "../ui/log";
import { incrementVersion, parseVersionTriple } from "./increment";
import { firstPropertyValue, hasProperty, parseMsBuild, replaceElementText } from "./msbuild-xml";
import { FileOutcome, PlatformKind, VersionLookup, VersionService, VersionUpdateResult } from "./types";

export type WritablePlatform = Exclude<PlatformKind, "other">;

export type PlatformDescriptor = {
  relativePath: string;
  platform: PlatformKind;
  label: string;
};

export type PlatformEdit =
  | { ok: true; content: string; tags: string[]; warnings: string[] }
  | { ok: false; error: string };

type PlatformRead = { ok: true; version: string | null } | { ok: false; error: string };

const PLATFORM_SUFFIXES: Array<{ suffix: string; platform: PlatformKind; label: string }> = [
  { suffix: ".Android.csproj", platform: "android", label: "Android" },
  { suffix: ".Droid.csproj", platform: "android", label: "Android" },
  { suffix: ".iOS.csproj", platform: "ios", label: "iOS" },
  { suffix: ".UWP.csproj", platform: "other", label: "UWP" },
  { suffix: ".WinPhone.csproj", platform: "other", label: "WinPhone" }
];

const READ_TAGS: Record<WritablePlatform, string[]> = {
  android: ["ApplicationVersion"],
  ios: ["ApplicationVersion", "CFBundleShortVersionString"]
};

const IOS_TAGS = ["ApplicationVersion", "CFBundleVersion", "CFBundleShortVersionString"];

const TAG_GUIDANCE: Record<WritablePlatform, string> = {
  android: "Android: <ApplicationVersion>X.Y.Z</ApplicationVersion> and <AndroidVersionCode>N</AndroidVersionCode>",
  ios: "iOS: <ApplicationVersion>X.Y.Z</ApplicationVersion>, <CFBundleVersion>X.Y.Z</CFBundleVersion> and <CFBundleShortVersionString>X.Y.Z</CFBundleShortVersionString>"
};

const FILE_GUIDANCE: Record<WritablePlatform, string> = {
  android: "Android (*.Android.csproj or *.Droid.csproj)",
  ios: "iOS (*.iOS.csproj)"
};

export function isWritable(platform: PlatformKind): platform is WritablePlatform {
  return platform === "android" || platform === "ios";
}

export function classifyPlatformFile(fileName: string): { platform: PlatformKind; label: string } | null {
  const lower = fileName.toLowerCase();
  const entry = PLATFORM_SUFFIXES.find((candidate) => lower.endsWith(candidate.suffix.toLowerCase()));
  return entry ? { platform: entry.platform, label: entry.label } : null;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/**
 * Walks the working copy for platform-suffixed project files. Within a
 * directory files come before subdirectories, both sorted by name; hidden
 * directories are skipped.
 */
export function discoverPlatformDescriptors(root: string): PlatformDescriptor[] {
  const found: PlatformDescriptor[] = [];
  const walk = (current: string): void => {
    const entries = fs.readdirSync(current, { withFileTypes: true }).sort(byName);
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const kind = classifyPlatformFile(entry.name);
      if (kind) {
        const relativePath = path.relative(root, path.join(current, entry.name)).replace(/\\/g, "/");
        found.push({ relativePath, ...kind });
      }
    }
    for (const entry of entries) {
      if (entry.isDirectory() && !entry.name.startsWith(".")) {
        walk(path.join(current, entry.name));
      }
    }
  };
  walk(root);
  return found;
}

export function readPlatformVersion(content: string, platform: WritablePlatform): PlatformRead {
  const parsed = parseMsBuild(content);
  if (!parsed.ok) {
    return { ok: false, error: parsed.error };
  }
  return { ok: true, version: firstPropertyValue(parsed.document, READ_TAGS[platform]) };
}

function editAndroid(content: string, newVersion: string, hasVersionCode: boolean): PlatformEdit {
  const tags: string[] = [];
  const warnings: string[] = [];
  const primary = replaceElementText(content, "ApplicationVersion", newVersion);
  if (primary.count > 0) {
    tags.push("ApplicationVersion");
  }
  let next = primary.content;
  const triple = parseVersionTriple(newVersion);
  if (triple) {
    const [major, minor, patch] = triple;
    const code = replaceElementText(next, "AndroidVersionCode", String(major * 10000 + minor * 100 + patch));
    if (code.count > 0) {
      tags.push("AndroidVersionCode");
      next = code.content;
    }
  } else if (hasVersionCode) {
    warnings.push(`AndroidVersionCode left unchanged: "${newVersion}" is not MAJOR.MINOR.PATCH`);
  }
  return { ok: true, content: next, tags, warnings };
}

function editIos(content: string, newVersion: string): PlatformEdit {
  const tags: string[] = [];
  let next = content;
  for (const tag of IOS_TAGS) {
    const result = replaceElementText(next, tag, newVersion);
    if (result.count > 0) {
      tags.push(tag);
      next = result.content;
    }
  }
  return { ok: true, content: next, tags, warnings: [] };
}

export function editPlatformDescriptor(content: string, platform: WritablePlatform, newVersion: string): PlatformEdit {
  const parsed = parseMsBuild(content);
  if (!parsed.ok) {
    return { ok: false, error: parsed.error };
  }
  const edit =
    platform === "android"
      ? editAndroid(content, newVersion, hasProperty(parsed.document, "AndroidVersionCode"))
      : editIos(content, newVersion);
  if (edit.ok && edit.tags.length === 0) {
    return { ok: false, error: `No version tags found. Expected ${TAG_GUIDANCE[platform]}` };
  }
  return edit;
}

function updateDescriptor(root: string, descriptor: PlatformDescriptor, newVersion: string): FileOutcome {
  const base = { file: descriptor.relativePath, platform: descriptor.platform };
  if (!isWritable(descriptor.platform)) {
    return { ...base, status: "skipped", detail: `${descriptor.label} project, not written`, tags: [], warnings: [] };
  }
  const file = path.join(root, descriptor.relativePath);
  try {
    const edit = editPlatformDescriptor(fs.readFileSync(file, "utf-8"), descriptor.platform, newVersion);
    if (!edit.ok) {
      return { ...base, status: "failed", detail: edit.error, tags: [], warnings: [] };
    }
    fs.writeFileSync(file, edit.content, "utf-8");
    return {
      ...base,
      status: "updated",
      detail: `set ${edit.tags.join(", ")}`,
      tags: edit.tags,
      warnings: edit.warnings
    };
  } catch (error) {
    return { ...base, status: "failed", detail: describeError(error), tags: [], warnings: [] };
  }
}

function platformSummary(descriptors: PlatformDescriptor[]): string {
  const counts = new Map<string, number>();
  for (const descriptor of descriptors) {
    counts.set(descriptor.label, (counts.get(descriptor.label) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .map(([label, count]) => `${label} (${count})`)
    .join(", ");
}

function outcomeLines(outcomes: FileOutcome[]): string[] {
  return outcomes.map((outcome) => `  - ${outcome.file} [${outcome.platform}]: ${outcome.detail}`);
}

export function formatXamarinReport(newVersion: string, descriptors: PlatformDescriptor[], outcomes: FileOutcome[]): string {
  const updated = outcomes.filter((outcome) => outcome.status === "updated");
  const failed = outcomes.filter((outcome) => outcome.status === "failed");
  const skipped = outcomes.filter((outcome) => outcome.status === "skipped");
  const warnings = outcomes.flatMap((outcome) => outcome.warnings.map((warning) => `  - ${outcome.file}: ${warning}`));

  const lines: string[] = [];
  if (updated.length > 0) {
    lines.push(failed.length === 0 ? `Version updated to ${newVersion}` : `Version partially updated to ${newVersion}`);
    lines.push(`Platforms: ${platformSummary(descriptors)}`);
  } else {
    lines.push(`Could not update the version to ${newVersion} in any platform file`);
    const missing = (["android", "ios"] as const).filter(
      (platform) => !descriptors.some((descriptor) => descriptor.platform === platform)
    );
    if (missing.length > 0) {
      lines.push("Missing platforms:", ...missing.map((platform) => `  - ${FILE_GUIDANCE[platform]}`));
    }
  }
  if (updated.length > 0) {
    lines.push("Updated files:", ...outcomeLines(updated));
  }
  if (failed.length > 0) {
    lines.push("Failed files:", ...outcomeLines(failed));
  }
  if (skipped.length > 0) {
    lines.push("Skipped files:", ...outcomeLines(skipped));
  }
  if (warnings.length > 0) {
    lines.push("Warnings:", ...warnings);
  }
  if (updated.length === 0) {
    lines.push("Expected version tags:", `  - ${TAG_GUIDANCE.android}`, `  - ${TAG_GUIDANCE.ios}`);
  }
  return lines.join("\n");
}

function expectedFilesGuidance(): string {
  return ["Expected at least one of:", `  - ${FILE_GUIDANCE.android}`, `  - ${FILE_GUIDANCE.ios}`].join("\n");
}

function noDescriptorsMessage(root: string): string {
  return `No platform project files found under ${root}\n${expectedFilesGuidance()}`;
}

function getCurrentVersion(project: Project): VersionLookup {
  if (!fs.existsSync(project.localPath)) {
    return { found: false, reason: `Working copy not found: ${project.localPath}` };
  }
  const descriptors = discoverPlatformDescriptors(project.localPath);
  if (descriptors.length === 0) {
    return { found: false, reason: noDescriptorsMessage(project.localPath) };
  }
  logInfo(`Found ${descriptors.length} platform files: ${descriptors.map((d) => d.relativePath).join(", ")}`);

  for (const descriptor of descriptors) {
    const platform = descriptor.platform;
    if (!isWritable(platform)) {
      continue;
    }
    let read: PlatformRead;
    try {
      read = readPlatformVersion(fs.readFileSync(path.join(project.localPath, descriptor.relativePath), "utf-8"), platform);
    } catch (error) {
      read = { ok: false, error: describeError(error) };
    }
    if (!read.ok) {
      logWarn(`Skipping ${descriptor.relativePath}: ${read.error}`);
      continue;
    }
    if (read.version) {
      logInfo(`Version ${read.version} found in ${descriptor.relativePath}`);
      return { found: true, version: read.version, file: descriptor.relativePath };
    }
  }

  const writable = descriptors.filter((descriptor) => isWritable(descriptor.platform));
  if (writable.length === 0) {
    return {
      found: false,
      reason: `Only unsupported platform files found (${platformSummary(descriptors)}).\n${expectedFilesGuidance()}`
    };
  }
  return {
    found: false,
    reason: `Platform files found (${platformSummary(writable)}) but none carries a version tag. Expected ${TAG_GUIDANCE.android}; ${TAG_GUIDANCE.ios}`
  };
}

function updateVersion(project: Project, newVersion: string): VersionUpdateResult {
  if (!fs.existsSync(project.localPath)) {
    return { ok: false, message: `Working copy not found: ${project.localPath}`, files: [] };
  }
  const descriptors = discoverPlatformDescriptors(project.localPath);
  if (descriptors.length === 0) {
    return { ok: false, message: noDescriptorsMessage(project.localPath), files: [] };
  }

  const outcomes = descriptors.map((descriptor) => {
    const outcome = updateDescriptor(project.localPath, descriptor, newVersion);
    if (outcome.status === "failed") {
      logWarn(`Version not updated in ${outcome.file}: ${outcome.detail}`);
    } else {
      logInfo(`${outcome.file}: ${outcome.status} (${outcome.detail})`);
    }
    outcome.warnings.forEach((warning) => logWarn(`${outcome.file}: ${warning}`));
    return outcome;
  });

  return {
    ok: outcomes.some((outcome) => outcome.status === "updated"),
    message: formatXamarinReport(newVersion, descriptors, outcomes),
    files: outcomes
  };
}

export const xamarinVersionService: VersionService = {
  id: "xamarin",
  label: "Xamarin",
  getCurrentVersion,
  updateVersion,
  incrementVersion
};

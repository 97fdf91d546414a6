import fs from "fs";
import path from "path";
import { ErrorCodes, describeError } from "../errors";
import { logError } from "../ui/log";
import { discoverPlatformDescriptors, isWritable, readPlatformVersion } from "../versioning/xamarin";

function describeVersion(root: string, relativePath: string, platform: "android" | "ios"): string {
  try {
    const read = readPlatformVersion(fs.readFileSync(path.join(root, relativePath), "utf-8"), platform);
    if (!read.ok) {
      return read.error;
    }
    return read.version ? `version ${read.version}` : "no version tag";
  } catch (error) {
    return `unreadable: ${describeError(error)}`;
  }
}

/** One line per platform project file found under `root`, in discovery order. */
export function inspectXamarinTree(root: string): string[] {
  const descriptors = discoverPlatformDescriptors(root);
  if (descriptors.length === 0) {
    return ["No platform project files found."];
  }
  const lines = [`Platform project files (${descriptors.length}):`];
  for (const descriptor of descriptors) {
    const status = isWritable(descriptor.platform)
      ? describeVersion(root, descriptor.relativePath, descriptor.platform)
      : "not versioned";
    lines.push(`- ${descriptor.relativePath} [${descriptor.label}]: ${status}`);
  }
  return lines;
}

export function runInspect(target: string): void {
  const root = path.resolve(target);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    logError(ErrorCodes.USAGE, `Not a directory: ${root}`);
    process.exitCode = 1;
    return;
  }
  inspectXamarinTree(root).forEach((line) => console.log(line));
}

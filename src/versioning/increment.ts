import { IncrementKind } from "./types";

const INTEGER_PART = /^\d+$/;

export function parseVersionTriple(version: string): [number, number, number] | null {
  const parts = version.split(".");
  if (parts.length !== 3 || !parts.every((part) => INTEGER_PART.test(part))) {
    return null;
  }
  const [major, minor, patch] = parts.map(Number);
  // The bumped value must also be a safe integer.
  if (![major, minor, patch].every((value) => Number.isSafeInteger(value + 1))) {
    return null;
  }
  return [major, minor, patch];
}

export function parseIncrementKind(input?: string): IncrementKind | null {
  const clean = (input ?? "").trim().toLowerCase();
  if (clean === "major" || clean === "minor" || clean === "patch") {
    return clean;
  }
  return null;
}

// Total: anything that is not X.Y or X.Y.Z (after dropping +build) gets ".1" appended.
export function incrementVersion(version: string, kind: IncrementKind = "patch"): string {
  const base = version.split("+")[0];
  const parts = base.split(".");
  if (parts.length === 2) {
    parts.push("0");
  }
  const triple = parseVersionTriple(parts.join("."));
  if (!triple) {
    return `${version}.1`;
  }
  let [major, minor, patch] = triple;
  if (kind === "major") {
    major += 1;
    minor = 0;
    patch = 0;
  } else if (kind === "minor") {
    minor += 1;
    patch = 0;
  } else {
    patch += 1;
  }
  return `${major}.${minor}.${patch}`;
}

export function isReleaseVersion(version: string): boolean {
  return /^\d+\.\d+\.\d+(\+\d+)?$/.test(version);
}

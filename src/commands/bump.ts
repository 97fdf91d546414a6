import { ErrorCodes } from "../errors";
import { logError } from "../ui/log";
import { incrementVersion, parseIncrementKind } from "../versioning";

export function runBump(version: string, kind?: string): void {
  const parsed = kind === undefined ? "patch" : parseIncrementKind(kind);
  if (!parsed) {
    logError(ErrorCodes.USAGE, `Unknown increment kind "${kind ?? ""}". Use major, minor or patch.`);
    process.exitCode = 1;
    return;
  }
  console.log(incrementVersion(version.trim(), parsed));
}

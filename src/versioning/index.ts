import { ProjectType } from "../types";
import { dotnetMauiVersionService } from "./dotnet-maui";
import { flutterVersionService } from "./flutter";
import { VersionService } from "./types";
import { xamarinVersionService } from "./xamarin";

const SERVICES: Record<ProjectType, VersionService> = {
  flutter: flutterVersionService,
  dotnet_maui: dotnetMauiVersionService,
  xamarin: xamarinVersionService
};

const SUPPORTED_ORDER: ProjectType[] = ["flutter", "dotnet_maui", "xamarin"];

const ALIASES: Record<string, ProjectType> = {
  flutter: "flutter",
  dotnet_maui: "dotnet_maui",
  "dotnet-maui": "dotnet_maui",
  maui: "dotnet_maui",
  xamarin: "xamarin"
};

export type VersionServiceResolution =
  | { ok: true; service: VersionService }
  | { ok: false; requested: string; details: string };

export function supportedProjectTypes(): ProjectType[] {
  return [...SUPPORTED_ORDER];
}

export function parseProjectType(input?: string): ProjectType | null {
  const raw = (input ?? "").trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(ALIASES, raw) ? ALIASES[raw] : null;
}

export function resolveVersionService(type: string): VersionServiceResolution {
  const normalized = SUPPORTED_ORDER.find((candidate) => candidate === type);
  if (!normalized) {
    return {
      ok: false,
      requested: type,
      details: `Project type "${type}" is not supported for automatic versioning. Use one of: ${SUPPORTED_ORDER.join(", ")}.`
    };
  }
  return { ok: true, service: SERVICES[normalized] };
}

export { incrementVersion, isReleaseVersion, parseIncrementKind } from "./increment";
export type { FileOutcome, IncrementKind, PlatformKind, VersionLookup, VersionService, VersionUpdateResult } from "./types";

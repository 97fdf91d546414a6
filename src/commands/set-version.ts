import { ErrorCodes } from "../errors";
import { findProject } from "../projects";
import { logError } from "../ui/log";
import { confirm } from "../ui/prompt";
import { isReleaseVersion, resolveVersionService } from "../versioning";

export async function runSetVersion(projectName: string, version: string): Promise<void> {
  const target = version.trim();
  if (!isReleaseVersion(target)) {
    logError(ErrorCodes.USAGE, `Version "${target}" must look like MAJOR.MINOR.PATCH or MAJOR.MINOR.PATCH+BUILD`);
    process.exitCode = 1;
    return;
  }
  const lookup = findProject(projectName);
  if (!lookup.ok) {
    logError(lookup.code, lookup.error);
    process.exitCode = 1;
    return;
  }
  const { project } = lookup;
  const resolution = resolveVersionService(project.type);
  if (!resolution.ok) {
    logError(ErrorCodes.UNSUPPORTED_TYPE, resolution.details);
    process.exitCode = 1;
    return;
  }
  if (!(await confirm(`Write version ${target} into ${project.localPath}? (y/N) `))) {
    logError(ErrorCodes.ABORTED, "Version change cancelled.");
    process.exitCode = 1;
    return;
  }
  const result = resolution.service.updateVersion(project, target);
  if (!result.ok) {
    logError(ErrorCodes.VERSION_UPDATE_FAILED, result.message);
    process.exitCode = 1;
    return;
  }
  console.log(result.message);
}

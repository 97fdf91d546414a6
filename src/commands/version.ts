import { ErrorCodes, formatError } from "../errors";
import { findProject } from "../projects";
import { logError } from "../ui/log";
import { resolveVersionService } from "../versioning";

export function runVersion(projectName: string): void {
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
  const current = resolution.service.getCurrentVersion(project);
  if (!current.found) {
    console.log(formatError(ErrorCodes.VERSION_NOT_FOUND, `${project.name}: ${current.reason}`));
    process.exitCode = 1;
    return;
  }
  console.log(`${project.name} (${resolution.service.label}): ${current.version}`);
  console.log(`Read from: ${current.file}`);
}

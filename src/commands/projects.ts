import { loadConfig } from "../config";
import { ErrorCodes } from "../errors";
import { addProject, loadProjects, ProjectEntry } from "../projects";
import { logError } from "../ui/log";
import { parseProjectType, supportedProjectTypes } from "../versioning";

export type AddProjectOptions = {
  type: string;
  gitUrl: string;
  devBranch?: string;
  releaseBranch?: string;
  localPath?: string;
  projectFile: string;
};

export function runProjectsList(): void {
  const loaded = loadProjects();
  if (!loaded.ok) {
    logError(loaded.code, loaded.error);
    process.exitCode = 1;
    return;
  }
  if (loaded.projects.length === 0) {
    console.log("No projects registered.");
    return;
  }
  console.log("Projects:");
  for (const project of loaded.projects) {
    console.log(`- ${project.name} (${project.type}) ${project.devBranch} -> ${project.releaseBranch}`);
    console.log(`  ${project.localPath}`);
  }
}

export function runProjectsAdd(name: string, options: AddProjectOptions): void {
  const type = parseProjectType(options.type);
  if (!type) {
    logError(
      ErrorCodes.UNSUPPORTED_TYPE,
      `Project type "${options.type}" is not supported. Use one of: ${supportedProjectTypes().join(", ")}.`
    );
    process.exitCode = 1;
    return;
  }
  const entry: ProjectEntry = {
    name: name.trim(),
    type,
    git_url: options.gitUrl,
    dev_branch: options.devBranch ?? "develop",
    release_branch: options.releaseBranch ?? "main",
    ...(options.localPath ? { local_path: options.localPath } : {}),
    project_file_path: options.projectFile
  };
  const config = loadConfig();
  const saved = addProject(entry, config);
  if (!saved.ok) {
    logError(saved.code, saved.error);
    process.exitCode = 1;
    return;
  }
  console.log(`Project ${entry.name} registered in ${saved.file}`);
}

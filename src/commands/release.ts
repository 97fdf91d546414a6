import { loadConfig } from "../config";
import { ErrorCodes } from "../errors";
import { createGitOperations } from "../git/operations";
import { findProject } from "../projects";
import { runReleasePipeline } from "../release/pipeline";
import { logError } from "../ui/log";
import { confirm } from "../ui/prompt";

export type ReleaseOptions = {
  version?: string;
};

export async function runRelease(projectName: string, options: ReleaseOptions = {}): Promise<void> {
  const config = loadConfig();
  const lookup = findProject(projectName, config);
  if (!lookup.ok) {
    logError(lookup.code, lookup.error);
    process.exitCode = 1;
    return;
  }
  const { project } = lookup;
  const target = options.version ? ` as ${options.version}` : "";
  const proceed = await confirm(
    `Merge ${project.devBranch} into ${project.releaseBranch} and push a release of ${project.name}${target}? (y/N) `
  );
  if (!proceed) {
    logError(ErrorCodes.ABORTED, "Release cancelled.");
    process.exitCode = 1;
    return;
  }

  const result = await runReleasePipeline(
    {
      project,
      targetVersion: options.version,
      sendMessage: async (text) => {
        console.log(text);
      }
    },
    { git: createGitOperations({ bin: config.git.bin, remote: config.git.remote }) }
  );
  if (!result.ok) {
    process.exitCode = 1;
  }
}

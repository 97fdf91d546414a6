import fs from "fs";
import path from "path";
import { Project } from "../types";
import { ErrorCodes, describeError, formatError } from "../errors";
import { GitOperations, GitStepResult } from "../git/operations";
import { logError, logInfo, logWarn } from "../ui/log";
import {
  FileOutcome,
  VersionService,
  VersionServiceResolution,
  isReleaseVersion,
  resolveVersionService
} from "../versioning";
import { formatAnnouncement, formatFailure, formatProgress, formatSummary } from "./report";
import { BEST_EFFORT_STAGES, ReleaseStage, STAGE_ORDER, StageRecord } from "./stages";

export const CHANGELOG_COMMITS = 5;

export type SendMessage = (text: string) => Promise<void>;

export type ReleaseRequest = {
  project: Project;
  targetVersion?: string;
  sendMessage: SendMessage;
};

export type PipelineDeps = {
  git: GitOperations;
  resolveService?: (type: string) => VersionServiceResolution;
};

export type PipelineResult = {
  ok: boolean;
  message: string;
  stages: StageRecord[];
  previousVersion?: string;
  nextVersion?: string;
  files?: FileOutcome[];
  changelog?: string;
};

type StageOutcome = {
  ok: boolean;
  detail: string;
  warning?: string;
};

type PipelineState = {
  project: Project;
  service: VersionService;
  targetVersion?: string;
  previousVersion?: string;
  nextVersion?: string;
  applyDetail?: string;
  files?: FileOutcome[];
  changelog?: string;
};

type StageHandler = (state: PipelineState) => StageOutcome;

function gitFailure(summary: string, result: GitStepResult): StageOutcome {
  return { ok: false, detail: `${summary}\n${result.output}` };
}

function gitStage(result: GitStepResult, success: string, failure: string): StageOutcome {
  if (!result.ok) {
    return gitFailure(failure, result);
  }
  return { ok: true, detail: success, warning: result.warning };
}

function buildStageHandlers(git: GitOperations): Record<ReleaseStage, StageHandler> {
  return {
    ensure_repository: ({ project }) => {
      if (!fs.existsSync(project.localPath)) {
        return gitStage(
          git.clone(project),
          `Cloned ${project.gitUrl} into ${project.localPath}`,
          `Could not clone ${project.gitUrl}`
        );
      }
      if (!fs.existsSync(path.join(project.localPath, ".git"))) {
        return { ok: false, detail: `${project.localPath} exists but is not a git working copy` };
      }
      return { ok: true, detail: `Using working copy at ${project.localPath}` };
    },
    checkout_dev: ({ project }) =>
      gitStage(
        git.checkout(project.localPath, project.devBranch),
        `On ${project.devBranch}`,
        `Could not check out ${project.devBranch}`
      ),
    pull_dev: ({ project }) =>
      gitStage(
        git.pull(project.localPath, project.devBranch),
        `Pulled ${project.devBranch}`,
        `Could not pull ${project.devBranch}`
      ),
    checkout_release: ({ project }) =>
      gitStage(
        git.checkout(project.localPath, project.releaseBranch),
        `On ${project.releaseBranch}`,
        `Could not check out ${project.releaseBranch}`
      ),
    pull_release: ({ project }) =>
      gitStage(
        git.pull(project.localPath, project.releaseBranch),
        `Pulled ${project.releaseBranch}`,
        `Could not pull ${project.releaseBranch}`
      ),
    merge_dev_into_release: ({ project }) =>
      gitStage(
        git.merge(project.localPath, project.devBranch, `Merge ${project.devBranch} into ${project.releaseBranch}`),
        `Merged ${project.devBranch} into ${project.releaseBranch}`,
        `Could not merge ${project.devBranch} into ${project.releaseBranch}. Resolve the merge by hand; no merge --abort was run.`
      ),
    determine_current_version: (state) => {
      const { project, service } = state;
      const head = git.currentBranch(project.localPath);
      if (!head.ok) {
        return gitFailure("Could not determine the current branch", head);
      }
      if (head.output.trim() !== project.releaseBranch) {
        return {
          ok: false,
          detail: `The version must be read on ${project.releaseBranch}, but HEAD is ${head.output.trim()}`
        };
      }
      const lookup = service.getCurrentVersion(project);
      if (!lookup.found) {
        return { ok: false, detail: `Could not determine the current ${service.label} version: ${lookup.reason}` };
      }
      state.previousVersion = lookup.version;
      return { ok: true, detail: `${lookup.version} (${lookup.file})` };
    },
    compute_next_version: (state) => {
      const { service, previousVersion } = state;
      if (previousVersion === undefined) {
        return { ok: false, detail: "No current version was determined" };
      }
      const target = state.targetVersion?.trim();
      if (target) {
        if (!isReleaseVersion(target)) {
          return {
            ok: false,
            detail: `Target version "${target}" must look like MAJOR.MINOR.PATCH or MAJOR.MINOR.PATCH+BUILD`
          };
        }
        state.nextVersion = target;
        return { ok: true, detail: `${previousVersion} → ${target} (requested)` };
      }
      state.nextVersion = service.incrementVersion(previousVersion, "patch");
      return { ok: true, detail: `${previousVersion} → ${state.nextVersion}` };
    },
    apply_version: (state) => {
      const { project, service, nextVersion } = state;
      if (nextVersion === undefined) {
        return { ok: false, detail: "No next version was computed" };
      }
      const result = service.updateVersion(project, nextVersion);
      state.files = result.files;
      state.applyDetail = result.message;
      return { ok: result.ok, detail: result.message };
    },
    stage_and_commit: ({ project, nextVersion }) => {
      const staged = git.stageAll(project.localPath);
      if (!staged.ok) {
        return gitFailure("Could not stage changes", staged);
      }
      const message = `#Release ${nextVersion ?? ""}`.trim();
      return gitStage(git.commit(project.localPath, message), `Committed "${message}"`, "Could not create the release commit");
    },
    push_release: ({ project }) =>
      gitStage(
        git.push(project.localPath, project.releaseBranch),
        `Pushed ${project.releaseBranch}`,
        `Could not push ${project.releaseBranch}`
      ),
    summarize: (state) => {
      const log = git.log(state.project.localPath, CHANGELOG_COMMITS);
      if (!log.ok || !log.output) {
        return { ok: true, detail: "No changelog available", warning: log.ok ? undefined : log.output };
      }
      state.changelog = log.output;
      return { ok: true, detail: `Collected ${log.output.split("\n").length} recent commits` };
    }
  };
}

async function notify(sendMessage: SendMessage, text: string): Promise<void> {
  try {
    await sendMessage(text);
  } catch (error) {
    logWarn(`Progress message could not be delivered: ${describeError(error)}`);
  }
}

function runStage(handler: StageHandler, stage: ReleaseStage, state: PipelineState): StageOutcome {
  let outcome: StageOutcome;
  try {
    outcome = handler(state);
  } catch (error) {
    outcome = { ok: false, detail: `Unexpected error: ${describeError(error)}` };
  }
  if (!outcome.ok && BEST_EFFORT_STAGES.has(stage)) {
    return { ok: true, detail: "continuing", warning: outcome.detail };
  }
  return outcome;
}

export async function runReleasePipeline(request: ReleaseRequest, deps: PipelineDeps): Promise<PipelineResult> {
  const { project, sendMessage } = request;
  const resolution = (deps.resolveService ?? resolveVersionService)(project.type);
  if (!resolution.ok) {
    const message = formatError(ErrorCodes.UNSUPPORTED_TYPE, resolution.details);
    await notify(sendMessage, message);
    return { ok: false, message, stages: [] };
  }

  const state: PipelineState = { project, service: resolution.service, targetVersion: request.targetVersion };
  const handlers = buildStageHandlers(deps.git);
  const stages: StageRecord[] = [];
  const snapshot = (ok: boolean, message: string): PipelineResult => ({
    ok,
    message,
    stages,
    previousVersion: state.previousVersion,
    nextVersion: state.nextVersion,
    files: state.files,
    changelog: state.changelog
  });

  for (const stage of STAGE_ORDER) {
    const outcome = runStage(handlers[stage], stage, state);
    const record: StageRecord = { stage, ...outcome };
    stages.push(record);
    if (!record.ok) {
      const message = formatFailure(project, record, stages);
      logError(ErrorCodes.STAGE_FAILED, `${project.name}: ${stage} failed`);
      await notify(sendMessage, message);
      return snapshot(false, message);
    }
    logInfo(`${project.name}: ${stage} ok`);
    await notify(sendMessage, formatProgress(record));
    if (stage === "compute_next_version" && state.previousVersion && state.nextVersion) {
      await notify(sendMessage, formatAnnouncement(project, state.previousVersion, state.nextVersion));
    }
  }

  const message = formatSummary({
    project,
    previousVersion: state.previousVersion ?? "",
    nextVersion: state.nextVersion ?? "",
    applyDetail: state.applyDetail ?? "",
    warnings: stages.filter((record) => record.warning),
    changelog: state.changelog
  });
  await notify(sendMessage, message);
  return snapshot(true, message);
}

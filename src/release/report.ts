import { Project } from "../types";
import { ErrorCodes, formatError } from "../errors";
import { ReleaseStage, STAGE_LABELS, STAGE_ORDER, StageRecord } from "./stages";

function stepNumber(stage: ReleaseStage): string {
  return `${STAGE_ORDER.indexOf(stage) + 1}/${STAGE_ORDER.length}`;
}

export function formatProgress(record: StageRecord): string {
  const lines = [`[${stepNumber(record.stage)}] ${STAGE_LABELS[record.stage]}: ${record.detail}`];
  if (record.warning) {
    lines.push(`  warning: ${record.warning}`);
  }
  return lines.join("\n");
}

export function formatAnnouncement(project: Project, previousVersion: string, nextVersion: string): string {
  return [
    `Preparing release for ${project.name}`,
    `Current version: ${previousVersion}`,
    `New version: ${nextVersion}`
  ].join("\n");
}

export function formatFailure(project: Project, failed: StageRecord, stages: StageRecord[]): string {
  const completed = stages.filter((record) => record.ok).map((record) => record.stage);
  const lines = [
    formatError(
      ErrorCodes.STAGE_FAILED,
      `Release preparation for ${project.name} failed at ${failed.stage} (${STAGE_LABELS[failed.stage]}, step ${stepNumber(failed.stage)})`
    ),
    failed.detail
  ];
  if (completed.length > 0) {
    lines.push(`Completed stages: ${completed.join(", ")}`);
    lines.push("Git state left by completed stages is not rolled back.");
  }
  return lines.join("\n");
}

export type ReleaseSummary = {
  project: Project;
  previousVersion: string;
  nextVersion: string;
  applyDetail: string;
  warnings: StageRecord[];
  changelog?: string;
};

export function formatSummary(summary: ReleaseSummary): string {
  const { project } = summary;
  const lines = [
    `Release prepared for ${project.name}`,
    `Version: ${summary.previousVersion} → ${summary.nextVersion}`,
    `Branch ${project.releaseBranch} pushed with commit "#Release ${summary.nextVersion}"`,
    "",
    summary.applyDetail
  ];
  if (summary.warnings.length > 0) {
    lines.push("", "Warnings:", ...summary.warnings.map((record) => `  - ${record.stage}: ${record.warning}`));
  }
  if (summary.changelog) {
    lines.push("", "Recent commits:", summary.changelog);
  }
  return lines.join("\n");
}

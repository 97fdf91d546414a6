export type ReleaseStage =
  | "ensure_repository"
  | "checkout_dev"
  | "pull_dev"
  | "checkout_release"
  | "pull_release"
  | "merge_dev_into_release"
  | "determine_current_version"
  | "compute_next_version"
  | "apply_version"
  | "stage_and_commit"
  | "push_release"
  | "summarize";

export type StageRecord = {
  stage: ReleaseStage;
  ok: boolean;
  detail: string;
  warning?: string;
};

export const STAGE_ORDER: ReleaseStage[] = [
  "ensure_repository",
  "checkout_dev",
  "pull_dev",
  "checkout_release",
  "pull_release",
  "merge_dev_into_release",
  "determine_current_version",
  "compute_next_version",
  "apply_version",
  "stage_and_commit",
  "push_release",
  "summarize"
];

export const STAGE_LABELS: Record<ReleaseStage, string> = {
  ensure_repository: "Ensure repository",
  checkout_dev: "Check out dev branch",
  pull_dev: "Pull dev branch",
  checkout_release: "Check out release branch",
  pull_release: "Pull release branch",
  merge_dev_into_release: "Merge dev into release",
  determine_current_version: "Determine current version",
  compute_next_version: "Compute next version",
  apply_version: "Apply version",
  stage_and_commit: "Stage and commit",
  push_release: "Push release branch",
  summarize: "Summarize"
};

// A failure in these stages is downgraded to a warning.
export const BEST_EFFORT_STAGES: ReadonlySet<ReleaseStage> = new Set<ReleaseStage>(["pull_release", "summarize"]);

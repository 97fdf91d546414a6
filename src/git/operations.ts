import fs from "fs";
import path from "path";
import { Project } from "../types";
import { CommandRunner, isTimeout, runCommandSync } from "../platform/process-exec";
import { logInfo, logWarn } from "../ui/log";

export type GitStepResult = {
  ok: boolean;
  command: string;
  output: string;
  exitCode: number | null;
  timedOut?: boolean;
  warning?: string;
};

export const GIT_TIMEOUTS_MS = {
  clone: 300000,
  checkout: 30000,
  pull: 120000,
  merge: 60000,
  add: 30000,
  commit: 30000,
  push: 120000,
  log: 10000,
  revParse: 10000
} as const;

export const CHANGELOG_FORMAT = "%h - %s (%an)";

export type GitOperations = {
  clone: (project: Project) => GitStepResult;
  checkout: (repoPath: string, branch: string) => GitStepResult;
  pull: (repoPath: string, branch: string) => GitStepResult;
  merge: (repoPath: string, branch: string, message: string) => GitStepResult;
  stageAll: (repoPath: string) => GitStepResult;
  commit: (repoPath: string, message: string) => GitStepResult;
  push: (repoPath: string, branch: string) => GitStepResult;
  log: (repoPath: string, count: number) => GitStepResult;
  currentBranch: (repoPath: string) => GitStepResult;
};

export type GitOperationsOptions = {
  bin?: string;
  remote?: string;
  run?: CommandRunner;
};

export function createGitOperations(options: GitOperationsOptions = {}): GitOperations {
  const bin = options.bin ?? "git";
  const remote = options.remote ?? "origin";
  const run = options.run ?? runCommandSync;

  const execute = (args: string[], timeoutMs: number, cwd?: string): GitStepResult => {
    const command = [bin, ...args].join(" ");
    logInfo(`$ ${command}`);
    const result = run(bin, args, { cwd, timeout: timeoutMs });
    if (isTimeout(result)) {
      return { ok: false, command, output: `${command} timed out after ${timeoutMs / 1000} s`, exitCode: null, timedOut: true };
    }
    if (result.error) {
      return { ok: false, command, output: result.error.message, exitCode: null };
    }
    const stdout = (result.stdout ?? "").trim();
    const stderr = (result.stderr ?? "").trim();
    if (result.status !== 0) {
      const fallback = result.status === null ? `terminated by ${result.signal ?? "signal"}` : `exited with code ${result.status}`;
      return { ok: false, command, output: stderr || stdout || fallback, exitCode: result.status };
    }
    return { ok: true, command, output: stdout || stderr, exitCode: 0 };
  };

  const inRepo = (repoPath: string, args: string[], timeoutMs: number): GitStepResult => {
    if (!fs.existsSync(repoPath)) {
      return {
        ok: false,
        command: [bin, "-C", repoPath, ...args].join(" "),
        output: `Repository does not exist: ${repoPath}`,
        exitCode: null
      };
    }
    return execute(["-C", repoPath, ...args], timeoutMs);
  };

  return {
    clone: (project) => {
      if (fs.existsSync(project.localPath)) {
        return { ok: true, command: `${bin} clone`, output: "existing repository", exitCode: 0 };
      }
      const parent = path.dirname(project.localPath);
      fs.mkdirSync(parent, { recursive: true });
      return execute(["clone", project.gitUrl, path.basename(project.localPath)], GIT_TIMEOUTS_MS.clone, parent);
    },
    checkout: (repoPath, branch) => inRepo(repoPath, ["checkout", branch], GIT_TIMEOUTS_MS.checkout),
    pull: (repoPath, branch) => {
      const result = inRepo(repoPath, ["pull", remote, branch], GIT_TIMEOUTS_MS.pull);
      // "Already up to date" and similar benign states can exit non-zero.
      if (!result.ok && result.exitCode !== null) {
        logWarn(`${result.command} exited with code ${result.exitCode}: ${result.output}`);
        return { ...result, ok: true, warning: result.output };
      }
      return result;
    },
    merge: (repoPath, branch, message) => inRepo(repoPath, ["merge", branch, "-m", message], GIT_TIMEOUTS_MS.merge),
    stageAll: (repoPath) => inRepo(repoPath, ["add", "."], GIT_TIMEOUTS_MS.add),
    commit: (repoPath, message) => inRepo(repoPath, ["commit", "-m", message], GIT_TIMEOUTS_MS.commit),
    push: (repoPath, branch) => inRepo(repoPath, ["push", remote, branch], GIT_TIMEOUTS_MS.push),
    log: (repoPath, count) => inRepo(repoPath, ["log", `-${count}`, `--pretty=format:${CHANGELOG_FORMAT}`], GIT_TIMEOUTS_MS.log),
    currentBranch: (repoPath) => inRepo(repoPath, ["rev-parse", "--abbrev-ref", "HEAD"], GIT_TIMEOUTS_MS.revParse)
  };
}

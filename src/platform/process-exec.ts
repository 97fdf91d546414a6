import { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns, spawnSync } from "child_process";

export type RunSyncArgs = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
};

export type CommandRunner = (command: string, args: string[], options?: RunSyncArgs) => SpawnSyncReturns<string>;

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

export function runCommandSync(command: string, args: string[], options: RunSyncArgs = {}): SpawnSyncReturns<string> {
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    cwd: options.cwd,
    env: options.env,
    shell: shouldUseWindowsShell(command),
    timeout: options.timeout,
    encoding: "utf-8",
    windowsHide: process.platform === "win32"
  };
  return spawnSync(command, args, spawnOptions);
}

export function isTimeout(result: SpawnSyncReturns<string>): boolean {
  const error = result.error;
  if (!error) {
    return false;
  }
  return "code" in error && error.code === "ETIMEDOUT";
}

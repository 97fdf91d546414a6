#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command } from "commander";
import { runBump } from "./commands/bump";
import { runInspect } from "./commands/inspect";
import { runProjectsAdd, runProjectsList } from "./commands/projects";
import { runRelease } from "./commands/release";
import { runSetVersion } from "./commands/set-version";
import { runVersion } from "./commands/version";
import { CONFIG_KEYS, configPath, ensureConfig, updateConfigValue } from "./config";
import { setFlags } from "./context/flags";
import { ErrorCodes } from "./errors";
import { getRepoRoot } from "./paths";
import { logError, logWarn } from "./ui/log";
import { closePrompt } from "./ui/prompt";
import { supportedProjectTypes } from "./versioning";

const program = new Command();

function getVersion(): string {
  const pkgPath = path.join(getRepoRoot(), "package.json");
  if (!fs.existsSync(pkgPath)) {
    return "0.0.0";
  }
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

program
  .name("release-prep")
  .description("Prepare mobile app releases: merge, bump version, commit and push")
  .version(getVersion())
  .option("--approve", "Skip confirmation prompts")
  .option("--non-interactive", "Run without prompts")
  .option("--verbose", "Print stage-level log lines");

program.hook("preAction", (_command, actionCommand) => {
  const opts = actionCommand.optsWithGlobals();
  setFlags({
    approve: Boolean(opts.approve),
    nonInteractive: Boolean(opts.nonInteractive),
    verbose: Boolean(opts.verbose) || process.env.RELEASE_PREP_VERBOSE === "1"
  });
});

program.hook("postAction", () => {
  closePrompt();
});

program
  .command("release")
  .description("Merge the dev branch into the release branch, bump the version, commit and push")
  .argument("<project>", "Registered project name")
  .option("--target <version>", "Release this exact version instead of the next patch")
  .action(async (project: string, options: { target?: string }) => {
    await runRelease(project, { version: options.target });
  });

program
  .command("version")
  .description("Show the current version of a project's working copy")
  .argument("<project>", "Registered project name")
  .action((project: string) => runVersion(project));

program
  .command("bump")
  .description("Print the next version")
  .argument("<version>", "Current version")
  .option("--kind <kind>", "major | minor | patch", "patch")
  .action((version: string, options: { kind?: string }) => runBump(version, options.kind));

program
  .command("set-version")
  .description("Write a version into a project's descriptors without touching git")
  .argument("<project>", "Registered project name")
  .argument("<version>", "Version to write")
  .action(async (project: string, version: string) => {
    await runSetVersion(project, version);
  });

program
  .command("inspect")
  .description("List Xamarin platform project files and the versions they carry")
  .argument("[path]", "Working copy root", ".")
  .action((target: string) => runInspect(target));

program
  .command("types")
  .description("List project types with automatic versioning")
  .action(() => supportedProjectTypes().forEach((type) => console.log(type)));

const projectsCmd = program.command("projects").description("Project registry commands");
projectsCmd
  .command("list")
  .description("List registered projects")
  .action(() => runProjectsList());

projectsCmd
  .command("add")
  .description("Register a project")
  .argument("<name>", "Project name")
  .requiredOption("--type <type>", "flutter | dotnet_maui | xamarin")
  .requiredOption("--git-url <url>", "Clone URL")
  .requiredOption("--project-file <path>", "Version descriptor path relative to the working copy")
  .option("--dev-branch <branch>", "Development branch", "develop")
  .option("--release-branch <branch>", "Release branch", "main")
  .option("--local-path <path>", "Working copy path (default: <workspace.default_root>/<name>)")
  .action(
    (
      name: string,
      options: {
        type: string;
        gitUrl: string;
        projectFile: string;
        devBranch?: string;
        releaseBranch?: string;
        localPath?: string;
      }
    ) => runProjectsAdd(name, options)
  );

const configCmd = program.command("config").description("Configuration commands");
configCmd
  .command("show")
  .description("Show effective config and config file path")
  .action(() => {
    const config = ensureConfig();
    console.log(`Config file: ${configPath()}`);
    console.log(JSON.stringify(config, null, 2));
  });

configCmd
  .command("init")
  .description("Create config file with defaults if missing")
  .action(() => {
    const config = ensureConfig();
    console.log(`Config ready: ${configPath()}`);
    console.log(`Projects file: ${config.projects.file}`);
    console.log(`Working copies: ${config.workspace.default_root}`);
  });

configCmd
  .command("set")
  .description("Set config value by key")
  .argument("<key>", `Key: ${CONFIG_KEYS.join(" | ")}`)
  .argument("<value>", "Value for key")
  .action((key: string, value: string) => {
    const updated = updateConfigValue(key, value);
    if (!updated) {
      logError(ErrorCodes.CONFIG_KEY, `Invalid config key. Use ${CONFIG_KEYS.join(", ")}.`);
      process.exitCode = 1;
      return;
    }
    console.log(`Config updated: ${configPath()}`);
    console.log(JSON.stringify(updated, null, 2));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logWarn(error instanceof Error ? error.stack ?? error.message : String(error));
  logError(ErrorCodes.UNEXPECTED, "Command failed unexpectedly.");
  process.exitCode = 1;
});

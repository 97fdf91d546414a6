import fs from "fs";
import os from "os";
import path from "path";
import { Project, ProjectType } from "../src/types";

export function makeTempDir(prefix = "release-prep-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(root: string, relativePath: string, content: string): string {
  const file = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

export function readFile(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, relativePath), "utf-8");
}

export function makeProject(type: ProjectType, localPath: string, overrides: Partial<Project> = {}): Project {
  return {
    name: "demo-app",
    type,
    gitUrl: "https://git.example.test/demo-app.git",
    devBranch: "develop",
    releaseBranch: "main",
    localPath,
    projectFilePath: type === "flutter" ? "pubspec.yaml" : "App/App.csproj",
    ...overrides
  };
}

export function csproj(properties: string): string {
  return [
    '<Project Sdk="Microsoft.NET.Sdk">',
    "  <PropertyGroup>",
    properties,
    "  </PropertyGroup>",
    "</Project>",
    ""
  ].join("\n");
}

import test from "node:test";
import assert from "node:assert/strict";
import {
  classifyPlatformFile,
  discoverPlatformDescriptors,
  editPlatformDescriptor,
  xamarinVersionService
} from "../src/versioning/xamarin";
import { csproj, makeProject, makeTempDir, readFile, writeFile } from "./helpers";

const ANDROID = csproj(
  "    <ApplicationVersion>1.0.0</ApplicationVersion>\n    <AndroidVersionCode>10000</AndroidVersionCode>"
);
const IOS = csproj(
  [
    "    <ApplicationVersion>1.0.0</ApplicationVersion>",
    "    <CFBundleVersion>1.0.0</CFBundleVersion>",
    "    <CFBundleShortVersionString>1.0.0</CFBundleShortVersionString>"
  ].join("\n")
);

test("platform suffixes are matched case-insensitively", () => {
  assert.deepEqual(classifyPlatformFile("app.droid.csproj"), { platform: "android", label: "Android" });
  assert.deepEqual(classifyPlatformFile("App.IOS.csproj"), { platform: "ios", label: "iOS" });
  assert.deepEqual(classifyPlatformFile("App.UWP.csproj"), { platform: "other", label: "UWP" });
  assert.equal(classifyPlatformFile("App.csproj"), null);
});

test("discovery lists files before subdirectories and skips hidden directories", () => {
  const root = makeTempDir();
  writeFile(root, "b/B.Android.csproj", ANDROID);
  writeFile(root, "a/A.iOS.csproj", IOS);
  writeFile(root, "Root.Droid.csproj", ANDROID);
  writeFile(root, ".hidden/Hidden.Android.csproj", ANDROID);
  writeFile(root, "a/Shared.csproj", csproj(""));
  assert.deepEqual(
    discoverPlatformDescriptors(root).map((descriptor) => descriptor.relativePath),
    ["Root.Droid.csproj", "a/A.iOS.csproj", "b/B.Android.csproj"]
  );
});

test("the first version in walk order wins", () => {
  const root = makeTempDir();
  writeFile(root, "a/A.iOS.csproj", IOS.split("1.0.0").join("5.0.0"));
  writeFile(root, "b/B.Android.csproj", ANDROID.replace("1.0.0", "4.0.0"));
  const project = makeProject("xamarin", root);
  assert.deepEqual(xamarinVersionService.getCurrentVersion(project), {
    found: true,
    version: "5.0.0",
    file: "a/A.iOS.csproj"
  });
});

test("release scenario bumps 1.0.0 to 1.1.0 on Android and iOS", () => {
  const root = makeTempDir();
  writeFile(root, "App/App.csproj", csproj("    <TargetFramework>netstandard2.0</TargetFramework>"));
  writeFile(root, "App.Android/App.Android.csproj", ANDROID);
  writeFile(root, "App.iOS/App.iOS.csproj", IOS);
  const project = makeProject("xamarin", root);

  const current = xamarinVersionService.getCurrentVersion(project);
  assert.deepEqual(current, { found: true, version: "1.0.0", file: "App.Android/App.Android.csproj" });
  const next = xamarinVersionService.incrementVersion("1.0.0", "minor");
  assert.equal(next, "1.1.0");

  const result = xamarinVersionService.updateVersion(project, next);
  assert.equal(result.ok, true);
  assert.equal(
    result.message,
    [
      "Version updated to 1.1.0",
      "Platforms: Android (1), iOS (1)",
      "Updated files:",
      "  - App.Android/App.Android.csproj [android]: set ApplicationVersion, AndroidVersionCode",
      "  - App.iOS/App.iOS.csproj [ios]: set ApplicationVersion, CFBundleVersion, CFBundleShortVersionString"
    ].join("\n")
  );
  assert.equal(
    readFile(root, "App.Android/App.Android.csproj"),
    ANDROID.replace("1.0.0", "1.1.0").replace("10000", "10100")
  );
  assert.equal(readFile(root, "App.iOS/App.iOS.csproj"), IOS.split("1.0.0").join("1.1.0"));
});

test("an Android-only solution succeeds without mentioning iOS", () => {
  const root = makeTempDir();
  writeFile(root, "Droid/App.Droid.csproj", ANDROID);
  const project = makeProject("xamarin", root);
  const result = xamarinVersionService.updateVersion(project, "2.0.1");
  assert.equal(result.ok, true);
  assert.equal(
    result.message,
    [
      "Version updated to 2.0.1",
      "Platforms: Android (1)",
      "Updated files:",
      "  - Droid/App.Droid.csproj [android]: set ApplicationVersion, AndroidVersionCode"
    ].join("\n")
  );
  assert.equal(result.message.includes("iOS"), false);
  assert.match(readFile(root, "Droid/App.Droid.csproj"), /<AndroidVersionCode>20001<\/AndroidVersionCode>/);
});

test("no platform files fails with guidance", () => {
  const root = makeTempDir();
  writeFile(root, "App/App.csproj", csproj(""));
  const project = makeProject("xamarin", root);
  const expected = [
    `No platform project files found under ${root}`,
    "Expected at least one of:",
    "  - Android (*.Android.csproj or *.Droid.csproj)",
    "  - iOS (*.iOS.csproj)"
  ].join("\n");
  assert.deepEqual(xamarinVersionService.updateVersion(project, "1.0.1"), { ok: false, message: expected, files: [] });
  assert.deepEqual(xamarinVersionService.getCurrentVersion(project), { found: false, reason: expected });
});

test("one failing platform file makes a partial update", () => {
  const root = makeTempDir();
  writeFile(root, "A.Android/A.Android.csproj", csproj("    <ApplicationVersion>1.0.0</ApplicationVersion>"));
  writeFile(root, "B.iOS/B.iOS.csproj", csproj("    <AssemblyName>App</AssemblyName>"));
  writeFile(root, "C.UWP/C.UWP.csproj", csproj("    <ApplicationVersion>1.0.0</ApplicationVersion>"));
  const project = makeProject("xamarin", root);
  const result = xamarinVersionService.updateVersion(project, "1.0.1");
  assert.equal(result.ok, true);
  assert.deepEqual(
    (result.files ?? []).map((file) => [file.file, file.status]),
    [
      ["A.Android/A.Android.csproj", "updated"],
      ["B.iOS/B.iOS.csproj", "failed"],
      ["C.UWP/C.UWP.csproj", "skipped"]
    ]
  );
  assert.equal(
    result.message,
    [
      "Version partially updated to 1.0.1",
      "Platforms: Android (1), iOS (1), UWP (1)",
      "Updated files:",
      "  - A.Android/A.Android.csproj [android]: set ApplicationVersion",
      "Failed files:",
      "  - B.iOS/B.iOS.csproj [ios]: No version tags found. Expected iOS: <ApplicationVersion>X.Y.Z</ApplicationVersion>, <CFBundleVersion>X.Y.Z</CFBundleVersion> and <CFBundleShortVersionString>X.Y.Z</CFBundleShortVersionString>",
      "Skipped files:",
      "  - C.UWP/C.UWP.csproj [other]: UWP project, not written"
    ].join("\n")
  );
  assert.equal(readFile(root, "C.UWP/C.UWP.csproj"), csproj("    <ApplicationVersion>1.0.0</ApplicationVersion>"));
});

test("a version with a build suffix leaves AndroidVersionCode alone with a warning", () => {
  const edit = editPlatformDescriptor(ANDROID, "android", "1.0.0+5");
  assert.equal(edit.ok, true);
  if (!edit.ok) return;
  assert.deepEqual(edit.tags, ["ApplicationVersion"]);
  assert.deepEqual(edit.warnings, ['AndroidVersionCode left unchanged: "1.0.0+5" is not MAJOR.MINOR.PATCH']);
  assert.equal(edit.content, ANDROID.replace("<ApplicationVersion>1.0.0<", "<ApplicationVersion>1.0.0+5<"));
});

const IOS_GUIDANCE =
  "iOS: <ApplicationVersion>X.Y.Z</ApplicationVersion>, <CFBundleVersion>X.Y.Z</CFBundleVersion> and <CFBundleShortVersionString>X.Y.Z</CFBundleShortVersionString>";
const ANDROID_GUIDANCE =
  "Android: <ApplicationVersion>X.Y.Z</ApplicationVersion> and <AndroidVersionCode>N</AndroidVersionCode>";

test("platform files without version tags are told apart from missing files", () => {
  const root = makeTempDir();
  writeFile(root, "App.Android/App.Android.csproj", csproj("    <AssemblyName>App</AssemblyName>"));
  const project = makeProject("xamarin", root);
  assert.deepEqual(xamarinVersionService.getCurrentVersion(project), {
    found: false,
    reason: `Platform files found (Android (1)) but none carries a version tag. Expected ${ANDROID_GUIDANCE}; ${IOS_GUIDANCE}`
  });
});

test("only Windows-family platform files are reported as unsupported", () => {
  const root = makeTempDir();
  writeFile(root, "App.UWP/App.UWP.csproj", csproj("    <ApplicationVersion>1.0.0</ApplicationVersion>"));
  const project = makeProject("xamarin", root);
  assert.deepEqual(xamarinVersionService.getCurrentVersion(project), {
    found: false,
    reason: [
      "Only unsupported platform files found (UWP (1)).",
      "Expected at least one of:",
      "  - Android (*.Android.csproj or *.Droid.csproj)",
      "  - iOS (*.iOS.csproj)"
    ].join("\n")
  });
});

test("classic project files with the MSBuild default namespace are read and written", () => {
  const root = makeTempDir();
  const content = [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<Project ToolsVersion="15.0" DefaultTargets="Build" xmlns="http://schemas.microsoft.com/developer/msbuild/2003">',
    "  <PropertyGroup>",
    "    <Configuration Condition=\" '$(Configuration)' == '' \">Debug</Configuration>",
    "  </PropertyGroup>",
    "  <PropertyGroup>",
    "    <CFBundleShortVersionString>3.1.0</CFBundleShortVersionString>",
    "    <CFBundleVersion>3.1.0</CFBundleVersion>",
    "  </PropertyGroup>",
    "</Project>",
    ""
  ].join("\n");
  writeFile(root, "App.iOS/App.iOS.csproj", content);
  const project = makeProject("xamarin", root);

  assert.deepEqual(xamarinVersionService.getCurrentVersion(project), {
    found: true,
    version: "3.1.0",
    file: "App.iOS/App.iOS.csproj"
  });
  const result = xamarinVersionService.updateVersion(project, "3.1.1");
  assert.equal(result.ok, true);
  assert.deepEqual(result.files?.[0].tags, ["CFBundleVersion", "CFBundleShortVersionString"]);
  assert.equal(readFile(root, "App.iOS/App.iOS.csproj"), content.split("3.1.0").join("3.1.1"));
});

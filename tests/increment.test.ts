import test from "node:test";
import assert from "node:assert/strict";
import { incrementVersion, isReleaseVersion, parseIncrementKind } from "../src/versioning";

test("patch increment drops the build suffix", () => {
  assert.equal(incrementVersion("1.2.3+4"), "1.2.4");
  assert.equal(incrementVersion("1.2.3", "patch"), "1.2.4");
});

test("minor increment resets patch", () => {
  assert.equal(incrementVersion("1.0.0", "minor"), "1.1.0");
  assert.equal(incrementVersion("2.9.7+31", "minor"), "2.10.0");
});

test("major increment resets minor and patch", () => {
  assert.equal(incrementVersion("1.4.9", "major"), "2.0.0");
});

test("two-part versions are padded before incrementing", () => {
  assert.equal(incrementVersion("3.1"), "3.1.1");
  assert.equal(incrementVersion("3.1", "minor"), "3.2.0");
});

test("unparsable versions get .1 appended", () => {
  assert.equal(incrementVersion("v1"), "v1.1");
  assert.equal(incrementVersion("1.0.0.0.0"), "1.0.0.0.0.1");
  assert.equal(incrementVersion("1.x.3", "major"), "1.x.3.1");
  assert.equal(incrementVersion(""), ".1");
});

test("release versions accept an optional numeric build", () => {
  assert.equal(isReleaseVersion("1.2.4"), true);
  assert.equal(isReleaseVersion("1.2.4+9"), true);
  assert.equal(isReleaseVersion("1.2"), false);
  assert.equal(isReleaseVersion("1.2.4-beta"), false);
});

test("increment kinds are parsed case-insensitively", () => {
  assert.equal(parseIncrementKind(" Minor "), "minor");
  assert.equal(parseIncrementKind("build"), null);
  assert.equal(parseIncrementKind(undefined), null);
});

test("parts beyond the safe integer range use the fallback", () => {
  assert.equal(incrementVersion("9007199254740993.0.0"), "9007199254740993.0.0.1");
  assert.equal(incrementVersion("1.0.9007199254740991"), "1.0.9007199254740991.1");
  assert.equal(incrementVersion("9007199254740990.0.0", "major"), "9007199254740991.0.0");
});

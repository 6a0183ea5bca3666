import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { IoError } from "../errors";
import { allocateRunDirectory, toRunDirectoryName, toRunStamp } from "../run_directory";

const NOW = new Date(2026, 9, 19, 8, 5, 3);

function tempRoot(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "run-directory-"));
}

describe("run_directory", () => {
  it("formats the local time at second granularity", () => {
    expect(toRunStamp(NOW)).toBe("20261019_080503");
    expect(toRunDirectoryName(NOW)).toBe("train_20261019_080503");
    expect(toRunDirectoryName(NOW, "k3x9qa")).toBe("train_20261019_080503_k3x9qa");
  });

  it("creates the run directory and any missing parents", () => {
    const base = path.join(tempRoot(), "nested", "outputs");

    const runDir = allocateRunDirectory({ base_dir: base, now: NOW });

    expect(runDir).toBe(path.join(base, "train_20261019_080503"));
    expect(fs.statSync(runDir).isDirectory()).toBe(true);
  });

  it("fails loudly when a run already claimed the same second", () => {
    const base = tempRoot();
    allocateRunDirectory({ base_dir: base, now: NOW });

    let caught: unknown;
    try {
      allocateRunDirectory({ base_dir: base, now: NOW });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(IoError);
    expect(caught instanceof IoError ? caught.code : null).toBe("RUN_DIRECTORY_COLLISION");
  });

  it("appends a suffix when asked to disambiguate", () => {
    const base = tempRoot();
    allocateRunDirectory({ base_dir: base, now: NOW });

    const runDir = allocateRunDirectory({
      base_dir: base,
      now: NOW,
      unique_suffix: true,
      suffix_factory: () => "k3x9qa",
    });

    expect(path.basename(runDir)).toBe("train_20261019_080503_k3x9qa");
    expect(fs.existsSync(runDir)).toBe(true);
  });

  it("generates a six character suffix by default", () => {
    const runDir = allocateRunDirectory({ base_dir: tempRoot(), now: NOW, unique_suffix: true });

    expect(path.basename(runDir)).toMatch(/^train_20261019_080503_[A-Za-z0-9_-]{6}$/);
  });

  it("reports an IO failure when the base path is a file", () => {
    const root = tempRoot();
    const blocker = path.join(root, "outputs");
    fs.writeFileSync(blocker, "not a directory");

    expect(() => allocateRunDirectory({ base_dir: blocker, now: NOW })).toThrowError(IoError);
  });
});

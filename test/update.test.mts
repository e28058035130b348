import fs from "node:fs";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { parseSourceDocument } from "../src/document.mts";
import { MissingCodeMarkerError } from "../src/errors.mts";
import { locateRegion, regionText } from "../src/region.mts";
import { previewCommentary, updateCommentary, writeFileAtomic } from "../src/update.mts";
import { cleanupTempProject, createTempProject, writeText } from "./helpers.mts";

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const projectPath = tempDirs.pop();
    if (projectPath) {
      cleanupTempProject(projectPath);
    }
  }
});

function target(content: string): string {
  const projectPath = createTempProject();
  tempDirs.push(projectPath);
  const targetPath = path.join(projectPath, "demo-mode.el");
  writeText(targetPath, content);
  return targetPath;
}

test("replaces exactly the region", () => {
  const targetPath = target("(header)\n;;; Commentary:\n\nOLD\n;;; Code:\n(body)\n");

  updateCommentary(parseSourceDocument("# demo-mode\n\nNEW\n"), targetPath);

  expect(fs.readFileSync(targetPath, "utf8")).toBe("(header)\n;;; Commentary:\n\n;; NEW\n;;; Code:\n(body)\n");
});

test("the relocated region holds the rendered text", () => {
  const targetPath = target(";;; Commentary:\n;;; Code:\n");

  updateCommentary(parseSourceDocument("# demo-mode\n\nFirst.\n\nSecond.\n"), targetPath);

  const region = locateRegion(fs.readFileSync(targetPath, "utf8"));
  expect(region.start).toBeLessThanOrEqual(region.end);
  expect(regionText(region)).toBe(";; First.\n;;\n;; Second.");
});

test("leaves the file untouched when markers are missing", () => {
  const original = ";;; Commentary:\n\n;; text\n";
  const targetPath = target(original);

  expect(() => updateCommentary(parseSourceDocument("# demo-mode\n\nNEW\n"), targetPath)).toThrow(
    MissingCodeMarkerError
  );
  expect(fs.readFileSync(targetPath, "utf8")).toBe(original);
  expect(fs.readdirSync(path.dirname(targetPath)).sort()).toEqual([".git", "demo-mode.el"]);
});

test("preview returns the would-be content without writing", () => {
  const original = ";;; Commentary:\n\nOLD\n;;; Code:\n";
  const targetPath = target(original);

  const preview = previewCommentary(parseSourceDocument("# demo-mode\n\nNEW\n"), targetPath);

  expect(preview.rendered.text).toBe(";; NEW");
  expect(preview.content).toBe(";;; Commentary:\n\n;; NEW\n;;; Code:\n");
  expect(fs.readFileSync(targetPath, "utf8")).toBe(original);
});

test("atomic writes keep the file mode and leave no temp files", () => {
  const targetPath = target("old\n");
  fs.chmodSync(targetPath, 0o640);

  writeFileAtomic(targetPath, "new\n");

  expect(fs.readFileSync(targetPath, "utf8")).toBe("new\n");
  expect(fs.statSync(targetPath).mode & 0o777).toBe(0o640);
  expect(fs.readdirSync(path.dirname(targetPath)).sort()).toEqual([".git", "demo-mode.el"]);
});

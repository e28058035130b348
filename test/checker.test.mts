import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { applySubstitutions, assertCommentary, checkCommentary } from "../src/checker.mts";
import { parseSourceDocument } from "../src/document.mts";
import { GenerationFailureError, MismatchError, MissingCommentaryMarkerError } from "../src/errors.mts";
import { updateCommentary } from "../src/update.mts";
import { cleanupTempProject, createTempProject, lispFile, writeText } from "./helpers.mts";

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const projectPath = tempDirs.pop();
    if (projectPath) {
      cleanupTempProject(projectPath);
    }
  }
});

function setup(commentary: string[]): string {
  const projectPath = createTempProject();
  tempDirs.push(projectPath);
  const targetPath = path.join(projectPath, "demo-mode.el");
  writeText(targetPath, lispFile(commentary));
  return targetPath;
}

function readme(markdown: string) {
  return parseSourceDocument(markdown, { label: "README.md" });
}

test("matching content is reported without a diff", () => {
  const targetPath = setup([";; Hello world."]);
  expect(checkCommentary(readme("# demo-mode\n\nHello world.\n"), targetPath)).toEqual({
    status: "match",
    targetPath
  });
});

test("a changed word produces a diff with stable labels", () => {
  const targetPath = setup([";; Hello world."]);
  const document = readme("# demo-mode\n\nHello there.\n");

  const first = checkCommentary(document, targetPath, {
    scratch: {
      targetFile: path.join(os.tmpdir(), "commentary-aaaa", "demo-mode.el"),
      exportBuffer: "*commentary-export-aaaa*"
    }
  });
  const second = checkCommentary(document, targetPath, {
    scratch: {
      targetFile: path.join(os.tmpdir(), "commentary-bbbb", "demo-mode.el"),
      exportBuffer: "*commentary-export-bbbb*"
    }
  });

  expect(first.status).toBe("mismatch");
  const report = first.status === "mismatch" ? first.report : "";
  const lines = report.split("\n");
  expect(lines[0]).toBe("--- demo-mode.el");
  expect(lines[1]).toBe("+++ <exported from README.md>");
  expect(lines).toContain("-;; Hello world.");
  expect(lines).toContain("+;; Hello there.");
  expect(report).not.toContain(os.tmpdir());
  expect(report).not.toContain("No newline at end of file");

  expect(second).toEqual(first);
});

test("reports generated with random scratch names are identical", () => {
  const targetPath = setup([";; Hello world."]);
  const document = readme("# demo-mode\n\nHello there.\n");
  expect(checkCommentary(document, targetPath)).toEqual(checkCommentary(document, targetPath));
});

test("whitespace differences count", () => {
  const targetPath = setup([";; Hello world. "]);
  expect(checkCommentary(readme("# demo-mode\n\nHello world.\n"), targetPath).status).toBe("mismatch");
});

test("assertCommentary raises the report", () => {
  const targetPath = setup([";; Hello world."]);

  let failure: unknown;
  try {
    assertCommentary(readme("# demo-mode\n\nHello there.\n"), targetPath);
  } catch (error) {
    failure = error;
  }

  expect(failure).toBeInstanceOf(MismatchError);
  const report = failure instanceof MismatchError ? failure.report : "";
  expect(report.split("\n")).toContain("+;; Hello there.");
});

test("an empty export is a generation failure", () => {
  const targetPath = setup([";; Hello world."]);
  expect(() => checkCommentary(readme("# demo-mode\n"), targetPath)).toThrow(GenerationFailureError);
});

test("a target without markers fails the check", () => {
  const projectPath = createTempProject();
  tempDirs.push(projectPath);
  const targetPath = path.join(projectPath, "demo-mode.el");
  writeText(targetPath, "(provide 'demo-mode)\n");

  expect(() => checkCommentary(readme("# demo-mode\n\nText.\n"), targetPath)).toThrow(MissingCommentaryMarkerError);
});

test("update followed by check matches", () => {
  const targetPath = setup([";; Stale text.", ""]);
  const document = readme(
    "# demo-mode\n\nIntro paragraph.\n\n## Usage\n\n```elisp\n(demo-mode 1)\n```\n\n- one\n- two\n"
  );

  updateCommentary(document, targetPath);

  expect(checkCommentary(document, targetPath).status).toBe("match");
  expect(fs.readFileSync(targetPath, "utf8")).toBe(
    lispFile([
      ";; Intro paragraph.",
      ";;",
      ";; Usage",
      ";; =====",
      ";;",
      ";; (demo-mode 1)",
      ";;",
      ";; - one",
      ";; - two"
    ])
  );
});

test("substitutions apply in order and take replacements literally", () => {
  const rules = [
    { pattern: /a/g, replacement: "$&b" },
    { pattern: /\$&b/g, replacement: "c" }
  ];
  expect(applySubstitutions("aa", rules)).toBe("cc");
});

test("CRLF targets match and keep their line endings on update", () => {
  const targetPath = setup([]);
  const document = readme("# demo-mode\n\none\n\ntwo\n");
  const current = ";;; Commentary:\r\n\r\n;; one\r\n;;\r\n;; two\r\n;;; Code:\r\n";

  writeText(targetPath, current);
  expect(checkCommentary(document, targetPath).status).toBe("match");

  writeText(targetPath, ";;; Commentary:\r\n\r\n;; stale\r\n;;; Code:\r\n");
  updateCommentary(document, targetPath);
  expect(fs.readFileSync(targetPath, "utf8")).toBe(current);
  expect(checkCommentary(document, targetPath).status).toBe("match");
});

test("commentary without a separator line is replaced whole", () => {
  const targetPath = setup([]);
  const document = readme("# demo-mode\n\nHello world.\n");
  writeText(targetPath, ";;; Commentary:\n;; Old intro\n;; more\n;;; Code:\n");

  expect(checkCommentary(document, targetPath).status).toBe("mismatch");
  updateCommentary(document, targetPath);
  expect(fs.readFileSync(targetPath, "utf8")).toBe(";;; Commentary:\n\n;; Hello world.\n;;; Code:\n");
  expect(checkCommentary(document, targetPath).status).toBe("match");
});

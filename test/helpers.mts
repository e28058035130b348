import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CliContext } from "../src/cli.mts";

/** Creates `<tmp>/<random>/<name>` with a `.git` marker and returns its path. */
export function createTempProject(name = "demo-mode"): string {
  const parent = fs.mkdtempSync(path.join(os.tmpdir(), "md-commentary-"));
  const projectPath = path.join(parent, name);
  fs.mkdirSync(path.join(projectPath, ".git"), { recursive: true });
  return projectPath;
}

export function writeText(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

export function cleanupTempProject(projectPath: string): void {
  fs.rmSync(path.dirname(projectPath), { recursive: true, force: true });
}

export function lispFile(commentary: string[], name = "demo-mode.el"): string {
  return [
    `;;; ${name} --- Rearrange windows for demos  -*- lexical-binding: t -*-`,
    "",
    ";;; Commentary:",
    "",
    ...commentary,
    ";;; Code:",
    "",
    "(provide 'demo-mode)",
    ""
  ].join("\n");
}

export interface CapturedCli {
  context: CliContext;
  stdout: () => string;
  stderr: () => string;
}

export function captureCli(cwd: string): CapturedCli {
  let out = "";
  let err = "";
  return {
    context: {
      cwd,
      writeOut: (text) => {
        out += text;
      },
      writeErr: (text) => {
        err += text;
      }
    },
    stdout: () => out,
    stderr: () => err
  };
}

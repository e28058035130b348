import fs from "node:fs";
import path from "node:path";
import { DEFAULT_FORMAT, DISCOVERABLE_CONFIG_FILES } from "./constants.mjs";
import { InvalidConfigError } from "./errors.mjs";
import type { CommentaryConfig, CommentaryFormat } from "./types.mjs";

function normalizeNewlines(value: string): string {
  return value.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

function toPosix(value: string): string {
  return value.replace(/\\/g, "/");
}

function parseYamlScalar(raw: string): string {
  const value = raw.trim();
  if (!value) {
    return "";
  }

  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    if (value.startsWith('"')) {
      try {
        return String(JSON.parse(value));
      } catch {
        return value.slice(1, -1);
      }
    }
    return value.slice(1, -1).replace(/''/g, "'");
  }

  return value.replace(/\s+#.*$/, "");
}

function splitYamlKeyValueLine(raw: string): [string, string] | null {
  let quote: "'" | '"' | null = null;
  let escaped = false;

  for (let index = 0; index < raw.length; index += 1) {
    const char = raw[index];
    if (!char) {
      continue;
    }

    if (escaped) {
      escaped = false;
      continue;
    }

    if (quote === '"' && char === "\\") {
      escaped = true;
      continue;
    }

    if (char === "'" || char === '"') {
      if (!quote) {
        quote = char;
      } else if (quote === char) {
        quote = null;
      }
      continue;
    }

    if (char === ":" && !quote && (index + 1 === raw.length || /\s/.test(raw[index + 1] ?? ""))) {
      return [raw.slice(0, index), raw.slice(index + 1)];
    }
  }

  return null;
}

function parseFillColumn(raw: string, location: string, configPath: string): number {
  const value = /^\d+$/.test(raw) ? Number(raw) : 0;
  if (value < 1) {
    throw new InvalidConfigError(`invalid fill_column at ${location}: expected a positive integer`, configPath);
  }
  return value;
}

function applySetting(config: CommentaryConfig, key: string, value: string, location: string, configPath: string): void {
  switch (key) {
    case "source":
      config.source = value;
      return;
    case "target":
      config.target = value;
      return;
    case "commentary_marker":
      config.format.commentaryMarker = value;
      return;
    case "code_marker":
      config.format.codeMarker = value;
      return;
    case "comment_prefix":
      config.format.commentPrefix = value;
      return;
    case "extension":
      config.format.extension = value;
      return;
    case "fill_column":
      config.format.fillColumn = parseFillColumn(value, location, configPath);
      return;
    default:
      throw new InvalidConfigError(`unknown setting "${key}" at ${location}`, configPath);
  }
}

export function parseCommentaryConfig(content: string, configPath: string): CommentaryConfig {
  const config: CommentaryConfig = { format: {} };

  const entries = normalizeNewlines(content).split("\n").entries();
  for (const [index, rawLine] of entries) {
    const location = `${configPath}:${index + 1}`;
    const trimmed = rawLine.trim();

    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    if (rawLine.includes("\t")) {
      throw new InvalidConfigError(`invalid YAML indentation (tab) at ${location}`, configPath);
    }

    if (rawLine !== rawLine.trimStart()) {
      throw new InvalidConfigError(`invalid YAML at ${location}: nested values are not supported`, configPath);
    }

    const split = splitYamlKeyValueLine(trimmed);
    if (!split) {
      throw new InvalidConfigError(`invalid YAML entry at ${location}: missing ':'`, configPath);
    }

    const key = parseYamlScalar(split[0]);
    const value = parseYamlScalar(split[1]);
    if (!value) {
      throw new InvalidConfigError(`invalid setting at ${location}: "${key}" needs a value`, configPath);
    }

    applySetting(config, key, value, location, configPath);
  }

  return config;
}

export function discoverConfigPath(startDirectory: string, configuredPath?: string, cwd = process.cwd()): string | null {
  const explicitPath = configuredPath?.trim() ?? "";
  if (explicitPath) {
    return path.isAbsolute(explicitPath) ? explicitPath : path.resolve(cwd, explicitPath);
  }

  let current = path.resolve(startDirectory);
  for (;;) {
    for (const filename of DISCOVERABLE_CONFIG_FILES) {
      const candidate = path.join(current, filename);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return candidate;
      }
    }

    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return null;
}

export function loadCommentaryConfig(configPath: string | null, cwd = process.cwd()): CommentaryConfig {
  if (!configPath) {
    return { format: {} };
  }

  if (!fs.existsSync(configPath)) {
    throw new InvalidConfigError(`configuration file ${configPath} does not exist`, configPath);
  }

  const relativeConfigPath = toPosix(path.relative(cwd, configPath));
  return parseCommentaryConfig(fs.readFileSync(configPath, "utf8"), relativeConfigPath);
}

export function resolveFormat(overrides: Partial<CommentaryFormat>): CommentaryFormat {
  return { ...DEFAULT_FORMAT, ...overrides };
}

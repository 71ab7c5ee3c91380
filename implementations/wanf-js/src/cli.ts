import * as fs from "node:fs";
import { format } from "./format.js";
import { lint } from "./lint.js";
import { Diagnostic, ErrorLevel, diagnosticsToJSON, formatDiagnostic } from "./types.js";

export const USAGE = `wanflint: a tool for linting and formatting wanf files.

Usage:
  wanflint <command> [arguments]

Commands:
  lint [--json] [path ...]       lint files and report issues
  fmt [--nosort] [-d] [path ...] format files
`;

/** Where the CLI writes; text is written as-is, newlines included */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface ParsedArgs {
  flags: Set<string>;
  paths: string[];
}

function parseArgs(args: readonly string[], known: readonly string[]): ParsedArgs | string {
  const flags = new Set<string>();
  const paths: string[] = [];
  for (const arg of args) {
    if (arg.startsWith("-") && arg.length > 1) {
      if (!known.includes(arg)) {
        return `unknown flag ${arg}`;
      }
      flags.add(arg);
    } else {
      paths.push(arg);
    }
  }
  return { flags, paths };
}

function levelName(d: Diagnostic): string {
  return d.level === ErrorLevel.Fmt ? "FMT" : "LINT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function lintFiles(paths: readonly string[], json: boolean, io: CliIO): number {
  const found: { path: string; diagnostic: Diagnostic }[] = [];
  let readFailed = false;

  for (const path of paths) {
    let data: Buffer;
    try {
      data = fs.readFileSync(path);
    } catch (err) {
      io.stderr(`Error reading ${path}: ${errorMessage(err)}\n`);
      readFailed = true;
      continue;
    }
    for (const diagnostic of lint(data).diagnostics) {
      found.push({ path, diagnostic });
    }
  }

  if (json) {
    io.stdout(diagnosticsToJSON(found.map((f) => f.diagnostic)) + "\n");
  } else if (found.length > 0) {
    io.stderr("Linter found issues:\n");
    for (const { path, diagnostic: d } of found) {
      io.stderr(`  - [${levelName(d)}] ${path}:${d.line}:${d.column}: ${d.message}\n`);
    }
  }
  return found.length > 0 || readFailed ? 1 : 0;
}

function formatFile(path: string, display: boolean, preserveDeclaredOrder: boolean, io: CliIO): boolean {
  let data: Buffer;
  try {
    data = fs.readFileSync(path);
  } catch (err) {
    io.stderr(`Error: could not read file ${path}: ${errorMessage(err)}\n`);
    return false;
  }

  const result = lint(data);
  if (result.fatal) {
    io.stderr(`Error: cannot format ${path}, found ${result.diagnostics.length} errors:\n`);
    for (const d of result.diagnostics) {
      io.stderr(`  - ${formatDiagnostic(d)}\n`);
    }
    return false;
  }
  if (result.diagnostics.length > 0) {
    io.stderr(`Warning: found ${result.diagnostics.length} issues in ${path}:\n`);
    for (const d of result.diagnostics) {
      io.stderr(`  - ${formatDiagnostic(d)}\n`);
    }
  }

  const formatted = format(result.root, { style: "blockSorted", emitBlankLines: true, preserveDeclaredOrder });
  if (display) {
    io.stdout(formatted);
    return true;
  }
  if (formatted !== data.toString("utf-8")) {
    try {
      fs.writeFileSync(path, formatted);
    } catch (err) {
      io.stderr(`Error: failed to write formatted file ${path}: ${errorMessage(err)}\n`);
      return false;
    }
    io.stdout(`Formatted ${path}\n`);
  }
  return true;
}

/** Run the command line; returns the exit code */
export function run(args: readonly string[], io: CliIO = processIO): number {
  const [command, ...rest] = args;
  if (command === undefined) {
    io.stderr(USAGE);
    return 1;
  }

  switch (command) {
    case "lint": {
      const parsed = parseArgs(rest, ["--json", "-json"]);
      if (typeof parsed === "string") {
        io.stderr(`Error: ${parsed}\n`);
        return 1;
      }
      if (parsed.paths.length === 0) {
        io.stderr("Error: missing file paths for lint command.\n");
        return 1;
      }
      return lintFiles(parsed.paths, parsed.flags.has("--json") || parsed.flags.has("-json"), io);
    }
    case "fmt": {
      const parsed = parseArgs(rest, ["-d", "--nosort", "-nosort"]);
      if (typeof parsed === "string") {
        io.stderr(`Error: ${parsed}\n`);
        return 1;
      }
      if (parsed.paths.length === 0) {
        io.stderr("Error: missing file paths for fmt command.\n");
        return 1;
      }
      const nosort = parsed.flags.has("--nosort") || parsed.flags.has("-nosort");
      let ok = true;
      for (const path of parsed.paths) {
        ok = formatFile(path, parsed.flags.has("-d"), nosort, io) && ok;
      }
      return ok ? 0 : 1;
    }
    default:
      io.stderr(`Unknown command: "${command}"\n`);
      io.stderr(USAGE);
      return 1;
  }
}

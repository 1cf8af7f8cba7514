#!/usr/bin/env -S node --import tsx
import { resolve } from "node:path";
import { exit, stderr, stdout } from "node:process";
import { fileURLToPath } from "node:url";
import { type EditorConfig, type EditorLogSink, TesseraError } from "@tessera/core";
import { loadEditorAssets } from "./assets.js";
import { createFileLogSink } from "./log.js";
import { runNodeEditor } from "./runner.js";

type Env = Readonly<Record<string, string | undefined>>;

export type CliOptions = {
  tilesDir: string;
  uiDir: string;
  fps?: number;
  logFile?: string;
  help: boolean;
};

const LOG_ENV = "TESSERA_LOG";

function invalidArgs(message: string): TesseraError {
  return new TesseraError("TESSERA_INVALID_CONFIG", message);
}

function parseFps(raw: string): number {
  if (!/^\d+$/.test(raw)) throw invalidArgs(`--fps expects a positive integer, got "${raw}"`);
  return Number.parseInt(raw, 10);
}

export function parseArgs(argv: readonly string[], env: Env = {}): CliOptions {
  const options: CliOptions = { tilesDir: "./tiles", uiDir: "./ui", help: false };
  const logFromEnv = env[LOG_ENV]?.trim();
  if (logFromEnv !== undefined && logFromEnv.length > 0) options.logFile = logFromEnv;

  const valueFlags = ["--tiles", "--ui", "--fps", "--log"] as const;
  type ValueFlag = (typeof valueFlags)[number];
  const apply = (flag: ValueFlag, value: string): void => {
    switch (flag) {
      case "--tiles":
        options.tilesDir = value;
        return;
      case "--ui":
        options.uiDir = value;
        return;
      case "--fps":
        options.fps = parseFps(value);
        return;
      case "--log":
        options.logFile = value;
        return;
    }
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    const flag = valueFlags.find((candidate) => arg === candidate);
    if (flag !== undefined) {
      const value = argv[i + 1];
      if (value === undefined || value.length === 0) throw invalidArgs(`Missing value for ${flag}`);
      apply(flag, value);
      i++;
      continue;
    }
    const inline = valueFlags.find((candidate) => arg.startsWith(`${candidate}=`));
    if (inline !== undefined) {
      apply(inline, arg.slice(inline.length + 1));
      continue;
    }
    if (arg.startsWith("-")) throw invalidArgs(`Unknown option: ${arg}`);
    throw invalidArgs(`Unexpected argument: ${arg}`);
  }

  return options;
}

function printHelp(): void {
  stdout.write("tessera - terminal tile map editor\n\n");
  stdout.write("Usage:\n");
  stdout.write("  tessera [--tiles <dir>] [--ui <dir>] [--fps <n>] [--log <file>]\n\n");
  stdout.write("Options:\n");
  stdout.write("  --tiles <dir>   Tile textures, one palette entry per file (default ./tiles)\n");
  stdout.write("  --ui <dir>      UI textures: plus, minus, white, background and panel .png (default ./ui)\n");
  stdout.write("  --fps <n>       Frames per second (default 60)\n");
  stdout.write(`  --log <file>    Append JSON log lines to <file> (env ${LOG_ENV})\n`);
  stdout.write("  --help, -h      Show this help\n\n");
  stdout.write("Controls: w/a/s/d pan, space/e zoom, left click or z paints, right click or x erases, q quits\n");
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2), process.env);
  if (options.help) {
    printHelp();
    return;
  }

  const log: EditorLogSink | undefined =
    options.logFile === undefined ? undefined : createFileLogSink(options.logFile);
  const config: EditorConfig = options.fps === undefined ? {} : { fps: options.fps };
  const assets = loadEditorAssets({ tilesDir: options.tilesDir, uiDir: options.uiDir });
  await runNodeEditor({ assets, config, ...(log === undefined ? {} : { log }) });
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  main().then(
    () => exit(0),
    (err: unknown) => {
      stderr.write(`tessera error: ${err instanceof Error ? err.message : String(err)}\n`);
      exit(1);
    },
  );
}

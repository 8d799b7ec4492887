#!/usr/bin/env node
/**
 * jailfs CLI - inspect a protocol jail or capture an upload from a shell
 *
 * Usage:
 *   jailfs ls --source <dir> [options] [path]
 *   jailfs capture --data <dir> [options] <name> < file
 *
 * Options:
 *   --source <dir>          Directory mirrored into the jail
 *   --jail-root <dir>       Keep the jail on disk under <dir> (default: memory)
 *   --max-file-size <n>     Largest file mirrored, in bytes (default: 0, no limit)
 *   --protocol <name>       Jail name (default: ftp)
 *   --cwd <path>            Directory to change into before listing (default: /)
 *   --data <dir>            Directory receiving captured uploads
 *   --upload-dir <path>     Directory inside <dir> for uploads (default: /)
 *   --verbose               Log jail and upload events to stderr
 *   -h, --help         Show this help message
 *   -v, --version      Show version
 */

import { resolve } from "node:path";
import { type JailFsConfigInput, parseConfig } from "../config.js";
import { createErrorSanitizer } from "../fs/sanitize-error.js";
import { configuredRoots, openJail, openUploadStore } from "../setup.js";
import type { JailLogger } from "../types.js";
import { captureUpload } from "../upload/upload-writer.js";

interface CliOptions {
  command?: string;
  config: JailFsConfigInput;
  cwd: string;
  positional: string[];
  verbose: boolean;
  help: boolean;
  version: boolean;
}

function printHelp(): void {
  console.log(`jailfs - per-protocol chroot jails for honeypot file access

Usage:
  jailfs ls --source <dir> [options] [path]
  jailfs capture --data <dir> [options] <name> < file

Commands:
  ls         Mirror <dir> into a fresh in-memory jail and print an ls -lA
             listing of [path] (default: the working directory)
  capture    Store stdin as an upload named <name> and print the stored name

Options:
  --source <dir>          Directory mirrored into the jail
  --jail-root <dir>       Keep the jail on disk under <dir> (default: memory)
  --max-file-size <n>     Largest file mirrored, in bytes (default: 0, no limit)
  --protocol <name>       Jail name (default: ftp)
  --cwd <path>            Directory to change into before listing (default: /)
  --data <dir>            Directory receiving captured uploads
  --upload-dir <path>     Directory inside <dir> for uploads (default: /)
  --verbose               Log jail and upload events to stderr
  -h, --help              Show this help message
  -v, --version           Show version
`);
}

function printVersion(): void {
  console.log("jailfs 0.1.0");
}

function requireValue(args: string[], i: number, flag: string): string {
  if (i + 1 >= args.length) {
    console.error(`Error: ${flag} requires an argument`);
    process.exit(1);
  }
  return args[i + 1];
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    config: {},
    cwd: "/",
    positional: [],
    verbose: false,
    help: false,
    version: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      options.help = true;
      i++;
    } else if (arg === "-v" || arg === "--version") {
      options.version = true;
      i++;
    } else if (arg === "--verbose") {
      options.verbose = true;
      i++;
    } else if (arg === "--source") {
      options.config.sourceDir = resolve(requireValue(args, i, arg));
      i += 2;
    } else if (arg === "--data") {
      options.config.dataDir = resolve(requireValue(args, i, arg));
      i += 2;
    } else if (arg === "--jail-root") {
      options.config.jailRootDir = resolve(requireValue(args, i, arg));
      i += 2;
    } else if (arg === "--max-file-size") {
      // validated by the config schema
      options.config.maxMirrorFileSize = Number(requireValue(args, i, arg));
      i += 2;
    } else if (arg === "--upload-dir") {
      options.config.uploadDirectory = requireValue(args, i, arg);
      i += 2;
    } else if (arg === "--protocol") {
      options.config.protocol = requireValue(args, i, arg);
      i += 2;
    } else if (arg === "--cwd") {
      options.cwd = requireValue(args, i, arg);
      i += 2;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      process.exit(1);
    } else {
      if (options.command === undefined) {
        options.command = arg;
      } else {
        options.positional.push(arg);
      }
      i++;
    }
  }

  return options;
}

function consoleLogger(): JailLogger {
  const write = (
    level: string,
    message: string,
    data?: Record<string, unknown>,
  ) => {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    process.stderr.write(`[${level}] ${message}${suffix}\n`);
  };
  return {
    info: (message, data) => write("info", message, data),
    debug: (message, data) => write("debug", message, data),
  };
}

async function runList(
  options: CliOptions,
  logger?: JailLogger,
): Promise<void> {
  const jail = await openJail(parseConfig(options.config), logger);
  await jail.chdir(options.cwd);

  const target = options.positional[0] ?? ".";
  const names = await jail.listdir(target);
  for await (const line of jail.formatList(target, names)) {
    process.stdout.write(line);
  }
}

async function runCapture(
  options: CliOptions,
  logger?: JailLogger,
): Promise<void> {
  const name = options.positional[0];
  if (name === undefined) {
    console.error("Error: capture requires a <name>");
    process.exit(1);
  }
  const config = parseConfig(options.config);
  const store = await openUploadStore(config);
  const record = await captureUpload(store, name, process.stdin, {
    logger,
    directory: config.uploadDirectory,
  });
  console.log(record.name);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    printHelp();
    process.exit(0);
  }

  if (options.version) {
    printVersion();
    process.exit(0);
  }

  const logger = options.verbose ? consoleLogger() : undefined;
  const sanitize = createErrorSanitizer(configuredRoots(options.config));

  try {
    if (options.command === "ls") {
      await runList(options, logger);
    } else if (options.command === "capture") {
      await runCapture(options, logger);
    } else {
      printHelp();
      process.exit(1);
    }
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(sanitize(message));
    process.exit(1);
  }
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});

// mod-host/FileLogTap.ts

import fs from "fs";
import util from "util";

type ConsoleMethod = (...args: unknown[]) => void;

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    return stripAnsi(arg.stack ?? arg.message);
  }
  // util.inspect copes with cycles and BigInt where JSON.stringify throws.
  return stripAnsi(typeof arg === "object" ? util.inspect(arg, { depth: 4, breakLength: Infinity }) : String(arg));
}

export function formatLogLine(level: string, args: unknown[], at: Date = new Date()): string {
  return `[${at.toISOString()}] [${level}] ${args.map(serializeArg).join(" ")}\n`;
}

function wrapMethod(
  level: string,
  original: ConsoleMethod,
  writer: (level: string, args: unknown[]) => void,
): ConsoleMethod {
  return (...args: unknown[]): void => {
    writer(level, args);
    original.apply(console, args);
  };
}

/**
 * Mirror console output into `filePath` (appending, colors stripped).
 * Returns a function that restores the original console methods.
 * A file that cannot be written disables the tap; console output is unaffected.
 */
export function installFileLogTap(filePath: string): () => void {
  const stream = fs.createWriteStream(filePath, { flags: "a" });
  let broken = false;

  stream.on("error", (err: Error) => {
    broken = true;
    process.stderr.write(`File log tap disabled (${filePath}): ${err.message}\n`);
  });

  const writeLine = (level: string, args: unknown[]): void => {
    if (broken) return;
    stream.write(formatLogLine(level, args));
  };

  const { log, info, warn, error } = console;

  console.log = wrapMethod("log", log, writeLine);
  console.info = wrapMethod("info", info, writeLine);
  console.warn = wrapMethod("warn", warn, writeLine);
  console.error = wrapMethod("error", error, writeLine);

  return () => {
    console.log = log;
    console.info = info;
    console.warn = warn;
    console.error = error;
    stream.end();
  };
}

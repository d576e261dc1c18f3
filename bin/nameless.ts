#!/usr/bin/env -S node --import tsx

/**
 * nameless: evaluate lambda calculus terms from files.
 *
 * Usage:
 *   nameless <file> [--arg <file>] [--debug] [--normalize] [--max-steps <n>]
 *   nameless --generate <type> [--seed <seed>]
 *   nameless --help
 *
 * Examples:
 *   nameless k.lc --arg id.lc        # apply k.lc to id.lc and reduce
 *   nameless omega.lc -m 1000        # give up after 1000 β-steps
 */

import tkexport from "terminal-kit";

import { type CLIOptions, parseArgs, UsageError } from "../lib/cli/options.ts";
import { run } from "../lib/cli/run.ts";
import { createTerminalIO } from "../lib/cli/terminalIO.ts";

const { createTerminal } = tkexport;

// Diagnostics share stderr so that stdout carries results only.
const diagnostics = createTerminal({
  stdin: process.stdin,
  stdout: process.stderr,
  stderr: process.stderr,
  generic: "xterm",
  appId: "xterm",
  appName: "xterm",
  isTTY: process.stderr.isTTY,
});

function main(args: string[]): number {
  const io = createTerminalIO((line) => console.log(line), diagnostics);

  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(e.message);
      io.err("Use --help for usage information.");
      return 1;
    }
    throw e;
  }

  return run(options, io);
}

process.exitCode = main(process.argv.slice(2));

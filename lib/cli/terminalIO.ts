/**
 * The CLIIO the nameless binary runs with.
 *
 * Results go to the output stream as plain lines. Diagnostics and verbose
 * phase lines go to a separate coloured terminal, normally on stderr, so
 * that a result can be piped on as input.
 *
 * @module
 */
import { readFileSync } from "node:fs";
import { hrtime } from "node:process";
import rsexport from "random-seed";

import type { CLIIO } from "./run.ts";

const { create } = rsexport;

/**
 * The colours of a terminal-kit terminal used for diagnostics.
 */
export interface DiagnosticTerminal {
  red(text: string): unknown;
  cyan(text: string): unknown;
}

export function createTerminalIO(
  print: (line: string) => void,
  diagnostics: DiagnosticTerminal,
): CLIIO {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    out: print,
    err: (line) => {
      diagnostics.red(line + "\n");
    },
    info: (line) => {
      diagnostics.cyan(line + "\n");
    },
    randomSource: (seed) => create(seed),
    defaultSeed: () => hrtime.bigint().toString(),
  };
}

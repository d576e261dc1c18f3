/**
 * Command-line options for the nameless CLI.
 *
 * @module
 */
import { VERSION } from "../shared/version.ts";

export interface CLIOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  debug: boolean;
  normalize: boolean;
  maxSteps: number;
  inputPath?: string;
  argPath?: string;
  generate?: string;
  seed?: string;
}

/**
 * Thrown for command lines that cannot be run.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `
nameless v${VERSION}: evaluate lambda calculus terms

USAGE:
    nameless <file> [OPTIONS]
    nameless --generate <type> [--seed <seed>]

ARGUMENTS:
    <file>                  File containing the term to evaluate

OPTIONS:
    -a, --arg <file>        Apply the term to the term in this file
    -d, --debug             Print the structure of the result
    -n, --normalize         Reduce under binders to full normal form
    -m, --max-steps <n>     Give up after n β-steps (default: unbounded)
    -g, --generate <type>   Print a random closed term of the given type
    -s, --seed <seed>       Seed for --generate
    -V, --verbose           Report each phase as it runs
    -h, --help              Show this help message
    -v, --version           Show version information

OUTPUT:
    The reduced term, followed by " : <type>" when the term is typed. Only
    the part before " : " is a term that --arg or <file> can read back.
    Diagnostics and --verbose lines go to stderr.

EXAMPLES:
    nameless k.lc --arg id.lc
    nameless omega.lc --max-steps 1000
    nameless --generate "(A→B)→A→B" --seed 42
`;

const takeValue = (args: string[], i: number, flag: string): string => {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`Option ${flag} requires a value`);
  }
  return value;
};

const parseMaxSteps = (raw: string): number => {
  if (!/^[0-9]+$/.test(raw)) {
    throw new UsageError(`--max-steps expects a non-negative integer, got ${raw}`);
  }
  return Number(raw);
};

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    help: false,
    version: false,
    verbose: false,
    debug: false,
    normalize: false,
    maxSteps: Infinity,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--debug":
      case "-d":
        options.debug = true;
        break;
      case "--normalize":
      case "-n":
        options.normalize = true;
        break;
      case "--arg":
      case "-a":
        options.argPath = takeValue(args, i, arg);
        i++;
        break;
      case "--max-steps":
      case "-m":
        options.maxSteps = parseMaxSteps(takeValue(args, i, arg));
        i++;
        break;
      case "--generate":
      case "-g":
        options.generate = takeValue(args, i, arg);
        i++;
        break;
      case "--seed":
      case "-s":
        options.seed = takeValue(args, i, arg);
        i++;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (options.inputPath !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        options.inputPath = arg;
        break;
    }
  }

  const needsInput = !options.help && !options.version &&
    options.generate === undefined;
  if (needsInput && options.inputPath === undefined) {
    throw new UsageError("Missing input file");
  }

  return options;
}

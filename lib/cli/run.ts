/**
 * The nameless pipeline: read, parse, apply, type-check, reduce, print.
 *
 * All process interaction goes through a CLIIO, so the pipeline runs the
 * same under the real entry point and under test.
 *
 * @module
 */
import { parseTerm } from "../parser/lambda.ts";
import { ParseError } from "../parser/parseError.ts";
import { parseType } from "../parser/type.ts";
import { normalize, reduceWithBudget } from "../reduction/reduce.ts";
import { ReductionLimitError } from "../reduction/reductionError.ts";
import {
  GenerationError,
  randTypedTerm,
  type RandomSource,
} from "../terms/generator.ts";
import { apply, isTyped, type LambdaTerm } from "../terms/lambda.ts";
import { debugPrintTerm, prettyPrintTerm } from "../terms/prettyPrint.ts";
import { typecheck } from "../types/typedLambda.ts";
import { TypeError } from "../types/typeError.ts";
import { debugPrintTy, prettyPrintTy, type Type } from "../types/types.ts";
import { type CLIOptions, USAGE } from "./options.ts";
import { VERSION } from "../shared/version.ts";

export interface CLIIO {
  readFile(path: string): string;
  /** The result of the run. */
  out(line: string): void;
  /** Diagnostics. */
  err(line: string): void;
  /** Progress lines, emitted with --verbose only. */
  info(line: string): void;
  randomSource(seed: string): RandomSource;
  defaultSeed(): string;
}

/** Application nesting of terms printed by --generate. */
export const GENERATE_DEPTH = 3;

/**
 * A file that could not be read or parsed.
 */
export class InputError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InputError";
  }
}

const render = (
  options: CLIOptions,
  term: LambdaTerm,
  ty: Type | undefined,
): string => {
  const printTerm = options.debug ? debugPrintTerm : prettyPrintTerm;
  const printTy = options.debug ? debugPrintTy : prettyPrintTy;
  return ty === undefined
    ? printTerm(term)
    : `${printTerm(term)} : ${printTy(ty)}`;
};

const load = (io: CLIIO, path: string): LambdaTerm => {
  let source: string;
  try {
    source = io.readFile(path);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InputError(path, `Unable to open file ${path}: ${reason}`, e);
  }
  try {
    return parseTerm(source);
  } catch (e) {
    if (e instanceof ParseError) {
      throw new InputError(path, `Failed to parse ${path}: ${e.message}`, e);
    }
    throw e;
  }
};

function generate(options: CLIOptions, io: CLIIO, typeSource: string): void {
  const ty = parseType(typeSource);
  const seed = options.seed ?? io.defaultSeed();
  if (options.verbose) {
    io.info(`generating a term of type ${prettyPrintTy(ty)} with seed ${seed}`);
  }
  const term = randTypedTerm(io.randomSource(seed), ty, GENERATE_DEPTH);
  io.out(render(options, term, ty));
}

function evaluate(options: CLIOptions, io: CLIIO, inputPath: string): void {
  let term = load(io, inputPath);
  if (options.verbose) {
    io.info(`parsed ${inputPath}: ${prettyPrintTerm(term)}`);
  }

  if (options.argPath !== undefined) {
    term = apply(term, load(io, options.argPath));
    if (options.verbose) {
      io.info(`applied to ${options.argPath}: ${prettyPrintTerm(term)}`);
    }
  }

  let ty: Type | undefined;
  if (isTyped(term)) {
    ty = typecheck(term);
    if (options.verbose) {
      io.info(`type: ${prettyPrintTy(ty)}`);
    }
  }

  if (options.verbose) {
    const strategy = options.normalize
      ? "full normal form"
      : "weak head normal form";
    const limit = Number.isFinite(options.maxSteps)
      ? `at most ${options.maxSteps} β-steps`
      : "no step limit";
    io.info(`reducing to ${strategy} with ${limit}`);
  }
  const result = options.normalize
    ? normalize(term, options.maxSteps)
    : reduceWithBudget(term, options.maxSteps);

  io.out(render(options, result, ty));
}

/**
 * Runs the CLI and returns the process exit code. Errors the user can
 * act on are reported through `io.err`; anything else propagates.
 */
export function run(options: CLIOptions, io: CLIIO): number {
  if (options.help) {
    io.out(USAGE);
    return 0;
  }
  if (options.version) {
    io.out(`nameless v${VERSION}`);
    return 0;
  }

  try {
    if (options.generate !== undefined) {
      generate(options, io, options.generate);
    } else if (options.inputPath !== undefined) {
      evaluate(options, io, options.inputPath);
    } else {
      io.err("Missing input file");
      return 1;
    }
    return 0;
  } catch (e) {
    if (
      e instanceof InputError || e instanceof ParseError ||
      e instanceof GenerationError
    ) {
      io.err(e.message);
      return 1;
    }
    if (e instanceof TypeError) {
      io.err(`Term is not well-typed: ${e.message}`);
      return 1;
    }
    if (e instanceof ReductionLimitError) {
      io.err(`Term did not reduce: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

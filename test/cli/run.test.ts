import { expect } from "chai";
import { describe, it } from "mocha";
import rsexport from "random-seed";

import { parseArgs } from "../../lib/cli/options.ts";
import { type CLIIO, run } from "../../lib/cli/run.ts";
import { parseTerm } from "../../lib/parser/lambda.ts";
import { parseType } from "../../lib/parser/type.ts";
import { typecheck } from "../../lib/types/typedLambda.ts";
import { typesLitEq } from "../../lib/types/types.ts";

const { create } = rsexport;

const FILES: Record<string, string> = {
  "id.lc": "(λx.x)\n",
  "k.lc": "(λx.(λy.x))",
  "app.lc": "((λx.x) (λy.y))",
  "eta.lc": "(λx.((λy.y) x))",
  "omega.lc": "((λx.(x x)) (λx.(x x)))",
  "tid.lc": "(λx:A.x)",
  "tapply.lc": "(λf:A→A.f)",
  "mismatch.lc": "(λy:B.((λx:A.x) y))",
  "broken.lc": "(λx.x",
  "spine.lc": `(${"(λx.x) ".repeat(50_000)})`,
};

interface Captured {
  io: CLIIO;
  out: string[];
  err: string[];
  info: string[];
}

const capture = (): Captured => {
  const out: string[] = [];
  const err: string[] = [];
  const info: string[] = [];
  const io: CLIIO = {
    readFile: (path) => {
      const contents = FILES[path];
      if (contents === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return contents;
    },
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    info: (line) => info.push(line),
    randomSource: (seed) => create(seed),
    defaultSeed: () => "test-seed",
  };
  return { io, out, err, info };
};

const runWith = (args: string[]): Captured & { code: number } => {
  const captured = capture();
  const code = run(parseArgs(args), captured.io);
  return { ...captured, code };
};

describe("run", () => {
  describe("untyped terms", () => {
    it("prints the reduced term", () => {
      const { code, out, err } = runWith(["app.lc"]);
      expect(code).to.equal(0);
      expect(out).to.deep.equal(["(λa.a)"]);
      expect(err).to.deep.equal([]);
    });

    it("applies the term to the --arg term", () => {
      const { code, out } = runWith(["k.lc", "--arg", "id.lc"]);
      expect(code).to.equal(0);
      expect(out).to.deep.equal(["(λa.(λb.b))"]);
    });

    it("prints the structure in debug mode", () => {
      const { out } = runWith(["k.lc", "-a", "id.lc", "-d"]);
      expect(out).to.deep.equal(["Abstraction(Abstraction(Variable(0)))"]);
    });

    it("reduces under binders only when normalizing", () => {
      expect(runWith(["eta.lc"]).out).to.deep.equal(["(λa.((λb.b) a))"]);
      expect(runWith(["eta.lc", "-n"]).out).to.deep.equal(["(λa.a)"]);
    });

    it("reduces a long flat application", () => {
      const { code, out, err } = runWith(["spine.lc"]);
      expect(code).to.equal(0);
      expect(out).to.deep.equal(["(λa.a)"]);
      expect(err).to.deep.equal([]);
    });

    it("stops a divergent term at the step limit", () => {
      const { code, out, err } = runWith(["omega.lc", "--max-steps", "100"]);
      expect(code).to.equal(1);
      expect(out).to.deep.equal([]);
      expect(err).to.deep.equal([
        "Term did not reduce: reduction exceeded the limit of 100 β-steps",
      ]);
    });
  });

  describe("typed terms", () => {
    it("prints the type after the term", () => {
      const { code, out } = runWith(["tid.lc"]);
      expect(code).to.equal(0);
      expect(out).to.deep.equal(["(λa:A.a) : A→A"]);
    });

    it("checks the applied term", () => {
      const { out } = runWith(["tapply.lc", "--arg", "tid.lc"]);
      expect(out).to.deep.equal(["(λa:A.a) : A→A"]);
    });

    it("prints the type structure in debug mode", () => {
      const { out } = runWith(["tid.lc", "--debug"]);
      expect(out).to.deep.equal([
        "Abstraction(BaseType(A), Variable(0)) : " +
        "FunctionType(BaseType(A), BaseType(A))",
      ]);
    });

    it("rejects an ill-typed term", () => {
      const { code, out, err } = runWith(["mismatch.lc"]);
      expect(code).to.equal(1);
      expect(out).to.deep.equal([]);
      expect(err).to.deep.equal([
        "Term is not well-typed: attempted to apply term (λa:A.a):A→A " +
        "to term 0:B (expected A but found B)",
      ]);
    });

    it("rejects applying a typed term to an untyped one", () => {
      const { code, err } = runWith(["tapply.lc", "--arg", "id.lc"]);
      expect(code).to.equal(1);
      expect(err).to.deep.equal([
        "Term is not well-typed: abstraction (λa.a) has no argument type",
      ]);
    });
  });

  describe("input errors", () => {
    it("reports a missing file", () => {
      const { code, err } = runWith(["missing.lc"]);
      expect(code).to.equal(1);
      expect(err).to.deep.equal([
        "Unable to open file missing.lc: ENOENT: no such file or directory, open 'missing.lc'",
      ]);
    });

    it("reports a parse error with its position", () => {
      const { code, err } = runWith(["id.lc", "--arg", "broken.lc"]);
      expect(code).to.equal(1);
      expect(err).to.deep.equal([
        "Failed to parse broken.lc: expected ')' to close the abstraction opened at 0 but found 'EOF' at 5..5",
      ]);
    });
  });

  describe("generation", () => {
    it("prints a term of the requested type", () => {
      const { code, out } = runWith(["--generate", "(A→B)→A→B", "-s", "42"]);
      expect(code).to.equal(0);
      expect(out).to.have.length(1);
      const [termSrc, tySrc] = out[0].split(" : ");
      expect(tySrc).to.equal("(A→B)→A→B");
      expect(typesLitEq(typecheck(parseTerm(termSrc)), parseType(tySrc)))
        .to.equal(true);
    });

    it("uses the default seed when none is given", () => {
      const first = runWith(["--generate", "(A→A)→A→A"]).out;
      const second = runWith(["--generate", "(A→A)→A→A", "-s", "test-seed"])
        .out;
      expect(first).to.deep.equal(second);
    });

    it("reports a type with no closed term", () => {
      const { code, err } = runWith(["--generate", "A"]);
      expect(code).to.equal(1);
      expect(err).to.deep.equal(["no closed term of type A within depth 3"]);
    });

    it("reports a malformed type", () => {
      const { code, err } = runWith(["--generate", "A→"]);
      expect(code).to.equal(1);
      expect(err).to.deep.equal([
        "expected an identifier but found 'EOF' at 2..2",
      ]);
    });
  });

  describe("verbose output", () => {
    it("reports each phase", () => {
      const { info } = runWith(["k.lc", "-a", "id.lc", "-V", "-m", "10"]);
      expect(info).to.deep.equal([
        "parsed k.lc: (λa.(λb.a))",
        "applied to id.lc: ((λa.(λb.a)) (λa.a))",
        "reducing to weak head normal form with at most 10 β-steps",
      ]);
    });

    it("stays quiet by default", () => {
      expect(runWith(["k.lc"]).info).to.deep.equal([]);
    });
  });

  it("prints usage and version", () => {
    const help = runWith(["--help"]);
    expect(help.code).to.equal(0);
    expect(help.out[0]).to.include("USAGE:");
    expect(help.out[0]).to.include(
      'The reduced term, followed by " : <type>" when the term is typed.',
    );
    expect(runWith(["--version"]).out).to.deep.equal(["nameless v0.1.0"]);
  });
});

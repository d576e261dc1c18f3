import { expect } from "chai";
import { describe, it } from "mocha";

import { parseTerm } from "../../lib/parser/lambda.ts";
import {
  betaReduce,
  normalize,
  reduceWithBudget,
} from "../../lib/reduction/reduce.ts";
import {
  ReductionLimitError,
  StuckTermError,
} from "../../lib/reduction/reductionError.ts";
import {
  apply,
  createApplication,
  type LambdaTerm,
  mkAbs,
  mkVar,
  termsEq,
} from "../../lib/terms/lambda.ts";
import { prettyPrintNameless } from "../../lib/terms/prettyPrint.ts";
import { catchError } from "../util/catchError.ts";

const I = mkAbs(mkVar(0));
const OMEGA = "((λx.(x x)) (λx.(x x)))";

const church = (n: number): LambdaTerm => {
  let body: LambdaTerm = mkVar(0);
  for (let i = 0; i < n; i++) {
    body = createApplication(mkVar(1), body);
  }
  return mkAbs(mkAbs(body));
};

describe("betaReduce", () => {
  it("applies the identity", () => {
    const nf = betaReduce(parseTerm("((λx.x) (λy.y))"));
    expect(nf).to.deep.equal(I);
    expect(prettyPrintNameless(nf)).to.equal("λ 0");
  });

  it("returns the first of two arguments to K", () => {
    const nf = betaReduce(parseTerm("(((λx.(λy.x)) (λa.a)) (λb.(λc.b)))"));
    expect(nf).to.deep.equal(I);
  });

  it("does not reduce under an abstraction", () => {
    const term = parseTerm("(λx.((λy.y) x))");
    expect(betaReduce(term)).to.equal(term);
  });

  it("substitutes arguments without reducing them", () => {
    const term = parseTerm(`(((λx.(λy.y)) ${OMEGA}) (λz.z))`);
    expect(reduceWithBudget(term, 2)).to.deep.equal(I);
  });

  it("leaves the input term intact", () => {
    const src = "(((λx.(λy.x)) (λa.a)) (λb.(λc.b)))";
    const term = parseTerm(src);
    betaReduce(term);
    expect(termsEq(term, parseTerm(src))).to.equal(true);
  });

  it("reduces a long application spine without exhausting the stack", () => {
    let term: LambdaTerm = I;
    for (let i = 0; i < 50_000; i++) {
      term = createApplication(term, I);
    }
    expect(betaReduce(term)).to.deep.equal(I);
  });

  it("rejects an application headed by a free variable", () => {
    const stuck = createApplication(mkVar(0), mkVar(1));
    const err = catchError(StuckTermError, () => betaReduce(stuck));
    expect(err.term).to.deep.equal(stuck);
    expect(err.message).to.equal("cannot reduce open application (0 1)");
  });
});

describe("reduceWithBudget", () => {
  it("stops a divergent term once the budget is spent", () => {
    const err = catchError(
      ReductionLimitError,
      () => reduceWithBudget(parseTerm(OMEGA), 100),
    );
    expect(err.maxSteps).to.equal(100);
    expect(err.message).to.equal(
      "reduction exceeded the limit of 100 β-steps",
    );
  });

  it("allows exactly the budgeted number of steps", () => {
    const term = parseTerm("(((λx.(λy.x)) (λa.a)) (λb.(λc.b)))");
    expect(reduceWithBudget(term, 2)).to.deep.equal(I);
    expect(() => reduceWithBudget(term, 1)).to.throw(ReductionLimitError);
  });

  it("takes no steps for a term already in weak head normal form", () => {
    const term = parseTerm(`(λz.${OMEGA})`);
    expect(reduceWithBudget(term, 0)).to.equal(term);
  });
});

describe("normalize", () => {
  it("reduces under binders", () => {
    expect(normalize(parseTerm("(λx.((λy.y) x))"))).to.deep.equal(I);
  });

  it("computes the successor of a Church numeral", () => {
    const succ = parseTerm("(λn.(λf.(λx.(f ((n f) x)))))");
    expect(normalize(apply(succ, church(0)))).to.deep.equal(church(1));
  });

  it("adds Church numerals", () => {
    const plus = parseTerm("(λm.(λn.(λf.(λx.((m f) ((n f) x))))))");
    expect(normalize(apply(plus, church(2), church(2)))).to.deep.equal(
      church(4),
    );
  });

  it("multiplies Church numerals", () => {
    const mult = parseTerm("(λm.(λn.(λf.(m (n f)))))");
    expect(normalize(apply(mult, church(2), church(3)))).to.deep.equal(
      church(6),
    );
  });

  it("shares one budget across subterms", () => {
    expect(() => normalize(parseTerm(`(λz.${OMEGA})`), 50)).to.throw(
      ReductionLimitError,
      /limit of 50 β-steps/,
    );
  });
});

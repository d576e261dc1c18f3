import { expect } from "chai";
import { describe, it } from "mocha";

import {
  bind,
  emptyBindingContext,
  lookup,
} from "../../lib/parser/bindingContext.ts";

describe("binding context", () => {
  it("binds a new name at index 0", () => {
    const ctx = bind(emptyBindingContext(), "x");
    expect(lookup(ctx, "x")).to.equal(0);
    expect(lookup(ctx, "y")).to.equal(undefined);
  });

  it("moves existing bindings one binder further away", () => {
    const ctx = bind(bind(bind(emptyBindingContext(), "x"), "y"), "z");
    expect(lookup(ctx, "x")).to.equal(2);
    expect(lookup(ctx, "y")).to.equal(1);
    expect(lookup(ctx, "z")).to.equal(0);
  });

  it("shadows an outer binder of the same name", () => {
    const ctx = bind(bind(emptyBindingContext(), "x"), "x");
    expect(lookup(ctx, "x")).to.equal(0);
    expect(ctx.size).to.equal(1);
  });

  it("leaves the context it extends untouched", () => {
    const outer = bind(emptyBindingContext(), "x");
    bind(outer, "y");
    expect(lookup(outer, "x")).to.equal(0);
    expect(lookup(outer, "y")).to.equal(undefined);
  });
});

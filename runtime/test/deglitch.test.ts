import assert from "node:assert/strict";
import test from "node:test";

import { DeglitchCounter } from "../src/index.ts";

test("DeglitchCounter reports a fault after consecutive observations", () => {
  const counter = new DeglitchCounter(2);

  assert.equal(counter.update(true), false);
  assert.equal(counter.getCount(), 1);
  assert.equal(counter.update(true), true);
  assert.equal(counter.update(true), true);
  assert.equal(counter.getCount(), 2);
});

test("DeglitchCounter clears the count on a clean reading", () => {
  const counter = new DeglitchCounter(2);
  counter.update(true);

  assert.equal(counter.update(false), false);
  assert.equal(counter.getCount(), 0);
  assert.equal(counter.update(true), false);
});

test("DeglitchCounter reset returns to the initial state", () => {
  const counter = new DeglitchCounter(1);
  assert.equal(counter.update(true), true);

  counter.reset();

  assert.equal(counter.isFaulted(), false);
  assert.equal(counter.getCount(), 0);
});

test("DeglitchCounter requires a positive integer threshold", () => {
  assert.throws(() => new DeglitchCounter(0), {
    message: "Deglitch threshold must be a positive integer: 0"
  });
  assert.throws(() => new DeglitchCounter(1.5), {
    message: "Deglitch threshold must be a positive integer: 1.5"
  });
});

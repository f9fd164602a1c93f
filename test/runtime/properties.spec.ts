// test/runtime/properties.spec.ts
// Property-based tests: determinism, replay and FIFO delivery.

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Proc } from "../../src/core/ast";
import { vInt, vUri } from "../../src/core/eval/values";
import type { RunResult } from "../../src/core/concurrency/types";
import { contract, forComp, int, nu, par, print, recv, run, send, uri, v, withStdout } from "../helpers/terms";

/** A listener on `svc`, one linear receive on `c`, and sends on both. */
function workload(svc: number[], linear: number[]): Proc {
  return withStdout(
    nu(
      ["c"],
      par(
        contract(uri("svc"), [v("x")], print(v("x"))),
        forComp([recv([v("y")], v("c"))], print(v("y"))),
        ...svc.map((n) => send(uri("svc"), int(n))),
        ...linear.map((n) => send(v("c"), int(n)))
      )
    )
  );
}

function fingerprint(r: RunResult) {
  return { status: r.status, output: r.output, matches: r.matches, steps: r.steps, decisions: r.decisions };
}

const ints = fc.array(fc.integer({ min: -1000, max: 1000 }), { maxLength: 12 });

describe("Property-based tests", () => {
  it("runs the same term to the same result", () => {
    fc.assert(
      fc.property(ints, ints, (svc, linear) => {
        const term = workload(svc, linear);
        expect(fingerprint(run(term))).toEqual(fingerprint(run(term)));
      }),
      { numRuns: 40 }
    );
  });

  it("reproduces a run from its recorded decisions", () => {
    fc.assert(
      fc.property(ints, ints, fc.array(fc.nat({ max: 6 }), { maxLength: 200 }), (svc, linear, choices) => {
        const term = workload(svc, linear);
        const original = run(term, { config: { scheduler: { policy: "replay", replay: choices } } });
        const replayed = run(term, { config: { scheduler: { policy: "replay", replay: original.decisions } } });
        expect(fingerprint(replayed)).toEqual(fingerprint(original));
      }),
      { numRuns: 40 }
    );
  });

  it("delivers injected messages to a listener in publication order", () => {
    fc.assert(
      fc.property(ints, (values) => {
        const term = withStdout(contract(uri("svc"), [v("x")], print(v("x"))));
        const result = run(term, { inject: values.map((n) => ({ channel: vUri("svc"), payload: [vInt(n)] })) });
        expect(result.output).toEqual(values.map(String));
        expect(result.status).toBe("quiescent");
        expect(result.listeners).toHaveLength(1);
      }),
      { numRuns: 50 }
    );
  });

  it("consumes every linear message at most once", () => {
    fc.assert(
      fc.property(fc.array(fc.integer(), { minLength: 1, maxLength: 8 }), (linear) => {
        const result = run(workload([], linear));
        const linearMatches = result.matches.filter((m) => m.mode === "ONE_SHOT");
        expect(linearMatches).toHaveLength(1);
        expect(linearMatches[0].payload).toEqual([String(linear[0])]);
      }),
      { numRuns: 30 }
    );
  });
});

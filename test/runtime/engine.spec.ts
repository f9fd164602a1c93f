// test/runtime/engine.spec.ts
// End-to-end runs through the Engine API.

import { describe, it, expect } from "vitest";
import { InjectionError, EngineStateError, ConfigError } from "../../src/core/errors";
import { rootCause } from "../../src/outcome/failure";
import { vChan, vInt, vStr, vTuple, vUri, VTrue, VFalse } from "../../src/core/eval/values";
import type { EngineTrace } from "../../src/core/concurrency/types";
import {
  bin,
  bool,
  bundle,
  call,
  contract,
  engine,
  evalName,
  forComp,
  ifThen,
  int,
  letIn,
  list,
  map,
  match,
  nil,
  nu,
  par,
  print,
  recv,
  recvAck,
  run,
  select,
  send,
  sendPersistent,
  sendSync,
  str,
  uri,
  v,
  withStdout,
} from "../helpers/terms";

/** `new c in { Nil | for(x <- c) Nil }` */
const joinOnReceive = nu(["c"], par(nil, forComp([recv([v("x")], v("c"))], nil)));

describe("Engine", () => {
  describe("running terms", () => {
    it("prints to stdout", () => {
      const result = run(withStdout(print(str("hello"))));
      expect(result.status).toBe("done");
      expect(result.output).toEqual(["hello"]);
      expect(result.errors).toEqual([]);
    });

    it("captures stderr separately, joining payload items", () => {
      const result = run(nu([{ name: "err", uri: "rho:io:stderr" }], send(v("err"), str("oops"), int(2))));
      expect(result.errorOutput).toEqual(["oops 2"]);
      expect(result.output).toEqual([]);
    });

    it("returns the value of an expression root", () => {
      const result = run(bin("add", int(2), bin("mult", int(3), int(4))));
      expect(result.status).toBe("done");
      expect(result.value).toEqual(vInt(14));
    });

    it("binds let bindings in sequence", () => {
      const term = withStdout(
        letIn(
          [
            [v("x"), int(2)],
            [v("y"), bin("add", v("x"), int(3))],
          ],
          print(v("y"))
        )
      );
      expect(run(term).output).toEqual(["5"]);
    });

    it("branches on a condition", () => {
      const term = withStdout(
        par(
          ifThen(bin("lt", int(1), int(2)), print(str("yes")), print(str("no"))),
          ifThen(bool(false), print(str("never")))
        )
      );
      const result = run(term);
      expect(result.output).toEqual(["yes"]);
      expect(result.status).toBe("done");
    });

    it("evaluates methods and interpolation in payloads", () => {
      const term = withStdout(
        par(
          print(call(list(int(1), int(2)), "length")),
          print(bin("interpolate", str("Hi ${n}"), map([str("n"), str("Bo")])))
        )
      );
      expect(run(term).output.sort()).toEqual(["2", "Hi Bo"]);
    });

    it("runs a quoted process received on a channel", () => {
      const term = withStdout(
        nu(["c"], par(send(v("c"), print(str("q"))), forComp([recv([v("p")], v("c"))], evalName(v("p")))))
      );
      const result = run(term);
      expect(result.output).toEqual(["q"]);
      expect(result.status).toBe("done");
    });
  });

  describe("persistent listeners", () => {
    const service = withStdout(
      par(contract(uri("foo"), [v("x")], print(v("x"))), send(uri("foo"), int(1)), send(uri("foo"), int(2)))
    );

    it("serve every message and stay registered", () => {
      const result = run(service);
      expect(result.status).toBe("quiescent");
      expect(result.output.sort()).toEqual(["1", "2"]);
      expect(result.matches).toHaveLength(2);
      expect(result.listeners).toHaveLength(1);
      expect(result.failure).toBeUndefined();
    });

    it("are reported as a warning at quiescence", () => {
      const result = run(service);
      expect(result.diagnostics.map((d) => d.message)).toEqual(["1 persistent listener(s) still registered"]);
    });

    it("handle messages injected before the run", () => {
      const term = withStdout(contract(uri("svc"), [v("x")], print(v("x"))));
      const result = run(term, {
        inject: [
          { channel: vUri("svc"), payload: [vStr("a")] },
          { channel: vUri("svc"), payload: [vStr("b")] },
        ],
      });
      expect(result.output).toEqual(["a", "b"]);
    });
  });

  describe("joins", () => {
    it("wait for every branch and resume after injection", () => {
      const e = engine();
      e.load(joinOnReceive);

      const first = e.run();
      expect(first.status).toBe("deadlock");
      expect(e.instance(1)?.state).toEqual({ tag: "JOINING" });
      expect(first.deadlock?.blocked.map((b) => b.id)).toEqual([0, 1, 3]);
      expect(first.deadlock?.blocked[2].waitsOn).toBe("message on #0.0");
      expect(first.failure?.reason).toBe("deadlock");

      e.inject(vChan("0.0"), [vInt(5)]);
      const second = e.run();
      expect(second.status).toBe("done");
      expect(second.failure).toBeUndefined();
    });
  });

  describe("kept sends", () => {
    it("reach every receive already waiting for a persistent send", () => {
      const term = withStdout(
        nu(
          ["c"],
          par(
            forComp([recv([v("x")], v("c"))], print(str("a"))),
            forComp([recv([v("y")], v("c"))], print(str("b"))),
            sendPersistent(v("c"), int(1))
          )
        )
      );
      const result = run(term);
      expect(result.status).toBe("done");
      expect(result.output.sort()).toEqual(["a", "b"]);
      expect(result.matches.map((m) => m.persistence)).toEqual(["PERSISTENT", "PERSISTENT"]);
    });

    it("reach a linear receive waiting behind a peek", () => {
      const term = withStdout(
        nu(
          ["c"],
          par(
            forComp([recv([v("x")], v("c"), "peek")], print(str("peek"))),
            forComp([recv([v("y")], v("c"))], print(str("lin"))),
            send(v("c"), int(1))
          )
        )
      );
      const result = run(term);
      expect(result.status).toBe("done");
      expect(result.output.sort()).toEqual(["lin", "peek"]);
      expect(result.matches.map((m) => m.mode)).toEqual(["PEEK", "ONE_SHOT"]);
    });
  });

  describe("& receipts", () => {
    const both = (kind: "linear" | "repeated") => [recv([v("x")], v("a"), kind), recv([v("y")], v("b"), kind)];

    it("fire once every bind has a message", () => {
      const term = withStdout(
        nu(
          ["a", "b"],
          par(forComp([both("linear")], print(bin("add", v("x"), v("y")))), send(v("a"), int(1)), send(v("b"), int(2)))
        )
      );
      const result = run(term);
      expect(result.status).toBe("done");
      expect(result.output).toEqual(["3"]);
    });

    it("leave a lone message unconsumed", () => {
      const e = engine();
      e.load(nu(["a", "b"], par(forComp([both("linear")], nil), send(v("a"), int(1)))));
      const result = e.run();
      expect(result.status).toBe("deadlock");
      expect(result.matches).toEqual([]);
      expect(e.stats().pendingSends).toBe(1);
      expect(e.stats().pendingReceives).toBe(2);
    });

    it("serve every complete set when repeated", () => {
      const term = withStdout(
        nu(
          ["a", "b"],
          par(
            forComp([both("repeated")], print(bin("add", v("x"), v("y")))),
            send(v("a"), int(1)),
            send(v("b"), int(2)),
            send(v("a"), int(10)),
            send(v("b"), int(20))
          )
        )
      );
      const result = run(term);
      expect(result.status).toBe("quiescent");
      expect(result.output.sort()).toEqual(["3", "30"]);
    });
  });

  describe("select", () => {
    it("fires one arm and retracts the others", () => {
      const term = withStdout(
        nu(
          ["c1", "c2"],
          par(
            send(v("c1"), int(1)),
            send(v("c2"), int(2)),
            select([
              [[v("x")], v("c1"), print(str("a"))],
              [[v("y")], v("c2"), print(str("b"))],
            ])
          )
        )
      );
      const e = engine();
      e.load(term);
      const result = e.run();

      expect(result.status).toBe("done");
      expect(result.output).toEqual(["a"]);
      expect(e.stats().pendingReceives).toBe(0);
      expect(e.stats().pendingSends).toBe(1);
      expect(result.diagnostics.map((d) => d.message)).toEqual(["Unused message on #1.1"]);
    });
  });

  describe("failures", () => {
    it("short-circuits and / or", () => {
      const boom = bin("eq", bin("div", int(1), int(0)), int(0));
      expect(run(bin("and", bool(false), boom))).toMatchObject({ status: "done", value: VFalse, errors: [] });
      expect(run(bin("or", bool(true), boom))).toMatchObject({ status: "done", value: VTrue, errors: [] });
    });

    it("propagates a failing operand as child-failed", () => {
      const result = run(bin("and", bool(true), bin("eq", bin("div", int(1), int(0)), int(0))));
      expect(result.status).toBe("error");
      expect(result.failure?.reason).toBe("child-failed");
      expect(result.failure && rootCause(result.failure).reason).toBe("division-by-zero");
      expect(result.errors.map((e) => [e.instanceId, e.failure.reason])).toEqual([[2, "division-by-zero"]]);
    });

    it("fails arithmetic that overflows instead of rounding", () => {
      const result = run(bin("add", int(9007199254740992), int(1)));
      expect(result.status).toBe("error");
      expect(result.failure && rootCause(result.failure).reason).toBe("integer-overflow");
    });

    it("stops a receive on a write-only bundle", () => {
      const result = run(nu(["c"], bundle("write", forComp([recv([v("x")], v("c"))], nil))));
      expect(result.status).toBe("error");
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].failure.reason).toBe("capability-violation");
      expect(result.errors[0].failure.message).toBe("Capability violation: receive on bundle write (bundle+ #0.0)");
    });

    it("reports an exhausted match", () => {
      const result = run(
        match(int(5), [
          [int(1), nil],
          [str("a"), nil],
        ])
      );
      expect(result.status).toBe("error");
      expect(result.failure?.reason).toBe("pattern-match-exhausted");
      expect(result.failure?.message).toBe("No pattern matched 5");
    });

    it("keeps sibling branches running after a failure", () => {
      const term = withStdout(par(match(int(1), [[int(2), nil]]), print(str("still here"))));
      const result = run(term);
      expect(result.output).toEqual(["still here"]);
      expect(result.status).toBe("error");
      expect(result.failure?.reason).toBe("child-failed");
    });

    it("stops at the step budget", () => {
      const loop = par(contract(uri("loop"), [v("x")], send(uri("loop"), v("x"))), send(uri("loop"), int(1)));
      const result = run(loop, { maxSteps: 200 });
      expect(result.status).toBe("budget-exceeded");
      expect(result.failure?.message).toBe("Budget exceeded: 200 steps");
      expect(result.steps).toBe(200);
    });
  });

  describe("synchronous send", () => {
    it("continues once the receiver acknowledges", () => {
      const term = withStdout(
        nu(
          ["c"],
          par(sendSync(v("c"), [int(1)], print(str("acked"))), forComp([recvAck([v("x")], v("c"))], nil))
        )
      );
      const result = run(term);
      expect(result.output).toEqual(["acked"]);
      expect(result.status).toBe("done");
    });

    it("times out when configured", () => {
      const result = run(nu(["c"], sendSync(v("c"), [int(1)])), {
        config: { scheduler: { syncSendTimeoutSteps: 5 } },
      });
      expect(result.status).toBe("error");
      expect(result.errors[0].failure.reason).toBe("timeout");
      expect(result.errors[0].failure.message).toBe("Timed out after 5 steps");
    });

    it("deadlocks without a receiver", () => {
      const result = run(nu(["c"], sendSync(v("c"), [int(1)])));
      expect(result.status).toBe("deadlock");
      expect(result.deadlock?.description).toBe(
        [
          "Deadlock detected:",
          "  instance 0 (New) in JOINING waiting on children 1",
          "  instance 1 (SendSync) in WAITING waiting on message on #1.0",
        ].join("\n")
      );
      expect(result.diagnostics.map((d) => d.code)).toEqual(["E0302", "W0002"]);
      expect(result.diagnostics[1].message).toBe("Unused message on #0.0");
    });
  });

  describe("cancel", () => {
    it("cancels a subtree and clears its registrations", () => {
      const e = engine();
      e.load(joinOnReceive);
      e.run();
      expect(e.stats().pendingReceives).toBe(1);

      expect(e.cancel(0)).toBe(true);
      expect(e.stats().pendingReceives).toBe(0);
      expect(e.instance(0)?.failure?.reason).toBe("cancelled");
      expect(e.cancel(0)).toBe(false);
      expect(e.run().status).toBe("error");
    });
  });

  describe("inject", () => {
    it("rejects a name without write capability", () => {
      const e = engine();
      try {
        e.inject(vChan("x", { read: true, write: false }), [vInt(1)]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InjectionError);
        if (err instanceof InjectionError) expect(err.failure.reason).toBe("capability-violation");
      }
    });

    it("rejects a payload no pending receive can take", () => {
      const e = engine();
      e.load(joinOnReceive);
      e.run();
      expect(() => e.inject(vChan("0.0"), [vInt(1), vInt(2)])).toThrow(
        "Malformed event: 2 item(s) sent on #0.0, whose receives expect 1"
      );
      expect(e.stats().pendingSends).toBe(0);
    });

    it("accepts structured payloads", () => {
      const e = engine();
      e.inject(vUri("inbox"), [vTuple([vInt(1), vStr("a")])]);
      expect(e.stats().pendingSends).toBe(1);
    });
  });

  describe("API misuse", () => {
    it("refuses to run before load", () => {
      expect(() => engine().run()).toThrow(EngineStateError);
    });

    it("refuses a second load", () => {
      const e = engine();
      e.load(nil);
      expect(() => e.load(nil)).toThrow("A process is already loaded");
    });

    it("refuses an invalid configuration", () => {
      expect(() => engine({ config: { scheduler: { maxSteps: 0 } } })).toThrow(ConfigError);
    });
  });

  describe("observation", () => {
    it("reports the event ledger from spawn to finish", () => {
      const events: EngineTrace[] = [];
      run(withStdout(print(str("hi"))), { observe: (e) => events.push(e) });

      expect(events[0]).toEqual({ tag: "spawn", id: 0, parentId: undefined, role: "process", term: "New" });
      expect(events[events.length - 1]).toMatchObject({ tag: "finish", status: "done" });
      expect(events).toContainEqual({ tag: "output", stream: "stdout", text: "hi" });
    });

    it("stops reporting after unsubscribe", () => {
      const e = engine();
      const seen: string[] = [];
      const stop = e.observe((event) => seen.push(event.tag));
      e.load(nil);
      stop();
      e.run();
      expect(seen).toEqual(["spawn"]);
    });
  });
});

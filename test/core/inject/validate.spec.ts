import { describe, it, expect } from "vitest";
import { Env } from "../../../src/core/eval/env";
import { vChan, vInt, vList, vStr } from "../../../src/core/eval/values";
import { ChannelStore } from "../../../src/core/concurrency/store";
import { checkInjection } from "../../../src/core/inject/validate";
import { nil, v } from "../../helpers/terms";

describe("checkInjection", () => {
  it("accepts a ground payload on a writable name", () => {
    expect(checkInjection(new ChannelStore(), vChan("c"), [vInt(1), vList([vStr("a")])])).toBeUndefined();
  });

  it("refuses a name that is not writable", () => {
    const failure = checkInjection(new ChannelStore(), vChan("c", { read: true, write: false }), [vInt(1)]);
    expect(failure?.reason).toBe("capability-violation");
    expect(failure?.message).toBe("Capability violation: send on bundle read (bundle- #c)");
  });

  it("refuses a channel that is not a name", () => {
    expect(checkInjection(new ChannelStore(), vInt(3), [])?.message).toBe("Malformed event: channel 3 is not a name");
  });

  it("refuses a quoted process in the payload", () => {
    const quoted = { tag: "Proc" as const, proc: nil, env: Env.empty() };
    expect(checkInjection(new ChannelStore(), vChan("c"), [vInt(1), quoted])?.message).toBe(
      "Malformed event: payload item 1 (@{Nil}) is not a ground value"
    );
  });

  it("checks the arity against waiting receives", () => {
    const store = new ChannelStore();
    store.request(vChan("c"), [v("x")], "ONE_SHOT", 1, Env.empty());
    store.request(vChan("c"), [v("x"), v("y")], "ONE_SHOT", 2, Env.empty());
    expect(checkInjection(store, vChan("c"), [vInt(1), vInt(2)])).toBeUndefined();
    expect(checkInjection(store, vChan("c"), [])?.message).toBe(
      "Malformed event: 0 item(s) sent on #c, whose receives expect 1, 2"
    );
  });
});

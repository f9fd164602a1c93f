// src/core/inject/validate.ts
// Checks a message offered from outside the process tree before it reaches
// the channel store.

import type { Val } from "../eval/values";
import { isGround, showVal } from "../eval/values";
import { capsMode } from "../eval/machineStep";
import type { ChannelStoreView } from "../concurrency/store";
import type { Failure } from "../../outcome/failure";
import { capabilityViolation, malformedEvent } from "../../outcome/constructors";

export type Injection = {
  channel: Val;
  payload: Val[];
};

/**
 * Returns the reason the message must be rejected, or undefined when it may
 * be published.
 */
export function checkInjection(store: ChannelStoreView, channel: Val, payload: Val[]): Failure | undefined {
  if (!isGround(channel)) {
    return malformedEvent(`channel ${showVal(channel)} is not a name`);
  }
  if (channel.tag === "Chan" && !channel.caps.write) {
    return capabilityViolation("send", capsMode(channel.caps), showVal(channel));
  }

  const bad = payload.findIndex((v) => !isGround(v));
  if (bad >= 0) {
    return malformedEvent(`payload item ${bad} (${showVal(payload[bad])}) is not a ground value`);
  }

  // Arity mismatch with every receive already waiting on the channel.
  const receives = store.pendingReceives(channel);
  if (receives.length > 0 && receives.every((r) => r.patterns.length !== payload.length)) {
    const arities = Array.from(new Set(receives.map((r) => r.patterns.length))).join(", ");
    return malformedEvent(
      `${payload.length} item(s) sent on ${showVal(channel)}, whose receives expect ${arities}`
    );
  }

  return undefined;
}

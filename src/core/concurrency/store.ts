// src/core/concurrency/store.ts
// The channel store: per channel, FIFO pending sends and FIFO pending
// receive registrations, and the matching between them. The only structure
// mutated on behalf of more than one instance; every public method is one
// indivisible operation and yields at most one delivery.

import type { Proc } from "../ast";
import type { Env } from "../eval/env";
import type { Val } from "../eval/values";
import { valKey, showVal } from "../eval/values";
import type { MatchBindings } from "../eval/match";
import { matchFormals } from "../eval/match";

export type InstanceId = number;
export type RegistrationId = number;

export type SendPersistence = "ONCE" | "PERSISTENT";
export type ReceiveMode = "ONE_SHOT" | "PERSISTENT" | "PEEK" | "RACE";

export type SendEntry = {
  seq: number;
  channel: Val;
  payload: Val[];
  persistence: SendPersistence;
  consumed: boolean;
  /** Instance that published it; undefined for injected messages */
  owner?: InstanceId;
};

export type ReceiveEntry = {
  id: RegistrationId;
  seq: number;
  channel: Val;
  patterns: Proc[];
  mode: ReceiveMode;
  continuation: InstanceId;
  /** Receiver's environment, consulted by pinned (=x) patterns */
  env: Env;
  /** RACE registrations of one select share a group */
  group?: number;
  /** Select arm this registration stands for */
  arm?: number;
  /** Components of one join (`for (x <- a & y <- b)`) share a join id */
  join?: number;
};

/** A successful match, to be turned into MESSAGE_AVAILABLE for `continuation`. */
export type Delivery = {
  continuation: InstanceId;
  registration: RegistrationId;
  /** Send that was offered to `registration` */
  sendSeq: number;
  channel: Val;
  payload: Val[];
  bindings: MatchBindings;
  mode: ReceiveMode;
  persistence: SendPersistence;
  arm?: number;
  /** Payload taken by each component of a join, in component order */
  parts?: Val[][];
};

export type MatchRecord = {
  index: number;
  channel: string;
  sendSeq: number;
  registration: RegistrationId;
  continuation: InstanceId;
  persistence: SendPersistence;
  mode: ReceiveMode;
  payload: string[];
};

export type RequestResult =
  | { tag: "Matched"; delivery: Delivery }
  | { tag: "Registered"; registration: RegistrationId };

export type SelectArm = { channel: Val; patterns: Proc[] };

type Pick = { send: SendEntry; recv: ReceiveEntry; bindings: MatchBindings };

export type SelectResult =
  | { tag: "Matched"; delivery: Delivery }
  | { tag: "Registered"; group: number; registrations: RegistrationId[] };

export type ChannelSnapshot = {
  channel: string;
  sends: Array<{ seq: number; payload: string[]; persistence: SendPersistence; owner?: InstanceId }>;
  receives: Array<{ id: RegistrationId; mode: ReceiveMode; continuation: InstanceId; arity: number }>;
};

export type StoreStats = {
  channels: number;
  pendingSends: number;
  pendingReceives: number;
  matches: number;
};

type Bucket = { sends: SendEntry[]; receives: ReceiveEntry[] };

/**
 * Read-only view handed to the transition function.
 */
export interface ChannelStoreView {
  pendingSends(channel: Val): readonly SendEntry[];
  pendingReceives(channel: Val): readonly ReceiveEntry[];
  isRegistered(registration: RegistrationId): boolean;
}

export class ChannelStore implements ChannelStoreView {
  private readonly buckets = new Map<string, Bucket>();
  private readonly registrations = new Map<RegistrationId, ReceiveEntry>();
  private readonly joins = new Map<number, ReceiveEntry[]>();
  private readonly log: MatchRecord[] = [];
  private nextSeq = 0;
  private nextRegistration = 1;
  private nextGroup = 1;
  private nextJoin = 1;

  /** Every match so far, in the order it happened. */
  get matches(): readonly MatchRecord[] {
    return this.log;
  }

  // ─────────────────────────────────────────────────────────────────
  // publish / request / select
  // ─────────────────────────────────────────────────────────────────

  /**
   * Offer a message. Tries pending receives in FIFO order; at most one match.
   * Returns the delivery on a match, undefined when the send was queued.
   * A send that survives its match (PERSISTENT, or taken by a PEEK) stays
   * queued; hand it to the receives behind the one that matched with
   * {@link offer}.
   */
  publish(channel: Val, payload: Val[], persistence: SendPersistence, owner?: InstanceId): Delivery | undefined {
    const bucket = this.bucket(channel);
    const send: SendEntry = { seq: this.nextSeq++, channel, payload, persistence, consumed: false, owner };

    for (const recv of bucket.receives) {
      const delivery = this.offerTo(send, recv);
      if (!delivery) continue;
      if (!send.consumed) bucket.sends.push(send);
      return delivery;
    }

    bucket.sends.push(send);
    return undefined;
  }

  /**
   * Offer a queued send to the given receives, in order; at most one match.
   * Receives no longer registered, or registered on another channel, are
   * skipped. Returns undefined once the send has been consumed.
   */
  offer(channel: Val, sendSeq: number, candidates: readonly RegistrationId[]): Delivery | undefined {
    const send = this.pendingSends(channel).find((s) => s.seq === sendSeq);
    if (!send) return undefined;
    const key = channelKey(channel);

    for (const id of candidates) {
      const recv = this.registrations.get(id);
      if (!recv || channelKey(recv.channel) !== key) continue;
      const delivery = this.offerTo(send, recv);
      if (delivery) return delivery;
    }
    return undefined;
  }

  /**
   * Ask for a message. Tries pending sends in FIFO order; at most one match.
   *
   * Passing `registration` re-arms an existing PERSISTENT registration in
   * place: the entry keeps its FIFO position and is not duplicated.
   */
  request(
    channel: Val,
    patterns: Proc[],
    mode: Exclude<ReceiveMode, "RACE">,
    continuation: InstanceId,
    env: Env,
    registration?: RegistrationId
  ): RequestResult {
    const bucket = this.bucket(channel);
    const existing = registration !== undefined ? this.registrations.get(registration) : undefined;
    const recv: ReceiveEntry = existing ?? {
      id: this.nextRegistration++,
      seq: this.nextSeq++,
      channel,
      patterns,
      mode,
      continuation,
      env,
    };

    for (const send of bucket.sends) {
      const bindings = matchFormals(recv.patterns, send.payload, recv.env);
      if (!bindings) continue;

      if (!existing && recv.mode === "PERSISTENT") {
        this.register(bucket, recv);
      }
      return { tag: "Matched", delivery: this.consume(send, recv, bindings) };
    }

    if (!existing) {
      this.register(bucket, recv);
    }
    return { tag: "Registered", registration: recv.id };
  }

  /**
   * Receive on several channels at once. Fires only when every component
   * has a matching send, taking all of them in one match; until then
   * nothing is consumed and each component waits on its own channel.
   *
   * Passing `registration` (any component of the join) re-arms an existing
   * PERSISTENT join in place.
   */
  join(
    arms: SelectArm[],
    mode: Exclude<ReceiveMode, "RACE">,
    continuation: InstanceId,
    env: Env,
    registration?: RegistrationId
  ): RequestResult {
    const armed = registration !== undefined ? this.registrations.get(registration)?.join : undefined;
    const current = armed !== undefined ? this.joins.get(armed) : undefined;
    const join = this.nextJoin++;
    const entries: ReceiveEntry[] =
      current ??
      arms.map((arm) => ({
        id: this.nextRegistration++,
        seq: this.nextSeq++,
        channel: arm.channel,
        patterns: arm.patterns,
        mode,
        continuation,
        env,
        join,
      }));

    const delivery = this.completeJoin(entries);
    if (!current && (!delivery || mode === "PERSISTENT")) {
      this.joins.set(join, entries);
      for (const recv of entries) this.register(this.bucket(recv.channel), recv);
    }
    return delivery ? { tag: "Matched", delivery } : { tag: "Registered", registration: entries[0].id };
  }

  /**
   * Race one receive across several channels. The first arm (in arm order)
   * with a pending match wins at once; otherwise every arm is registered in
   * one group and the first publish that matches any of them retracts the
   * rest of the group.
   */
  select(arms: SelectArm[], continuation: InstanceId, env: Env): SelectResult {
    const group = this.nextGroup++;
    const entries: ReceiveEntry[] = arms.map((arm, i) => ({
      id: this.nextRegistration++,
      seq: this.nextSeq++,
      channel: arm.channel,
      patterns: arm.patterns,
      mode: "RACE",
      continuation,
      env,
      group,
      arm: i,
    }));

    for (const recv of entries) {
      const bucket = this.bucket(recv.channel);
      for (const send of bucket.sends) {
        const bindings = matchFormals(recv.patterns, send.payload, recv.env);
        if (bindings) {
          return { tag: "Matched", delivery: this.consume(send, recv, bindings) };
        }
      }
    }

    for (const recv of entries) {
      this.register(this.bucket(recv.channel), recv);
    }
    return { tag: "Registered", group, registrations: entries.map((e) => e.id) };
  }

  // ─────────────────────────────────────────────────────────────────
  // Retraction
  // ─────────────────────────────────────────────────────────────────

  /** Remove a registration (and, for RACE or a join, its whole group). */
  retract(registration: RegistrationId): boolean {
    const recv = this.registrations.get(registration);
    if (!recv) return false;
    if (recv.group !== undefined) {
      this.retractGroup(recv.group);
    } else if (recv.join !== undefined) {
      for (const part of this.joins.get(recv.join) ?? [recv]) this.unregister(part);
    } else {
      this.unregister(recv);
    }
    return true;
  }

  /** Remove the receive registrations of a terminated instance. */
  retractReceivesOf(instance: InstanceId): number {
    let receives = 0;
    for (const recv of Array.from(this.registrations.values())) {
      if (recv.continuation === instance) {
        this.unregister(recv);
        receives++;
      }
    }
    return receives;
  }

  /**
   * Remove everything tied to a cancelled instance: its receive
   * registrations and the PERSISTENT sends it published.
   */
  retractOwnedBy(instance: InstanceId): { receives: number; sends: number } {
    const receives = this.retractReceivesOf(instance);
    let sends = 0;
    for (const bucket of this.buckets.values()) {
      const before = bucket.sends.length;
      bucket.sends = bucket.sends.filter((s) => !(s.owner === instance && s.persistence === "PERSISTENT"));
      sends += before - bucket.sends.length;
    }
    return { receives, sends };
  }

  // ─────────────────────────────────────────────────────────────────
  // Observation
  // ─────────────────────────────────────────────────────────────────

  pendingSends(channel: Val): readonly SendEntry[] {
    return this.buckets.get(channelKey(channel))?.sends ?? [];
  }

  pendingReceives(channel: Val): readonly ReceiveEntry[] {
    return this.buckets.get(channelKey(channel))?.receives ?? [];
  }

  isRegistered(registration: RegistrationId): boolean {
    return this.registrations.has(registration);
  }

  registrationsOf(instance: InstanceId): ReceiveEntry[] {
    return Array.from(this.registrations.values()).filter((r) => r.continuation === instance);
  }

  snapshot(channel: Val): ChannelSnapshot {
    return {
      channel: showVal(channel),
      sends: this.pendingSends(channel).map((s) => ({
        seq: s.seq,
        payload: s.payload.map(showVal),
        persistence: s.persistence,
        owner: s.owner,
      })),
      receives: this.pendingReceives(channel).map((r) => ({
        id: r.id,
        mode: r.mode,
        continuation: r.continuation,
        arity: r.patterns.length,
      })),
    };
  }

  /** Snapshots of every channel that still holds entries. */
  nonEmptyChannels(): ChannelSnapshot[] {
    const out: ChannelSnapshot[] = [];
    for (const bucket of this.buckets.values()) {
      const first = bucket.sends[0]?.channel ?? bucket.receives[0]?.channel;
      if (first) out.push(this.snapshot(first));
    }
    return out;
  }

  stats(): StoreStats {
    let pendingSends = 0;
    let pendingReceives = 0;
    let channels = 0;
    for (const bucket of this.buckets.values()) {
      if (bucket.sends.length + bucket.receives.length > 0) channels++;
      pendingSends += bucket.sends.length;
      pendingReceives += bucket.receives.length;
    }
    return { channels, pendingSends, pendingReceives, matches: this.log.length };
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private bucket(channel: Val): Bucket {
    const key = channelKey(channel);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { sends: [], receives: [] };
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  private register(bucket: Bucket, recv: ReceiveEntry): void {
    bucket.receives.push(recv);
    this.registrations.set(recv.id, recv);
  }

  private unregister(recv: ReceiveEntry): void {
    const bucket = this.buckets.get(channelKey(recv.channel));
    if (bucket) {
      bucket.receives = bucket.receives.filter((r) => r.id !== recv.id);
    }
    this.registrations.delete(recv.id);
    if (recv.join !== undefined) this.joins.delete(recv.join);
  }

  /** Match one send against one registration; a join component needs the rest of its join. */
  private offerTo(send: SendEntry, recv: ReceiveEntry): Delivery | undefined {
    if (recv.join !== undefined) {
      const entries = this.joins.get(recv.join);
      return entries ? this.completeJoin(entries, send) : undefined;
    }
    const bindings = matchFormals(recv.patterns, send.payload, recv.env);
    return bindings ? this.consume(send, recv, bindings) : undefined;
  }

  /**
   * Pick a distinct send for every component, oldest matching first, then
   * consume them all. Nothing is touched unless every component is covered.
   * An `incoming` send (queued or not) must be one of those picked; the
   * component that took it is the one the delivery names.
   */
  private completeJoin(entries: ReceiveEntry[], incoming?: SendEntry): Delivery | undefined {
    const unqueued = incoming && !this.pendingSends(incoming.channel).includes(incoming) ? [incoming] : [];
    const taken = new Set<SendEntry>();
    const picks: Pick[] = [];

    for (const recv of entries) {
      const pick = this.oldestMatch(recv, taken, unqueued);
      if (!pick) return undefined;
      taken.add(pick.send);
      picks.push(pick);
    }

    const via = incoming ? picks.find((p) => p.send === incoming)?.recv : entries[0];
    if (!via) return undefined;
    const bindings: MatchBindings = new Map();
    let lead: Delivery | undefined;
    for (const pick of picks) {
      const delivery = this.consume(pick.send, pick.recv, pick.bindings);
      for (const [name, v] of pick.bindings) bindings.set(name, v);
      if (pick.recv === via) lead = delivery;
    }
    if (!lead) return undefined;
    return { ...lead, bindings, parts: picks.map((p) => p.send.payload) };
  }

  private oldestMatch(recv: ReceiveEntry, taken: ReadonlySet<SendEntry>, unqueued: readonly SendEntry[]): Pick | undefined {
    const key = channelKey(recv.channel);
    const queue = [...this.pendingSends(recv.channel), ...unqueued.filter((s) => channelKey(s.channel) === key)];
    for (const send of queue) {
      if (taken.has(send)) continue;
      const bindings = matchFormals(recv.patterns, send.payload, recv.env);
      if (bindings) return { send, recv, bindings };
    }
    return undefined;
  }

  private retractGroup(group: number): void {
    for (const recv of Array.from(this.registrations.values())) {
      if (recv.group === group) this.unregister(recv);
    }
  }

  /**
   * Apply the removal policy to a matched pair and log the match. A stored
   * send is removed unless it is PERSISTENT or the receive is a PEEK; a
   * stored receive is removed unless it is PERSISTENT; a RACE receive takes
   * its whole group with it.
   */
  private consume(send: SendEntry, recv: ReceiveEntry, bindings: MatchBindings): Delivery {
    if (send.persistence === "ONCE" && recv.mode !== "PEEK") {
      const bucket = this.buckets.get(channelKey(send.channel));
      if (bucket && bucket.sends.includes(send)) {
        bucket.sends = bucket.sends.filter((s) => s !== send);
      }
      send.consumed = true;
    }

    if (recv.mode === "RACE" && recv.group !== undefined) {
      this.retractGroup(recv.group);
    } else if (recv.mode !== "PERSISTENT" && this.registrations.has(recv.id)) {
      this.unregister(recv);
    }

    this.log.push({
      index: this.log.length,
      channel: showVal(send.channel),
      sendSeq: send.seq,
      registration: recv.id,
      continuation: recv.continuation,
      persistence: send.persistence,
      mode: recv.mode,
      payload: send.payload.map(showVal),
    });

    return {
      continuation: recv.continuation,
      registration: recv.id,
      sendSeq: send.seq,
      channel: send.channel,
      payload: send.payload,
      bindings,
      mode: recv.mode,
      persistence: send.persistence,
      arm: recv.arm,
    };
  }
}

/** Channel identity: canonical key of the name, capabilities ignored. */
export function channelKey(channel: Val): string {
  return valKey(channel);
}

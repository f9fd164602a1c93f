import { describe, it, expect } from "vitest";
import { detectCycle } from "../../../src/core/concurrency/critic";

describe("detectCycle", () => {
  it("finds nothing in a tree of waits", () => {
    expect(
      detectCycle([
        { from: 0, resource: "instance:1", holder: 1 },
        { from: 1, resource: "channel:#c" },
        { from: 0, resource: "instance:2", holder: 2 },
      ])
    ).toBeUndefined();
  });

  it("returns the instances on a cycle", () => {
    expect(
      detectCycle([
        { from: 5, resource: "instance:1", holder: 1 },
        { from: 1, resource: "instance:2", holder: 2 },
        { from: 2, resource: "instance:1", holder: 1 },
      ])
    ).toEqual([1, 2]);
  });
});

import { describe, it, expect } from "vitest";
import { DecodeError } from "../../../src/core/errors";
import { decodeProcess, decodeValue, parseJson, parseProcess } from "../../../src/core/codec";
import { VNil, vBool, vChan, vInt, vList, vMap, vSet, vStr, vTuple, vUri } from "../../../src/core/eval/values";

const c = { tag: "Var", name: "c" };

describe("decodeProcess", () => {
  it("fills in defaults", () => {
    expect(decodeProcess({ tag: "Send", channel: c, inputs: [] })).toEqual({
      tag: "Send",
      channel: { tag: "Var", name: "c" },
      inputs: [],
      persistent: false,
    });

    const forComp = decodeProcess({
      tag: "For",
      receipts: [{ patterns: [], source: { tag: "Simple", channel: c } }],
      body: { tag: "Nil" },
    });
    expect(forComp.tag === "For" && forComp.receipts[0][0].kind).toBe("linear");

    const letIn = decodeProcess({ tag: "Let", bindings: [], body: { tag: "Nil" } });
    expect(letIn.tag === "Let" && letIn.concurrent).toBe(false);
  });

  it("reads a receipt as one bind or as binds joined with &", () => {
    const a = { patterns: [{ tag: "Var", name: "x" }], source: { tag: "Simple", channel: c } };
    const b = { kind: "linear", patterns: [{ tag: "Var", name: "y" }], source: { tag: "Simple", channel: c } };
    const term = decodeProcess({ tag: "For", receipts: [a, [a, b]], body: { tag: "Nil" } });
    expect(term.tag === "For" && term.receipts.map((r) => r.length)).toEqual([1, 2]);
    expect(term.tag === "For" && term.receipts[1][1].patterns).toEqual([{ tag: "Var", name: "y" }]);
    expect(() => decodeProcess({ tag: "For", receipts: [[]], body: { tag: "Nil" } })).toThrow(DecodeError);
  });

  it("decodes nested terms", () => {
    const term = decodeProcess({
      tag: "New",
      decls: [{ name: "out", uri: "rho:io:stdout" }],
      body: { tag: "Send", channel: { tag: "Var", name: "out" }, inputs: [{ tag: "Str", value: "hi" }] },
    });
    expect(term.tag === "New" && term.decls).toEqual([{ name: "out", uri: "rho:io:stdout" }]);
    expect(term.tag === "New" && term.body.tag).toBe("Send");
  });

  it("rejects unknown tags", () => {
    expect(() => decodeProcess({ tag: "Teleport" })).toThrow(DecodeError);
  });

  it("rejects integer literals outside the safe range", () => {
    expect(() => decodeProcess({ tag: "Int", value: 9007199254740992 })).toThrow(DecodeError);
    expect(decodeProcess({ tag: "Int", value: -9007199254740991 })).toEqual({ tag: "Int", value: -9007199254740991 });
  });

  it("reports the path of a bad field", () => {
    try {
      decodeProcess({ tag: "Int", value: 1.5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      if (err instanceof DecodeError) {
        expect(err.code).toBe("DECODE_FAILED");
        expect(err.message.startsWith("Invalid process term: value: ")).toBe(true);
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith("value: ")).toBe(true);
      }
    }
  });
});

describe("parseProcess", () => {
  it("parses JSON text", () => {
    expect(parseProcess('{"tag":"Nil"}')).toEqual({ tag: "Nil" });
  });

  it("reports invalid JSON", () => {
    expect(() => parseJson("{")).toThrow(/^Invalid JSON: /);
  });
});

describe("decodeValue", () => {
  it("maps JSON scalars", () => {
    expect(decodeValue(null)).toEqual(VNil);
    expect(decodeValue(true)).toEqual(vBool(true));
    expect(decodeValue(42)).toEqual(vInt(42));
    expect(decodeValue("hi")).toEqual(vStr("hi"));
  });

  it("maps arrays and tagged objects", () => {
    expect(decodeValue([1, "a"])).toEqual(vList([vInt(1), vStr("a")]));
    expect(decodeValue({ uri: "rho:io:stdout" })).toEqual(vUri("rho:io:stdout"));
    expect(decodeValue({ name: "ack" })).toEqual(vChan("ack"));
    expect(decodeValue({ tuple: [1, null] })).toEqual(vTuple([vInt(1), VNil]));
    expect(decodeValue({ set: [2, 1, 2] })).toEqual(vSet([vInt(1), vInt(2)]));
    expect(decodeValue({ map: [["k", [1]]] })).toEqual(vMap([[vStr("k"), vList([vInt(1)])]]));
  });

  it("rejects fractions and untagged objects", () => {
    expect(() => decodeValue(1.5)).toThrow(/^Invalid value: /);
    expect(() => decodeValue(9007199254740992)).toThrow(/^Invalid value: /);
    expect(() => decodeValue({ uri: "a", extra: 1 })).toThrow(DecodeError);
  });
});

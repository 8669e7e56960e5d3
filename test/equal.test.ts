import { describe, it, expect } from "vitest";
import { compareDocuments, equal, semanticEqual } from "../src/engine/equal.js";
import { isKeyedArray, keyedArraysEqual } from "../src/engine/keyed.js";
import { createPolicy, EMPTY_POLICY, workflowNodePolicy } from "../src/engine/policy.js";
import { ABSENT, type Value } from "../src/types/value.js";
import { parse } from "../src/value/model.js";

function tree(text: string): Value {
  const res = parse(text);
  if (!res.ok) throw res.error;
  return res.value;
}

const eq = (a: string, b: string) => semanticEqual(a, b, workflowNodePolicy);

describe("semanticEqual", () => {
  const cases: Array<{ name: string; a: string; b: string; expected: boolean }> = [
    { name: "identical strings", a: '{"key": "value"}', b: '{"key": "value"}', expected: true },
    { name: "different whitespace", a: '{"key": "value"}', b: '{ "key" : "value" }', expected: true },
    { name: "different key order", a: '{"a":1,"b":2}', b: '{"b":2,"a":1}', expected: true },
    { name: "nested formatting", a: '{"outer":{"inner":"value"}}', b: '{"outer": {"inner": "value"}}', expected: true },
    { name: "same array", a: "[1, 2, 3]", b: "[1,2,3]", expected: true },
    { name: "different values", a: '{"key": "value1"}', b: '{"key": "value2"}', expected: false },
    { name: "missing key", a: '{"a": 1, "b": 2}', b: '{"a": 1}', expected: false },
    { name: "plain array order", a: "[1,2,3]", b: "[3,2,1]", expected: false },
    { name: "null vs missing", a: '{"k":"v","main":null}', b: '{"k":"v"}', expected: true },
    { name: "optional default field", a: '{"id":"n1","executeOnce":false}', b: '{"id":"n1"}', expected: true },
    { name: "keyed array order", a: '[{"key":"a"},{"key":"b"}]', b: '[{"key":"b"},{"key":"a"}]', expected: true },
    { name: "position order", a: '{"position":[100,200]}', b: '{"position":[200,100]}', expected: false },
    { name: "invalid a", a: "{bad}", b: '{"k":1}', expected: false },
    { name: "invalid b", a: '{"k":1}', b: "{bad}", expected: false },
    { name: "both invalid", a: "{invalid}", b: "{also-invalid}", expected: false },
    { name: "empty objects", a: "{}", b: "{ }", expected: true },
    { name: "empty arrays", a: "[]", b: "[ ]", expected: true },
    { name: "empty object vs empty array", a: "{}", b: "[]", expected: true },
    { name: "stripped-only object vs empty", a: '{"disabled":true,"x":null}', b: "{}", expected: true },
    { name: "number literal form", a: '{"n":42}', b: '{"n":42.0}', expected: true },
    { name: "exponent literal", a: "[1000]", b: "[1e3]", expected: true },
    { name: "number vs string", a: '{"n":1}', b: '{"n":"1"}', expected: false },
    { name: "object vs array", a: '{"a":{"0":1}}', b: '{"a":[1]}', expected: false },
    { name: "bool values", a: '{"active":true}', b: '{"active":false}', expected: false },
    {
      name: "realistic node",
      a: `[{"id":"manual-trigger","name":"When clicking 'Test workflow'","parameters":{},"position":[240,300],"type":"n8n-nodes-base.manualTrigger","typeVersion":1}]`,
      b: `[{"id": "manual-trigger", "name": "When clicking 'Test workflow'", "parameters": {}, "position": [240, 300], "type": "n8n-nodes-base.manualTrigger", "typeVersion": 1, "disabled": false}]`,
      expected: true,
    },
  ];

  for (const c of cases) {
    it(c.name, () => {
      expect(eq(c.a, c.b)).toBe(c.expected);
    });
  }

  it("is symmetric", () => {
    for (const c of cases) {
      expect(eq(c.b, c.a)).toBe(eq(c.a, c.b));
    }
  });

  it("does not strip optional fields without a policy", () => {
    expect(semanticEqual('{"id":"n1","executeOnce":false}', '{"id":"n1"}', EMPTY_POLICY)).toBe(false);
  });

  it("uses only the fields of the policy it is given", () => {
    const policy = createPolicy(["pinned"]);
    expect(semanticEqual('{"a":1,"pinned":true}', '{"a":1}', policy)).toBe(true);
    expect(semanticEqual('{"a":1,"disabled":false}', '{"a":1}', policy)).toBe(false);
  });

  it("ignores nulls and optional fields nested inside arrays", () => {
    const a = '{"nodes":[{"id":"1","retryOnFail":false,"credentials":null,"parameters":{"opts":{}}}]}';
    const b = '{"nodes":[{"id":"1"}]}';
    expect(eq(a, b)).toBe(true);
  });

  it("returns false for input nested beyond maxDepth", () => {
    expect(semanticEqual("[[1]]", "[[1]]", EMPTY_POLICY, { maxDepth: 1 })).toBe(false);
    expect(semanticEqual("[[1]]", "[[1]]", EMPTY_POLICY, { maxDepth: 2 })).toBe(true);
  });

  it("handles documents nested to the default limit", () => {
    const deep = (n: number) => "[".repeat(n) + "1" + "]".repeat(n);
    expect(semanticEqual(deep(1000), deep(1000), EMPTY_POLICY)).toBe(true);
    expect(semanticEqual(deep(1000), deep(999), EMPTY_POLICY)).toBe(false);
  });

  it("returns false instead of overflowing when a huge maxDepth is requested", () => {
    const deep = "[".repeat(2000) + "1" + "]".repeat(2000);
    expect(semanticEqual(deep, deep, EMPTY_POLICY, { maxDepth: 100_000 })).toBe(false);
  });

  it("treats identical unparsable text as different", () => {
    expect(eq("{bad}", "{bad}")).toBe(false);
  });
});

describe("keyed arrays", () => {
  it("compares parameter lists as multisets", () => {
    const a = '[{"key":"url","value":"x"},{"key":"method","value":"GET"},{"key":"url","value":"x"}]';
    const b = '[{"key":"url","value":"x"},{"key":"url","value":"x"},{"key":"method","value":"GET"}]';
    expect(eq(a, b)).toBe(true);
  });

  it("requires matching multiplicity", () => {
    const a = '[{"key":"a"},{"key":"a"},{"key":"b"}]';
    const b = '[{"key":"a"},{"key":"b"},{"key":"b"}]';
    expect(eq(a, b)).toBe(false);
  });

  it("keeps same-key elements with different content distinct", () => {
    const a = '[{"key":"a","v":1},{"key":"a","v":2}]';
    expect(eq(a, '[{"key":"a","v":2},{"key":"a","v":1}]')).toBe(true);
    expect(eq(a, '[{"key":"a","v":1},{"key":"a","v":1}]')).toBe(false);
  });

  it("detects a changed element value", () => {
    expect(eq('[{"key":"a","v":1},{"key":"b"}]', '[{"key":"b"},{"key":"a","v":3}]')).toBe(false);
  });

  it("distinguishes numeric and string keys", () => {
    expect(eq('[{"key":1},{"key":"2"}]', '[{"key":"2"},{"key":"1"}]')).toBe(false);
  });

  it("applies inside nested structures after normalization", () => {
    const a = '{"parameters":{"headers":[{"key":"b","value":"2","disabled":false},{"key":"a","value":null}]}}';
    const b = '{"parameters":{"headers":[{"key":"a"},{"key":"b","value":"2"}]}}';
    expect(eq(a, b)).toBe(true);
  });

  it("falls back to positional comparison when one element lacks a key", () => {
    const a = '[{"key":"a"},{"name":"b"}]';
    const b = '[{"name":"b"},{"key":"a"}]';
    expect(eq(a, b)).toBe(false);
    expect(eq(a, a)).toBe(true);
  });

  it("does not treat object-valued keys as keyed", () => {
    const a = '[{"key":{"id":1}},{"key":{"id":2}}]';
    const b = '[{"key":{"id":2}},{"key":{"id":1}}]';
    expect(eq(a, b)).toBe(false);
  });

  it("never compares keyed against non-keyed as a multiset", () => {
    expect(eq('[{"key":"a"},{"key":"b"}]', '[{"key":"b"},{"nokey":"a"}]')).toBe(false);
  });

  it("isKeyedArray checks every element", () => {
    const items = (text: string) => {
      const v = tree(text);
      return v.kind === "array" ? v.items : [];
    };
    expect(isKeyedArray(items('[{"key":"a"},{"key":true},{"key":3}]'))).toBe(true);
    expect(isKeyedArray(items('[{"key":"a"},{"key":null}]'))).toBe(false);
    expect(isKeyedArray(items('[{"key":"a"},"a"]'))).toBe(false);
  });

  it("keyedArraysEqual rejects different lengths", () => {
    const x = tree('{"key":"a"}');
    expect(keyedArraysEqual([x], [x, x], () => true)).toBe(false);
  });
});

describe("equal", () => {
  it("handles ABSENT on either side", () => {
    expect(equal(ABSENT, ABSENT)).toBe(true);
    expect(equal(ABSENT, tree("1"))).toBe(false);
    expect(equal(tree('{"a":1}'), ABSENT)).toBe(false);
  });

  it("compares objects regardless of key order", () => {
    expect(equal(tree('{"a":1,"b":[true]}'), tree('{"b":[true],"a":1}'))).toBe(true);
    expect(equal(tree('{"a":1}'), tree('{"a":1,"b":2}'))).toBe(false);
  });

  it("compares null only with null", () => {
    expect(equal(tree("null"), tree("null"))).toBe(true);
    expect(equal(tree("null"), tree("false"))).toBe(false);
  });
});

describe("compareDocuments", () => {
  it("reports which side failed to parse", () => {
    const res = compareDocuments("{bad}", '{"k":1}', EMPTY_POLICY);
    expect(res.equal).toBe(false);
    expect(res.errors.a?.code).toBe("parse_error");
    expect(res.errors.b).toBeUndefined();
  });

  it("returns no errors for valid input", () => {
    expect(compareDocuments("[1]", "[1]", EMPTY_POLICY)).toEqual({ equal: true, errors: {} });
  });
});

import { LosslessNumber } from "lossless-json";
import { describe, expect, it } from "vitest";
import { decodePayload } from "./sanitize.middleware";

const buf = (text: string) => Buffer.from(text, "utf8");

describe("decodePayload", () => {
  it("decodes a JSON object", () => {
    expect(decodePayload(buf('{"query":"{ a }","variables":{"n":1}}'))).toEqual({
      query: "{ a }",
      variables: { n: new LosslessNumber("1") },
    });
  });

  it("keeps the digits of integers beyond 2^53", () => {
    expect(decodePayload(buf('{"variables":{"id":12345678901234567891}}'))).toEqual({
      variables: { id: new LosslessNumber("12345678901234567891") },
    });
  });

  it("keeps the last of two conflicting query keys", () => {
    expect(decodePayload(buf('{"query":"{ a; }","query":"{ b; }"}'))).toEqual({
      query: "{ b; }",
    });
  });

  it.each([
    ["an empty body", ""],
    ["invalid JSON", "{ query: "],
    ["a JSON array", '[{"query":"{ a }"}]'],
    ["a JSON string", '"{ a }"'],
    ["JSON null", "null"],
  ])("treats %s as an empty payload", (_label, text) => {
    expect(decodePayload(buf(text))).toBeNull();
  });
});

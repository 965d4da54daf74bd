import { describe, expect, it } from "vitest";

import {
  addAttribute,
  attributeEntries,
  attributesOf,
  checkBooleanAttribute,
  checkIntAttribute,
  contractErrorMessage,
  findExprAttribute,
  findStringAttribute,
} from "./attributes.js";
import { contract, Expression, nextId, type Attributes } from "./spec.js";

const literal = (value: boolean | bigint) =>
  typeof value === "boolean"
    ? Expression.boolean(nextId(), value)
    : Expression.integer(nextId(), value);

describe("attributes", () => {
  it("keeps every occurrence of a key in source order", () => {
    const one = literal(1n);
    const attributes = attributesOf([
      ["inline", []],
      ["weight", [one]],
      ["inline", ["later"]],
    ]);

    expect(attributeEntries(attributes)).toEqual([
      ["inline", []],
      ["inline", ["later"]],
      ["weight", [one]],
    ]);
  });

  it("finds the last single-parameter occurrence", () => {
    const first = literal(1n);
    const second = literal(2n);
    const attributes = attributesOf([
      ["k", [first]],
      ["k", [second, "extra"]],
      ["k", ["text"]],
    ]);

    expect(findExprAttribute(attributes, "k")).toBe(first);
    expect(findStringAttribute(attributes, "k")).toBe("text");
    expect(findExprAttribute(attributes, "missing")).toBeNull();
  });

  describe("checkBooleanAttribute", () => {
    it("reads literals and bare keys", () => {
      expect(
        checkBooleanAttribute(attributesOf([["b", [literal(false)]]]), "b"),
      ).toEqual({ valid: true, value: false });
      expect(checkBooleanAttribute(attributesOf([["b", []]]), "b")).toEqual({
        valid: true,
        value: true,
      });
      expect(checkBooleanAttribute(new Map(), "b")).toEqual({
        valid: true,
        value: null,
      });
    });

    it("rejects other parameters", () => {
      expect(
        checkBooleanAttribute(attributesOf([["b", [literal(3n)]]]), "b"),
      ).toEqual({ valid: false });
      expect(checkBooleanAttribute(attributesOf([["b", ["yes"]]]), "b")).toEqual(
        { valid: false },
      );
    });
  });

  describe("checkIntAttribute", () => {
    it("reads integer literals", () => {
      expect(checkIntAttribute(attributesOf([["n", [literal(7n)]]]), "n")).toEqual(
        { valid: true, value: 7 },
      );
      expect(checkIntAttribute(new Map(), "n")).toEqual({
        valid: true,
        value: null,
      });
    });

    it("rejects values beyond the safe integer range", () => {
      const huge = literal(BigInt(Number.MAX_SAFE_INTEGER) + 1n);
      expect(checkIntAttribute(attributesOf([["n", [huge]]]), "n")).toEqual({
        valid: false,
      });
      expect(checkIntAttribute(attributesOf([["n", [literal(true)]]]), "n")).toEqual(
        { valid: false },
      );
    });
  });

  it("appends to the first occurrence of an existing key", () => {
    const attributes: Attributes = attributesOf([
      ["k", ["a"]],
      ["k", ["b"]],
    ]);
    addAttribute(attributes, "k", "c");
    addAttribute(attributes, "fresh", "d");

    expect(attributes.get("k")).toEqual([["a", "c"], ["b"]]);
    expect(attributes.get("fresh")).toEqual([["d"]]);
  });

  it("takes a contract's error message from its msg attribute", () => {
    const condition = literal(true);
    expect(
      contractErrorMessage(
        contract(nextId(), "requires", condition, {
          attributes: attributesOf([["msg", ["x must be positive"]]]),
        }),
      ),
    ).toBe("x must be positive");
    expect(
      contractErrorMessage(contract(nextId(), "ensures", condition)),
    ).toBeNull();
  });
});

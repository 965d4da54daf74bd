import { describe, expect, it } from "vitest";

import { Type } from "./definitions.js";

const list: Type.ConstructorDeclaration = { id: "list", name: "List", arity: 1 };
const pair: Type.ConstructorDeclaration = { id: "pair", name: "Pair", arity: 2 };

const intToBool = () => new Type.Map([], [Type.int], Type.bool);

describe("Type", () => {
  describe("emit", () => {
    it("prints basic types, bitvectors and maps", () => {
      expect(Type.int.toString()).toBe("int");
      expect(Type.bv(32).toString()).toBe("bv32");
      expect(intToBool().toString()).toBe("[int]bool");
    });

    it("parenthesizes constructor arguments by binding strength", () => {
      const nested = new Type.Ctor(list, [new Type.Ctor(list, [Type.int])]);
      expect(nested.toString()).toBe("List (List int)");

      const lastMap = new Type.Ctor(list, [intToBool()]);
      expect(lastMap.toString()).toBe("List [int]bool");

      const firstMap = new Type.Ctor(pair, [intToBool(), Type.int]);
      expect(firstMap.toString()).toBe("Pair ([int]bool) int");
    });

    it("prints polymorphic maps with their binders", () => {
      const a = new Type.Variable("a");
      expect(new Type.Map([a], [a], a).toString()).toBe("<a>[a]a");
    });

    it("prints synonyms by name", () => {
      const a = new Type.Variable("a");
      const set = new Type.Synonym(
        { name: "Set", typeParameters: [a], body: new Type.Map([], [a], Type.bool) },
        [Type.int],
      );
      expect(set.toString()).toBe("Set int");
      expect(set.expanded.toString()).toBe("[int]bool");
    });

    it("names open proxies", () => {
      expect(new Type.Proxy("x").toString()).toMatch(/^x\$proxy#\d+$/);
      expect(new Type.MapProxy("m", 2).toString()).toBe("[?, ?]?");
    });
  });

  describe("equality", () => {
    it("compares maps up to renaming of binders", () => {
      const a = new Type.Variable("a");
      const b = new Type.Variable("b");
      expect(new Type.Map([a], [a], a).equals(new Type.Map([b], [b], b))).toBe(
        true,
      );
      expect(
        new Type.Map([a], [a], Type.int).equals(new Type.Map([b], [b], b)),
      ).toBe(false);
    });

    it("sees through synonyms", () => {
      const set = new Type.Synonym(
        { name: "IntSet", typeParameters: [], body: intToBool() },
        [],
      );
      expect(set.equals(intToBool())).toBe(true);
    });

    it("never equates distinct unresolved names", () => {
      expect(new Type.Unresolved("T").equals(new Type.Unresolved("T"))).toBe(
        false,
      );
      expect(new Type.Unresolved("T").unify(new Type.Unresolved("T"))).toBe(
        false,
      );
    });

    it("interns narrow bitvector types only", () => {
      expect(Type.bv(8)).toBe(Type.bv(8));
      expect(Type.bv(256)).not.toBe(Type.bv(256));
      expect(Type.bv(256).equals(Type.bv(256))).toBe(true);
    });
  });

  describe("unify", () => {
    it("defines a proxy at most once", () => {
      const proxy = new Type.Proxy("x");
      expect(proxy.unify(Type.int)).toBe(true);
      expect(Type.follow(proxy)).toBe(Type.int);
      expect(proxy.unify(Type.bool)).toBe(false);
      expect(proxy.toString()).toBe("int");
    });

    it("joins proxies into one class", () => {
      const first = new Type.Proxy("x");
      const second = new Type.Proxy("y");
      expect(first.unify(second)).toBe(true);
      expect(second.unify(Type.bv(4))).toBe(true);
      expect(Type.follow(first)).toBe(Type.bv(4));
    });

    it("rejects cyclic proxy definitions", () => {
      const proxy = new Type.Proxy("x");
      expect(proxy.unify(new Type.Ctor(list, [proxy]))).toBe(false);
      expect(proxy.target).toBeNull();
    });

    it("rejects a proxy inside the map it would stand for", () => {
      const proxy = new Type.Proxy("x");
      expect(proxy.unify(new Type.Map([], [proxy], Type.int))).toBe(false);
      expect(proxy.target).toBeNull();
    });

    it("agrees with equality when nothing is unifiable", () => {
      const a = new Type.Variable("a");
      const b = new Type.Variable("b");
      const pairs: [Type, Type][] = [
        [Type.int, Type.int],
        [Type.int, Type.bool],
        [Type.bv(4), Type.bv(8)],
        [intToBool(), intToBool()],
        [intToBool(), new Type.Map([], [Type.int], Type.int)],
        [new Type.Ctor(list, [Type.int]), new Type.Ctor(list, [Type.bool])],
        [new Type.Map([a], [a], a), new Type.Map([b], [b], b)],
        [new Type.Map([a], [a], Type.int), new Type.Map([b], [b], b)],
      ];
      for (const [left, right] of pairs) {
        const unifier: Type.Substitution = new Map();
        expect(left.unify(right, [], unifier)).toBe(left.equals(right));
        expect(unifier.size).toBe(0);
      }
    });

    it("instantiates unifiable variables", () => {
      const a = new Type.Variable("a");
      const unifier: Type.Substitution = new Map();
      expect(new Type.Ctor(list, [a]).unify(
        new Type.Ctor(list, [Type.int]),
        [a],
        unifier,
      )).toBe(true);
      expect(unifier.get(a)).toBe(Type.int);
    });

    it("performs the occurs check on variables", () => {
      const a = new Type.Variable("a");
      const unifier: Type.Substitution = new Map();
      expect(a.unify(new Type.Ctor(list, [a]), [a], unifier)).toBe(false);
      expect(unifier.size).toBe(0);
    });

    it("keeps rigid variables apart", () => {
      const a = new Type.Variable("a");
      expect(a.unify(Type.int)).toBe(false);
      expect(a.unify(a)).toBe(true);
    });

    it("unifies polymorphic maps with matching binders", () => {
      const a = new Type.Variable("a");
      const b = new Type.Variable("b");
      expect(new Type.Map([a], [a], Type.bool).unify(
        new Type.Map([b], [b], Type.bool),
      )).toBe(true);
      expect(new Type.Map([a], [a], Type.bool).unify(
        new Type.Map([b], [b], b),
      )).toBe(false);
    });
  });

  describe("bitvector proxies", () => {
    it("accept widths from their minimum up", () => {
      const proxy = new Type.BvProxy("x", 8);
      expect(proxy.unify(Type.bv(4))).toBe(false);
      expect(proxy.unify(Type.bv(16))).toBe(true);
      expect(proxy.bits).toBe(16);
      expect(proxy.toString()).toBe("bv16");
    });

    it("keep the width they were first given", () => {
      const proxy = new Type.BvProxy("x", 4);
      expect(proxy.unify(Type.bv(8))).toBe(true);
      expect(proxy.unify(Type.bv(4))).toBe(false);
      expect(Type.bvBits(proxy)).toBe(8);
    });

    it("spread the width of a concatenation over its operands", () => {
      const open = new Type.BvProxy("a", 4);
      const concatenation = Type.BvProxy.concatenation("c", open, Type.bv(8));
      expect(concatenation.minBits).toBe(12);

      expect(concatenation.unify(Type.bv(16))).toBe(true);
      expect(Type.bvBits(open)).toBe(8);
    });

    it("unify only with bitvectors", () => {
      expect(new Type.BvProxy("x", 1).unify(Type.int)).toBe(false);
      expect(new Type.BvProxy("x", 1).unify(new Type.MapProxy("m", 1))).toBe(
        false,
      );
    });
  });

  describe("map proxies", () => {
    it("check their constraints against a map", () => {
      const proxy = new Type.MapProxy("m", 1);
      proxy.addConstraint({ args: [Type.int], result: Type.bool });
      expect(proxy.unify(intToBool())).toBe(true);
      expect(proxy.toString()).toBe("[int]bool");
    });

    it("stay open when a constraint does not fit", () => {
      const proxy = new Type.MapProxy("m", 1);
      proxy.addConstraint({ args: [Type.int], result: Type.bool });
      expect(proxy.unify(new Type.Map([], [Type.int], Type.int))).toBe(false);
      expect(proxy.toString()).toBe("[?]?");
    });

    it("reject maps of another arity", () => {
      const proxy = new Type.MapProxy("m", 2);
      expect(proxy.unify(intToBool())).toBe(false);
    });
  });

  describe("substitute", () => {
    it("renames binders that would capture", () => {
      const a = new Type.Variable("a");
      const b = new Type.Variable("b");
      const map = new Type.Map([a], [a], b);
      const substituted = map.substitute(new Map([[b, a]]));

      const c = new Type.Variable("c");
      expect(substituted.equals(new Type.Map([c], [c], a))).toBe(true);
      expect(substituted.equals(new Type.Map([c], [c], c))).toBe(false);
      expect(substituted.freeVariables).toEqual([a]);
    });
  });

  describe("helpers", () => {
    it("sorts type parameters by first occurrence", () => {
      const a = new Type.Variable("a");
      const b = new Type.Variable("b");
      const c = new Type.Variable("c");
      expect(Type.sortTypeParameters([a, b, c], [b], a)).toEqual([b, a, c]);
    });

    it("normalizes defined proxies away", () => {
      const proxy = new Type.Proxy("x");
      proxy.unify(Type.int);
      const normalized = Type.normalize(new Type.Ctor(list, [proxy]));
      expect(normalized).toBeInstanceOf(Type.Ctor);
      expect(normalized.freeProxies).toEqual([]);
      expect(normalized.toString()).toBe("List int");
    });
  });
});

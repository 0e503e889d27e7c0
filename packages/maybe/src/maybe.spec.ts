import { describe, it, expect, expectTypeOf, vi } from "vitest";
import { NotFoundError } from "@funky/prelude";
import {
  some,
  none,
  fromNullable,
  isMaybe,
  isSome,
  isNone,
  matches,
  match,
  bind,
  map,
  exists,
  filter,
  fold,
  count,
  flatten,
  flattenAll,
  orElse,
  unwrap,
  unwrapOr,
  unwrapOrElse,
  getOrUndefined,
  listFirst,
  listSingle,
  all,
  tap,
  MAYBE_BRAND,
  type Maybe,
} from "./index.js";

describe("constructors", () => {
  it("some wraps the value", () => {
    const maybe = some(42);
    expect(maybe._tag).toBe("Some");
    expect(maybe.value).toBe(42);
  });

  it("some keeps a null payload", () => {
    const maybe = some(null);
    expect(isSome(maybe)).toBe(true);
    expect(maybe.value).toBeNull();
  });

  it("only constructed values type-check as a Maybe", () => {
    expectTypeOf<{ _tag: "Some"; value: number }>().not.toMatchTypeOf<Maybe<number>>();
    expectTypeOf<{ _tag: "None" }>().not.toMatchTypeOf<Maybe<number>>();
    expectTypeOf(some(42)).toMatchTypeOf<Maybe<number>>();
  });

  it("the marker does not show in keys or JSON", () => {
    const maybe = some(42);
    expect(Object.keys(maybe)).toEqual(["_tag", "value"]);
    expect(JSON.stringify(maybe)).toBe('{"_tag":"Some","value":42}');
    expect(Object.getOwnPropertyDescriptor(maybe, MAYBE_BRAND)?.enumerable).toBe(false);
  });

  it("none is the absent value", () => {
    expect(none()._tag).toBe("None");
  });

  it("two calls to none are equal", () => {
    expect(none()).toEqual(none());
  });

  it("none cannot be mutated", () => {
    expect(Object.isFrozen(none())).toBe(true);
  });

  describe("fromNullable", () => {
    it("wraps a defined value", () => {
      expect(fromNullable("8080")).toEqual(some("8080"));
    });

    it("keeps falsy values that are not nullish", () => {
      expect(fromNullable(0)).toEqual(some(0));
      expect(fromNullable("")).toEqual(some(""));
    });

    it("maps null and undefined to None", () => {
      expect(fromNullable(null)).toEqual(none());
      expect(fromNullable(undefined)).toEqual(none());
    });
  });
});

describe("guards", () => {
  it("isSome and isNone on Some", () => {
    expect(isSome(some(42))).toBe(true);
    expect(isNone(some(42))).toBe(false);
  });

  it("isSome and isNone on None", () => {
    expect(isSome(none())).toBe(false);
    expect(isNone(none())).toBe(true);
  });

  it("isSome and isNone are false for values that are not a Maybe", () => {
    for (const value of [null, undefined, 42, "text", {}]) {
      expect(isSome(value)).toBe(false);
      expect(isNone(value)).toBe(false);
    }
  });

  it("isSome and isNone are false for plain objects shaped like a Maybe", () => {
    expect(isSome({ _tag: "Some", value: 42 })).toBe(false);
    expect(isNone({ _tag: "None" })).toBe(false);
  });

  it("type narrows correctly", () => {
    const maybe: Maybe<number> = some(42);
    if (isSome(maybe)) {
      const value: number = maybe.value;
      expect(value).toBe(42);
    }
  });

  describe("isMaybe", () => {
    it("accepts values built by the constructors", () => {
      expect(isMaybe(some(42))).toBe(true);
      expect(isMaybe(none())).toBe(true);
      expect(isMaybe(map(some(1), (x) => x + 1))).toBe(true);
    });

    it("rejects everything else", () => {
      expect(isMaybe(42)).toBe(false);
      expect(isMaybe(null)).toBe(false);
      expect(isMaybe(undefined)).toBe(false);
      expect(isMaybe({ _tag: "Some", value: 42 })).toBe(false);
      expect(isMaybe({ _tag: "None" })).toBe(false);
    });
  });
});

describe("matching", () => {
  describe("matches", () => {
    it("calls only onSome with the value", () => {
      const onSome = vi.fn((x: number) => x + 1);
      const onNone = vi.fn(() => 0);
      expect(matches(some(42), onSome, onNone)).toBe(43);
      expect(onSome).toHaveBeenCalledWith(42);
      expect(onNone).not.toHaveBeenCalled();
    });

    it("calls only onNone with no arguments", () => {
      const onSome = vi.fn((x: number) => x + 1);
      const onNone = vi.fn(() => 0);
      expect(matches<number, number>(none(), onSome, onNone)).toBe(0);
      expect(onNone).toHaveBeenCalledTimes(1);
      expect(onNone).toHaveBeenCalledWith();
      expect(onSome).not.toHaveBeenCalled();
    });
  });

  describe("match", () => {
    it("calls some handler for Some", () => {
      const result = match(some("Ada"), {
        some: (name) => `First: ${name}`,
        none: () => "Nobody",
      });
      expect(result).toBe("First: Ada");
    });

    it("calls none handler for None", () => {
      const names: string[] = [];
      const result = match(listFirst(names), {
        some: (name) => `First: ${name}`,
        none: () => "Nobody",
      });
      expect(result).toBe("Nobody");
    });
  });
});

describe("transformations", () => {
  describe("bind", () => {
    it("returns the binder's result for Some", () => {
      expect(bind(some(42), (x) => some(x + 1))).toEqual(some(43));
    });

    it("lets the binder decide absence", () => {
      expect(bind(some(42), () => none())).toEqual(none());
    });

    it("short-circuits on None", () => {
      const binder = vi.fn((x: number) => some(x + 1));
      expect(bind(none(), binder)).toEqual(none());
      expect(binder).not.toHaveBeenCalled();
    });
  });

  describe("map", () => {
    it("transforms and rewraps the value", () => {
      expect(map(some(42), (x) => x + 1)).toEqual(some(43));
    });

    it("passes through None", () => {
      const mapper = vi.fn((x: number) => x + 1);
      expect(map(none(), mapper)).toEqual(none());
      expect(mapper).not.toHaveBeenCalled();
    });

    it("returns a new value", () => {
      const original = some(42);
      const mapped = map(original, (x) => x);
      expect(mapped).toEqual(original);
      expect(mapped).not.toBe(original);
    });
  });

  describe("exists", () => {
    it("applies the predicate to Some", () => {
      expect(exists(some(42), () => true)).toBe(true);
      expect(exists(some(42), () => false)).toBe(false);
    });

    it("is false for None", () => {
      expect(exists(none(), () => true)).toBe(false);
    });
  });

  describe("filter", () => {
    it("drops values failing the predicate", () => {
      expect(filter(some(42), (x) => x > 100)).toEqual(none());
    });

    it("keeps values passing the predicate", () => {
      expect(filter(some(42), (x) => x > 0)).toEqual(some(42));
    });

    it("stays None", () => {
      expect(filter(none(), () => true)).toEqual(none());
    });
  });

  describe("fold", () => {
    it("folds the value into the accumulator", () => {
      expect(fold(some(32), (acc, x) => acc + x, 10)).toBe(42);
    });

    it("returns the initial accumulator for None", () => {
      expect(fold(none(), (acc: number, x: number) => acc + x, 10)).toBe(10);
    });
  });

  describe("count", () => {
    it("is 1 for Some and 0 for None", () => {
      expect(count(some(32))).toBe(1);
      expect(count(none())).toBe(0);
    });
  });

  describe("flatten", () => {
    it("leaves a flat Some unchanged", () => {
      expect(flatten(some(42))).toEqual(some(42));
    });

    it("removes one level of nesting", () => {
      expect(flatten(some(some(42)))).toEqual(some(42));
    });

    it("removes only the outermost level", () => {
      expect(flatten(some(some(some(42))))).toEqual(some(some(42)));
    });

    it("collapses Some(None) to None", () => {
      expect(flatten(some(none()))).toEqual(none());
    });

    it("stays None", () => {
      expect(flatten(none())).toEqual(none());
    });
  });

  describe("flattenAll", () => {
    it("leaves a flat Some unchanged", () => {
      expect(flattenAll(some(42))).toEqual(some(42));
    });

    it("removes every level of nesting", () => {
      expect(flattenAll(some(some(42)))).toEqual(some(42));
      expect(flattenAll(some(some(some(42))))).toEqual(some(42));
    });

    it("short-circuits to None at any depth", () => {
      expect(flattenAll(some(some(none())))).toEqual(none());
    });

    it("stays None", () => {
      expect(flattenAll(none())).toEqual(none());
    });

    it("does not unwrap plain objects shaped like a Maybe", () => {
      const lookalike = { _tag: "Some", value: 42 };
      expect(flattenAll(some(lookalike))).toEqual(some(lookalike));
    });
  });

  describe("orElse", () => {
    it("keeps a present value", () => {
      const alternative = vi.fn(() => some(0));
      expect(orElse(some(42), alternative)).toEqual(some(42));
      expect(alternative).not.toHaveBeenCalled();
    });

    it("uses the alternative for None", () => {
      expect(orElse(none(), () => some(0))).toEqual(some(0));
    });
  });
});

describe("extraction", () => {
  describe("unwrap", () => {
    it("extracts the value", () => {
      expect(unwrap(some(42))).toBe(42);
    });

    it("throws NotFoundError on None", () => {
      expect(() => unwrap(none())).toThrow(NotFoundError);
      expect(() => unwrap(none())).toThrow("Expected Some but the Maybe is None");
    });
  });

  it("unwrapOr uses the default for None", () => {
    expect(unwrapOr(some(42), 0)).toBe(42);
    expect(unwrapOr(none(), 0)).toBe(0);
  });

  it("unwrapOrElse computes the default lazily", () => {
    const fallback = vi.fn(() => 0);
    expect(unwrapOrElse(some(42), fallback)).toBe(42);
    expect(fallback).not.toHaveBeenCalled();
    expect(unwrapOrElse(none(), fallback)).toBe(0);
  });

  it("getOrUndefined", () => {
    expect(getOrUndefined(some(42))).toBe(42);
    expect(getOrUndefined(none())).toBeUndefined();
  });
});

describe("lists", () => {
  describe("listFirst", () => {
    it("is None for an empty list", () => {
      expect(listFirst([])).toEqual(none());
    });

    it("takes the first element", () => {
      expect(listFirst([1])).toEqual(some(1));
      expect(listFirst([1, 2, 3])).toEqual(some(1));
    });
  });

  describe("listSingle", () => {
    it("is None for an empty list", () => {
      expect(listSingle([])).toEqual(none());
    });

    it("takes the only element", () => {
      expect(listSingle([1])).toEqual(some(1));
    });

    it("is None for several elements", () => {
      expect(listSingle([1, 2])).toEqual(none());
    });
  });
});

describe("combinators", () => {
  describe("all", () => {
    it("collects every present value", () => {
      expect(all([some(1), some(2), some(3)])).toEqual(some([1, 2, 3]));
    });

    it("is None when any element is absent", () => {
      expect(all<number>([some(1), none(), some(3)])).toEqual(none());
    });

    it("handles an empty list", () => {
      expect(all([])).toEqual(some([]));
    });
  });

  describe("tap", () => {
    it("runs the side effect for Some", () => {
      const log = vi.fn();
      expect(tap(some(42), log)).toEqual(some(42));
      expect(log).toHaveBeenCalledWith(42);
    });

    it("skips the side effect for None", () => {
      const log = vi.fn();
      expect(tap(none(), log)).toEqual(none());
      expect(log).not.toHaveBeenCalled();
    });
  });
});

import { describe, it, expect } from "vitest";
import { classify, failureLine, isThenable, traceOf } from "../src/execution/classify.js";
import {
  CheckError,
  InvalidArgument,
  check,
  checkEqual,
  fail,
  todo,
} from "../src/core/signals.js";

function thrown(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected fn to throw");
}

function withStack<T extends Error>(error: T, stack: string): T {
  error.stack = stack;
  return error;
}

describe("traceOf", () => {
  it("keeps only the frame lines", () => {
    const error = withStack(new Error("x"), "Error: x\n    at first (a.ts:1:1)\n    at second (b.ts:2:2)");
    expect(traceOf(error)).toBe("\n    at first (a.ts:1:1)\n    at second (b.ts:2:2)");
  });

  it("is empty without frames", () => {
    expect(traceOf(withStack(new Error("x"), "Error: x"))).toBe("");
    expect(traceOf("not an error")).toBe("");
  });
});

describe("classify", () => {
  it("maps a pending signal", () => {
    expect(classify(thrown(() => todo()))).toEqual({ status: "pending", message: "not implemented" });
    expect(classify(thrown(() => todo("needs a parser")))).toEqual({
      status: "pending",
      message: "needs a parser",
    });
  });

  it("maps a failed check", () => {
    const error = withStack(new CheckError("sum"), "CheckError: sum\n    at t (t.ts:1:1)");
    expect(classify(error)).toEqual({ status: "check-failed", message: "sum\n    at t (t.ts:1:1)" });
  });

  it("maps a failure", () => {
    const error = thrown(() => fail("gave up"));
    const outcome = classify(error);
    expect(outcome.status === "fault" && outcome.kind).toBe("failure");
    expect(outcome.status === "fault" && outcome.message.split("\n")[0]).toBe("gave up");
  });

  it("maps an invalid argument", () => {
    const error = withStack(new InvalidArgument("negative size"), "InvalidArgument: negative size");
    expect(classify(error)).toEqual({ status: "fault", kind: "invalid", message: "negative size" });
  });

  it("maps any other error with its name", () => {
    const error = withStack(new TypeError("x is undefined"), "TypeError: x is undefined");
    expect(classify(error)).toEqual({ status: "fault", kind: "exception", message: "TypeError: x is undefined" });
  });

  it("maps a thrown non-error", () => {
    expect(classify("plain")).toEqual({ status: "fault", kind: "exception", message: "plain" });
    expect(classify(42)).toEqual({ status: "fault", kind: "exception", message: "42" });
  });
});

describe("failureLine", () => {
  it("renders failing outcomes", () => {
    expect(failureLine({ status: "check-failed", message: "sum" })).toBe("Test error: sum");
    expect(failureLine({ status: "fault", kind: "invalid", message: "bad size" })).toBe("[invalid] bad size");
  });

  it("is null for the others", () => {
    expect(failureLine({ status: "ok" })).toBeNull();
    expect(failureLine({ status: "skipped" })).toBeNull();
    expect(failureLine({ status: "pending", message: "later" })).toBeNull();
  });
});

describe("signals", () => {
  it("check passes when the condition holds", () => {
    expect(() => check(true, "never")).not.toThrow();
  });

  it("check throws a CheckError otherwise", () => {
    expect(() => check(false, "must hold")).toThrow(new CheckError("must hold"));
  });

  it("checkEqual accepts equal primitives and structures", () => {
    expect(() => checkEqual("n", 4, 4)).not.toThrow();
    expect(() => checkEqual("list", [1, { a: "b" }], [1, { a: "b" }])).not.toThrow();
    expect(() => checkEqual("nan", Number.NaN, Number.NaN)).not.toThrow();
  });

  it("checkEqual compares collections by content", () => {
    expect(() => checkEqual("m", new Map([[1, 2]]), new Map<number, number>())).toThrow(CheckError);
    expect(() => checkEqual("s", new Set([1]), new Set([2]))).toThrow(CheckError);
    expect(() => checkEqual("m", new Map([[1, 2]]), new Map([[1, 2]]))).not.toThrow();
  });

  it("checkEqual ignores key order and sees undefined fields", () => {
    expect(() => checkEqual("o", { a: 1, b: 2 }, { b: 2, a: 1 })).not.toThrow();
    expect(() => checkEqual<{ a: number; b?: number }>("o", { a: 1 }, { a: 1, b: undefined })).toThrow(CheckError);
  });

  it("checkEqual shows expected and actual", () => {
    const error = thrown(() => checkEqual("sum", 4, 5));
    expect(error).toBeInstanceOf(CheckError);
    expect(error instanceof Error && error.message).toBe("sum\nexpected: 4\n  actual: 5");
  });
});

describe("isThenable", () => {
  it("recognizes promises and promise-likes", () => {
    expect(isThenable(Promise.resolve())).toBe(true);
    expect(isThenable({ then: () => undefined })).toBe(true);
    expect(isThenable({ then: 1 })).toBe(false);
    expect(isThenable(undefined)).toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import { compilePattern, globToRegexSource } from "./pattern.js";
import { PatternCompileError, UsageError } from "./errors.js";

describe("compilePattern", () => {
  describe("substring mode", () => {
    it("should be the default mode", () => {
      const pattern = compilePattern("foo");
      expect(pattern.mode).toBe("substring");
      expect(pattern.flags).toEqual({ ignoreCase: false, wordBoundary: false });
    });

    it("should match by containment", () => {
      const pattern = compilePattern("foo", "substring");
      expect(pattern.matches("foobar")).toBe(true);
      expect(pattern.matches("xfoo")).toBe(true);
      expect(pattern.matches("bar")).toBe(false);
    });

    it("should respect case unless ignoreCase is set", () => {
      expect(compilePattern("foo", "substring").matches("FooBar")).toBe(false);
      expect(compilePattern("foo", "substring", { ignoreCase: true }).matches("FooBar")).toBe(true);
      expect(compilePattern("FOO", "substring", { ignoreCase: true }).matches("xfoox")).toBe(true);
    });

    it("should treat regex metacharacters literally", () => {
      const pattern = compilePattern("gcc.*", "substring");
      expect(pattern.matches("gcc-cross")).toBe(false);
      expect(pattern.matches("libgcc.*x")).toBe(true);
    });
  });

  describe("exact mode", () => {
    it("should require the whole candidate to match", () => {
      const pattern = compilePattern("foo", "exact");
      expect(pattern.matches("foo")).toBe(true);
      expect(pattern.matches("foobar")).toBe(false);
    });

    it("should fold case when ignoreCase is set", () => {
      expect(compilePattern("foo", "exact").matches("FOO")).toBe(false);
      expect(compilePattern("foo", "exact", { ignoreCase: true }).matches("FOO")).toBe(true);
    });
  });

  describe("regex mode", () => {
    it("should search anywhere in the candidate", () => {
      const pattern = compilePattern("box$", "regex");
      expect(pattern.matches("busybox")).toBe(true);
      expect(pattern.matches("boxes")).toBe(false);
    });

    it("should honour anchors in the expression", () => {
      const pattern = compilePattern("^bus", "regex");
      expect(pattern.matches("busybox")).toBe(true);
      expect(pattern.matches("xbusybox")).toBe(false);
    });

    it("should apply the case-insensitive flag", () => {
      expect(compilePattern("BUSY", "regex").matches("busybox")).toBe(false);
      expect(compilePattern("BUSY", "regex", { ignoreCase: true }).matches("busybox")).toBe(true);
    });

    it("should wrap the expression in word boundaries", () => {
      const pattern = compilePattern("box", "regex", { wordBoundary: true });
      expect(pattern.matches("busybox")).toBe(false);
      expect(pattern.matches("busy-box")).toBe(true);
      expect(pattern.matches("box")).toBe(true);
    });

    it("should apply word boundaries to every alternative", () => {
      const pattern = compilePattern("foo|bar", "regex", { wordBoundary: true });
      expect(pattern.matches("foox")).toBe(false);
      expect(pattern.matches("xbar")).toBe(false);
      expect(pattern.matches("foo-x")).toBe(true);
      expect(pattern.matches("x-bar")).toBe(true);
    });

    it("should give the same answer for repeated candidates", () => {
      const pattern = compilePattern("a", "regex");
      expect(pattern.matches("abc")).toBe(true);
      expect(pattern.matches("abc")).toBe(true);
    });

    it("should reject malformed expressions", () => {
      expect(() => compilePattern("foo(", "regex")).toThrow(PatternCompileError);
      expect(() => compilePattern("foo(", "regex")).toThrow('Invalid pattern "foo(":');
    });
  });

  describe("wildcard mode", () => {
    it("should anchor the glob at the start of the candidate", () => {
      const pattern = compilePattern("foo*", "wildcard");
      expect(pattern.matches("foobar")).toBe(true);
      expect(pattern.matches("foo")).toBe(true);
      expect(pattern.matches("xfoobar")).toBe(false);
    });

    it("should anchor the glob at the end of the candidate", () => {
      const pattern = compilePattern("*-native", "wildcard");
      expect(pattern.matches("busybox-native")).toBe(true);
      expect(pattern.matches("busybox-native-tools")).toBe(false);
    });

    it("should support single-character wildcards", () => {
      const pattern = compilePattern("gcc-?", "wildcard");
      expect(pattern.matches("gcc-9")).toBe(true);
      expect(pattern.matches("gcc-10")).toBe(false);
    });

    it("should fold case when ignoreCase is set", () => {
      expect(compilePattern("FOO*", "wildcard").matches("foobar")).toBe(false);
      expect(compilePattern("FOO*", "wildcard", { ignoreCase: true }).matches("foobar")).toBe(true);
    });

    it("should let * cross slashes in names", () => {
      expect(compilePattern("*libc*", "wildcard").matches("virtual/libc")).toBe(true);
      expect(compilePattern("virtual*", "wildcard").matches("virtual/kernel")).toBe(true);
    });

    it("should let ? match any single character, slash included", () => {
      const pattern = compilePattern("virtual?libc", "wildcard");
      expect(pattern.matches("virtual/libc")).toBe(true);
      expect(pattern.matches("virtual-libc")).toBe(true);
      expect(pattern.matches("virtuallibc")).toBe(false);
    });

    it("should require exactly one character for ? before *", () => {
      const pattern = compilePattern("foo?*", "wildcard");
      expect(pattern.matches("foox")).toBe(true);
      expect(pattern.matches("fooxyz")).toBe(true);
      expect(pattern.matches("foo")).toBe(false);
    });

    it("should treat a leading ! literally", () => {
      const pattern = compilePattern("!busy*", "wildcard");
      expect(pattern.matches("!busybox")).toBe(true);
      expect(pattern.matches("busybox")).toBe(false);
      expect(pattern.matches("zlib")).toBe(false);
    });

    it("should accept word boundaries", () => {
      const pattern = compilePattern("foo*", "wildcard", { wordBoundary: true });
      expect(pattern.mode).toBe("wildcard");
      expect(pattern.matches("foobar")).toBe(true);
    });
  });

  describe("usage errors", () => {
    it("should reject word boundaries in substring mode", () => {
      expect(() => compilePattern("foo", "substring", { wordBoundary: true })).toThrow(UsageError);
    });

    it("should reject word boundaries in exact mode", () => {
      expect(() => compilePattern("foo", "exact", { wordBoundary: true })).toThrow(
        "--word can only be used with --regex or --wildcard"
      );
    });

    it("should reject an empty pattern", () => {
      expect(() => compilePattern("", "regex")).toThrow(UsageError);
    });
  });

  it("should return an immutable pattern", () => {
    const pattern = compilePattern("foo");
    expect(Object.isFrozen(pattern)).toBe(true);
    expect(Object.isFrozen(pattern.flags)).toBe(true);
  });
});

describe("globToRegexSource", () => {
  it("should produce an expression anchored at both ends", () => {
    const source = globToRegexSource("foo*");
    expect(source.startsWith("^")).toBe(true);
    expect(source.endsWith("$")).toBe(true);
  });
});

import { describe, expect, test } from "vitest";
import { encodeText } from "./text-buffer";
import { isEngineError } from "./vim-errors";
import { getTextObjectRange } from "./vim-text-object";
import type { Range, TextObject } from "./vim-types";

function range(
  text: string,
  pos: number,
  kind: TextObject,
  compatible = false
): Range {
  return getTextObjectRange(kind, encodeText(text), pos, compatible);
}

function errorCode(run: () => unknown): string | null {
  try {
    run();
  } catch (error) {
    return isEngineError(error) ? error.code : "other";
  }
  return null;
}

describe("bracket objects", () => {
  test("innermost pair around the cursor", () => {
    expect(range("a(b(c)d)e", 4, "inner-paren")).toEqual({ start: 4, end: 5 });
    expect(range("a(b(c)d)e", 4, "around-paren")).toEqual({ start: 3, end: 6 });
  });

  test("skips nested pairs on the way out", () => {
    expect(range("a(b(c)d)e", 2, "inner-paren")).toEqual({ start: 2, end: 7 });
  });

  test("an opener under the cursor starts the object", () => {
    expect(range("(ab)", 0, "inner-paren")).toEqual({ start: 1, end: 3 });
  });

  test("compatible mode only looks behind the cursor for the opener", () => {
    expect(errorCode(() => range("(ab)", 0, "inner-paren", true))).toBe(
      "InvalidTextObject"
    );
  });

  test("unmatched delimiters", () => {
    expect(errorCode(() => range("a(b", 2, "inner-paren"))).toBe("InvalidTextObject");
    expect(errorCode(() => range("ab)", 0, "inner-paren"))).toBe("InvalidTextObject");
  });

  test("square and angle brackets", () => {
    expect(range("x[1, 2]", 3, "inner-bracket")).toEqual({ start: 2, end: 6 });
    expect(range("<a>", 1, "inner-angle")).toEqual({ start: 1, end: 2 });
    expect(range("f {x}", 3, "around-brace")).toEqual({ start: 2, end: 5 });
  });
});

describe("word objects", () => {
  test("inner word", () => {
    expect(range("foo bar", 5, "inner-word")).toEqual({ start: 4, end: 7 });
    expect(range("foo bar", 3, "inner-word")).toEqual({ start: 0, end: 3 });
  });

  test("around word takes trailing blanks, else leading ones", () => {
    expect(range("foo bar", 1, "around-word")).toEqual({ start: 0, end: 4 });
    expect(range("foo bar", 5, "around-word")).toEqual({ start: 3, end: 7 });
  });

  test("compatible around word is the inner word", () => {
    expect(range("foo bar", 1, "around-word", true)).toEqual({ start: 0, end: 3 });
  });

  test("empty buffer", () => {
    expect(errorCode(() => range("", 0, "inner-word"))).toBe("BufferEmpty");
  });
});

describe("sentence objects", () => {
  const text = "One. Two!  Three?";

  test("around runs to the next sentence", () => {
    expect(range(text, 6, "around-sentence")).toEqual({ start: 5, end: 11 });
  });

  test("inner drops trailing whitespace", () => {
    expect(range(text, 6, "inner-sentence")).toEqual({ start: 5, end: 9 });
  });

  test("compatible mode collapses to the cursor", () => {
    expect(range(text, 6, "inner-sentence", true)).toEqual({ start: 6, end: 6 });
  });
});

describe("paragraph objects", () => {
  // lines: "a" "b" "" "c"
  const text = "a\nb\n\nc";

  test("inner paragraph covers its lines", () => {
    expect(range(text, 0, "inner-paragraph")).toEqual({ start: 0, end: 4 });
    expect(range(text, 4, "inner-paragraph")).toEqual({ start: 4, end: 5 });
  });

  test("around paragraph takes the following blank lines", () => {
    expect(range(text, 0, "around-paragraph")).toEqual({ start: 0, end: 5 });
  });

  test("around the last paragraph takes the preceding blank lines", () => {
    expect(range(text, 5, "around-paragraph")).toEqual({ start: 4, end: 6 });
  });

  test("around a blank line takes the next paragraph", () => {
    expect(range(text, 4, "around-paragraph")).toEqual({ start: 4, end: 6 });
  });
});

describe("quote objects", () => {
  const text = 'say "hi" and "bye"';

  test("pair around the cursor", () => {
    expect(range(text, 5, "inner-double-quote")).toEqual({ start: 5, end: 7 });
    expect(range(text, 5, "around-double-quote")).toEqual({ start: 4, end: 8 });
  });

  test("first pair after the cursor", () => {
    expect(range(text, 0, "inner-double-quote")).toEqual({ start: 5, end: 7 });
    expect(range(text, 10, "inner-double-quote")).toEqual({ start: 14, end: 17 });
  });

  test("escaped quotes are skipped", () => {
    expect(range('x = "a\\"b"', 5, "inner-double-quote")).toEqual({
      start: 5,
      end: 9,
    });
  });

  test("single quotes and backticks", () => {
    expect(range("say 'ok'", 5, "inner-quote")).toEqual({ start: 5, end: 7 });
    expect(range("run `ls` now", 5, "around-backtick")).toEqual({
      start: 4,
      end: 8,
    });
  });

  test("no pair on the line", () => {
    expect(errorCode(() => range('a "b\nc" d', 0, "inner-double-quote"))).toBe(
      "InvalidTextObject"
    );
  });
});

describe("tag objects", () => {
  const text = "<div><b>bold</b></div>";

  test("innermost enclosing pair", () => {
    expect(range(text, 9, "inner-tag")).toEqual({ start: 8, end: 12 });
    expect(range(text, 9, "around-tag")).toEqual({ start: 5, end: 16 });
  });

  test("cursor inside the outer opening tag", () => {
    expect(range(text, 2, "inner-tag")).toEqual({ start: 5, end: 16 });
  });

  test("self-closing tags are ignored", () => {
    expect(range("<p>a<br/>b</p>", 3, "inner-tag")).toEqual({ start: 3, end: 10 });
  });

  test("no tags", () => {
    expect(errorCode(() => range("plain", 1, "inner-tag"))).toBe("InvalidTextObject");
  });
});

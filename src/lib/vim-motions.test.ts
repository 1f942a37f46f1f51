import { describe, expect, test } from "vitest";
import { encodeText } from "./text-buffer";
import { isEngineError } from "./vim-errors";
import { resolveMotion, type MotionContext } from "./vim-motions";
import type { LastFind, Motion } from "./vim-types";

function move(
  text: string,
  pos: number,
  motion: Motion,
  count = 1,
  extra: Partial<MotionContext> = {}
): number {
  const ctx: MotionContext = {
    content: encodeText(text),
    charArg: null,
    lastFind: null,
    compatible: false,
    ...extra,
  };
  return resolveMotion(motion, ctx, pos, count);
}

const char = (c: string) => ({ charArg: c.codePointAt(0) ?? 0 });

function motionError(run: () => unknown): string | null {
  try {
    run();
  } catch (error) {
    return isEngineError(error) ? error.code : "other";
  }
  return null;
}

describe("character motions", () => {
  test("left and right step over whole code points", () => {
    // "aéb" is 61 C3 A9 62
    expect(move("aéb", 1, "right")).toBe(3);
    expect(move("aéb", 3, "left")).toBe(1);
    expect(move("aéb", 4, "right")).toBe(4);
    expect(move("aéb", 0, "left")).toBe(0);
  });

  test("count of zero moves once", () => {
    expect(move("abc", 0, "right", 0)).toBe(1);
  });
});

describe("line motions", () => {
  const text = "abc\nde\nfghi";

  test("down keeps the byte column, clamped to the line", () => {
    expect(move(text, 1, "down")).toBe(5);
    expect(move(text, 2, "down")).toBe(6);
  });

  test("up from the first line stays put", () => {
    expect(move(text, 1, "up")).toBe(1);
    expect(move(text, 9, "up")).toBe(6);
  });

  test("down from the last line stays put", () => {
    expect(move(text, 8, "down")).toBe(8);
  });

  test("down onto a trailing empty line stays put", () => {
    expect(move("ab\n", 0, "down")).toBe(0);
  });

  test("up lands on a code point start", () => {
    // "éé\nabcd": é at 0 and 2, newline at 4
    expect(move("éé\nabcd", 6, "up")).toBe(0);
    expect(move("éé\nabcd", 7, "up")).toBe(2);
  });

  test("line start, end and first non-blank", () => {
    expect(move("  foo\nbar", 3, "line-start")).toBe(0);
    expect(move("  foo\nbar", 3, "line-end")).toBe(5);
    expect(move("  foo\nbar", 4, "line-first-char")).toBe(2);
    expect(move("   \nx", 1, "line-first-char")).toBe(0);
  });

  test("file start and end", () => {
    expect(move("abc\ndef", 5, "file-start")).toBe(0);
    expect(move("abc\ndef", 1, "file-end")).toBe(7);
  });
});

describe("word motions", () => {
  test("word forward skips the word then the whitespace", () => {
    expect(move("foo  bar", 0, "word-forward")).toBe(5);
    expect(move("foo  bar", 0, "word-forward", 2)).toBe(8);
  });

  test("word forward stops at punctuation and does not cross it", () => {
    expect(move("foo.bar", 0, "word-forward")).toBe(3);
    expect(move("foo.bar", 3, "word-forward")).toBe(3);
  });

  test("big word forward treats punctuation as part of the word", () => {
    expect(move("foo.bar baz", 0, "big-word-forward")).toBe(8);
  });

  test("word backward", () => {
    expect(move("foo bar", 7, "word-backward")).toBe(4);
    expect(move("foo bar", 4, "word-backward")).toBe(0);
    expect(move("foo bar", 0, "word-backward")).toBe(0);
  });

  test("word end", () => {
    expect(move("foo bar", 0, "word-end")).toBe(2);
    expect(move("foo bar", 2, "word-end")).toBe(6);
    expect(move("ab", 1, "word-end")).toBe(1);
    expect(move("", 0, "word-end")).toBe(0);
  });

  test("big word end lands on the start of a multi-byte character", () => {
    expect(move("aé", 0, "big-word-end")).toBe(1);
  });

  test("a counted motion equals repeated single steps", () => {
    const text = "one two three four";
    let pos = 0;
    for (let i = 0; i < 3; i++) pos = move(text, pos, "word-forward");
    expect(move(text, 0, "word-forward", 3)).toBe(pos);
    expect(pos).toBe(14);
  });
});

describe("paragraph motions", () => {
  // lines: "a" "b" "" "c" "d" "" "e"
  const text = "a\nb\n\nc\nd\n\ne";

  test("forward stops on the next blank line", () => {
    expect(move(text, 0, "paragraph-forward")).toBe(4);
    expect(move(text, 0, "paragraph-forward", 2)).toBe(9);
    expect(move(text, 0, "paragraph-forward", 3)).toBe(11);
  });

  test("backward stops on the previous blank line", () => {
    expect(move(text, 10, "paragraph-backward")).toBe(9);
    expect(move(text, 9, "paragraph-backward")).toBe(4);
    expect(move(text, 4, "paragraph-backward")).toBe(0);
  });

  test("compatible mode leaves the cursor alone", () => {
    expect(move(text, 0, "paragraph-forward", 1, { compatible: true })).toBe(0);
  });
});

describe("sentence motions", () => {
  const text = "One. Two!  Three?\nFour";

  test("forward goes to the next sentence start", () => {
    expect(move(text, 0, "sentence-forward")).toBe(5);
    expect(move(text, 5, "sentence-forward")).toBe(11);
    expect(move(text, 12, "sentence-forward")).toBe(18);
    expect(move(text, 18, "sentence-forward")).toBe(22);
  });

  test("backward goes to the previous sentence start", () => {
    expect(move(text, 12, "sentence-backward")).toBe(11);
    expect(move(text, 11, "sentence-backward")).toBe(5);
    expect(move(text, 0, "sentence-backward")).toBe(0);
  });

  test("a period inside a word does not end a sentence", () => {
    expect(move("x.y z", 0, "sentence-forward")).toBe(5);
  });
});

describe("matching bracket", () => {
  const text = "f(a[b]c)";

  test("jumps from the first bracket at or after the cursor", () => {
    expect(move(text, 0, "matching-bracket")).toBe(7);
    expect(move(text, 7, "matching-bracket")).toBe(1);
    expect(move(text, 3, "matching-bracket")).toBe(5);
    expect(move(text, 2, "matching-bracket")).toBe(5);
  });

  test("no bracket or no partner is an invalid motion", () => {
    expect(motionError(() => move("abc", 0, "matching-bracket"))).toBe("InvalidMotion");
    expect(motionError(() => move("(abc", 0, "matching-bracket"))).toBe("InvalidMotion");
  });
});

describe("find and till", () => {
  const text = "a,b,c";

  test("find forward with a count", () => {
    expect(move(text, 0, "find-char", 1, char(","))).toBe(1);
    expect(move(text, 0, "find-char", 2, char(","))).toBe(3);
  });

  test("till stops before the match", () => {
    expect(move(text, 0, "till-char", 1, char(","))).toBe(0);
    expect(move(text, 2, "till-char", 1, char(","))).toBe(2);
  });

  test("counted till steps past each match", () => {
    expect(move(text, 0, "till-char", 2, char(","))).toBe(2);
    expect(move(text, 4, "till-char-backward", 2, char(","))).toBe(2);
  });

  test("find backward", () => {
    expect(move(text, 4, "find-char-backward", 1, char(","))).toBe(3);
  });

  test("searches only the current line", () => {
    expect(motionError(() => move("ab\n,c", 0, "find-char", 1, char(","))))
      .toBe("InvalidMotion");
  });

  test("finds multi-byte characters", () => {
    expect(move("caféx", 0, "find-char", 1, char("é"))).toBe(3);
    expect(move("caféx", 0, "till-char", 1, char("é"))).toBe(2);
    expect(move("caféx", 5, "find-char-backward", 1, char("a"))).toBe(1);
  });

  test("missing character argument is an invalid command", () => {
    expect(motionError(() => move(text, 0, "find-char"))).toBe("InvalidCommand");
  });

  test("repeat find needs a previous find", () => {
    expect(motionError(() => move(text, 0, "repeat-find"))).toBe("InvalidMotion");
  });

  test("repeated till skips the adjacent match", () => {
    const lastFind: LastFind = { codePoint: 0x2c, kind: "till" };
    expect(move(text, 0, "repeat-find", 1, { lastFind })).toBe(2);
  });

  test("repeat backward reverses the direction", () => {
    const lastFind: LastFind = { codePoint: 0x2c, kind: "find" };
    expect(move(text, 3, "repeat-find-backward", 1, { lastFind })).toBe(1);
  });

  test("compatible mode keeps the cursor even without a match", () => {
    expect(move(text, 0, "find-char", 1, { compatible: true, ...char("z") })).toBe(0);
  });
});

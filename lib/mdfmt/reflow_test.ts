import { test } from "node:test";
import assert from "node:assert/strict";
import { opensBlock, reflow, reflowRuns, words } from "./reflow.ts";

test("reflow: paragraph max width", async (t) => {
  await t.test("width max respected", () => {
    assert.deepEqual(reflow("a b c d e f g h i j", 10), [
      "a b c d e",
      "f g h i j",
    ]);
  });

  await t.test("long unbroken strings ignore max width", () => {
    assert.deepEqual(reflow("abcdefghijhij a b c d e", 10), [
      "abcdefghijhij",
      "a b c d e",
    ]);
  });

  await t.test("unbroken strings begin newline", () => {
    assert.deepEqual(reflow("a b c defg i jk", 10), ["a b c", "defg i jk"]);
  });

  await t.test("embedded newlines count as spaces", () => {
    assert.deepEqual(reflow("a b c d e\nf g h i j\n", 10), [
      "a b c d e",
      "f g h i j",
    ]);
  });

  await t.test("first word of a continuation line is measured from its own start", () => {
    // the second line is exactly nine wide; a boundary miscount would drop "cccc" to a third line
    assert.deepEqual(reflow("aaaaaaaaa bbbb cccc", 10), [
      "aaaaaaaaa",
      "bbbb cccc",
    ]);
    assert.deepEqual(reflow("  aaaa bbbb cccc", 10), ["aaaa bbbb", "cccc"]);
  });

  await t.test("a line of exactly maxWidth characters wraps", () => {
    assert.deepEqual(reflow("aaaa bbbbb", 10), ["aaaa", "bbbbb"]);
    assert.deepEqual(reflow("aaaa bbbb", 10), ["aaaa bbbb"]);
  });

  await t.test("whitespace runs collapse and lines are trimmed", () => {
    assert.deepEqual(reflow("  one \t two\n\n three  ", 80), [
      "one two three",
    ]);
  });

  await t.test("edge inputs", () => {
    assert.deepEqual(reflow("", 10), []);
    assert.deepEqual(reflow(" \n\t ", 10), []);
    assert.deepEqual(reflow("https://example.com/a/very/long/path", 10), [
      "https://example.com/a/very/long/path",
    ]);
  });

  await t.test("width one puts every word on its own line", () => {
    assert.deepEqual(reflow("a bb c", 1), ["a", "bb", "c"]);
  });

  await t.test("width counts code points, not UTF-16 units", () => {
    // each emoji is two UTF-16 units but one code point
    assert.deepEqual(reflow("😀😀 😀😀 😀😀", 8), ["😀😀 😀😀", "😀😀"]);
  });

  await t.test("no-break spaces are not word boundaries", () => {
    assert.deepEqual(words("a\u00a0b c"), ["a\u00a0b", "c"]);
  });
});

test("reflow: properties", async (t) => {
  const corpus = [
    "The quick brown fox jumps over the lazy dog while the cat watches",
    "supercalifragilisticexpialidocious is a word and so is a",
    "x",
    "aa bb cc dd ee ff gg hh ii jj kk ll mm nn oo pp qq rr ss tt",
    "one\ntwo\nthree four five six seven eight nine ten eleven twelve",
  ];

  await t.test("every line fits or is a single over-long word", () => {
    for (const text of corpus) {
      for (let w = 1; w <= 30; w++) {
        for (const line of reflow(text, w)) {
          if (line.length > w) {
            assert.deepEqual(words(line), [line], `width ${w}: ${line}`);
          } else {
            assert.ok(line.length <= w);
          }
        }
      }
    }
  });

  await t.test("word sequence is preserved", () => {
    for (const text of corpus) {
      for (let w = 1; w <= 30; w++) {
        assert.deepEqual(reflow(text, w).flatMap(words), words(text));
      }
    }
  });

  await t.test("already-narrow lines keep their partition", () => {
    const lines = ["short line", "another one", "x y z"];
    assert.deepEqual(reflow(lines.join(" "), 12), lines);
  });
});

test("reflowRuns: each run starts a new line", () => {
  assert.deepEqual(reflowRuns(["a b c\\", "d e f"], 80), ["a b c\\", "d e f"]);
  assert.deepEqual(reflowRuns(["a b c d\\", "e"], 6), ["a b c", "d\\", "e"]);
  assert.deepEqual(reflowRuns([], 6), []);
});

test("reflow: words that would open a block", async (t) => {
  await t.test("block openers", () => {
    for (const word of ["-", "+", "*", "#", "######", ">", ">x", "=", "==", "--", "___", "****", "1.", "3)", "```", "~~~sh", "<div", "</p>", "<!--"]) {
      assert.equal(opensBlock(word), true, word);
    }
  });

  await t.test("ordinary words", () => {
    for (const word of ["-x", "+1", "#######", "#tag", "a>", "=x", "__", "a.", "1.5", "``", "<", "<3", "x<y"]) {
      assert.equal(opensBlock(word), false, word);
    }
  });

  await t.test("kept words stay on the previous line past the width", () => {
    assert.deepEqual(reflow("aaaa - b - c", 6, opensBlock), ["aaaa -", "b - c"]);
    assert.deepEqual(reflow("- aaaa", 3, opensBlock), ["-", "aaaa"]);
    assert.deepEqual(reflowRuns(["x 1. y"], 3, opensBlock), ["x 1.", "y"]);
  });
});

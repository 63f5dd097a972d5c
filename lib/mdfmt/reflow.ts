import { textWidth } from "./ast.ts";

// ASCII whitespace only: a no-break space is content in Markdown, not a boundary.
const wordBoundary = /[ \t\n\r\f\v]+/;

// At the start of a line these would open a block (list item, heading,
// blockquote, setext underline, thematic break, code fence or HTML block).
const blockOpener =
  /^(?:[-+*]|#{1,6}|>.*|=+|-+|_{3,}|\*{3,}|\d{1,9}[.)]|`{3,}.*|~{3,}.*|<[A-Za-z/!?].*)$/;

/** True when `word` at the start of a line would not read as paragraph text. */
export function opensBlock(word: string): boolean {
  return blockOpener.test(word);
}

/** Whitespace-delimited words of `text`, in order. */
export function words(text: string): string[] {
  return text.split(wordBoundary).filter((w) => w.length > 0);
}

/**
 * Greedy word wrap. Embedded newlines count as spaces, runs of whitespace
 * collapse to one space, and lines carry no leading or trailing whitespace.
 *
 * A line plus its newline fits in `maxWidth`, i.e. a line's text stays
 * strictly under `maxWidth` code points. The first word of a line is always
 * placed, so a word wider than that sits alone on its own line, unsplit.
 * A word for which `keepWithPrevious` holds never starts a line: it stays on
 * the previous one even past `maxWidth`.
 *
 * @example
 * ```ts
 * reflow("a b c defg i jk", 10); // ["a b c", "defg i jk"]
 * ```
 */
export function reflow(
  text: string,
  maxWidth: number,
  keepWithPrevious?: (word: string) => boolean,
): string[] {
  const lines: string[] = [];
  let line = "";
  let width = 0;
  for (const word of words(text)) {
    const w = textWidth(word);
    if (line.length === 0) {
      line = word;
      width = w;
    } else if (width + 1 + w < maxWidth || keepWithPrevious?.(word)) {
      line += " " + word;
      width += 1 + w;
    } else {
      lines.push(line);
      line = word;
      width = w;
    }
  }
  if (line.length > 0) lines.push(line);
  return lines;
}

/** Reflow each run separately; every run starts on a fresh line. */
export function reflowRuns(
  runs: readonly string[],
  maxWidth: number,
  keepWithPrevious?: (word: string) => boolean,
): string[] {
  return runs.flatMap((run) => reflow(run, maxWidth, keepWithPrevious));
}

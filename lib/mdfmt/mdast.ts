/**
 * Markdown source → {@link DocumentNode}, via remark (CommonMark + GFM + YAML
 * front matter).
 *
 * remark hands back mdast with processed text values (escapes resolved,
 * entities decoded, container markers gone). The renderer wants the original
 * bytes instead, so this adapter keeps only mdast's structure and positions
 * and re-derives every piece of text as {@link Segment}s into the source.
 *
 * Continuation lines of a block nested in containers carry the containers'
 * markers (`> `) and indentation in the source; each container on the path
 * contributes a "stripper" that removes its share from the start of a line.
 */

import type {
  Code,
  List,
  ListItem,
  Nodes,
  Paragraph,
  PhrasingContent,
  Root,
  RootContent,
  Table,
} from "mdast";
import { remark } from "remark";
import remarkFrontmatter from "remark-frontmatter";
import remarkGfm from "remark-gfm";
import {
  attach,
  type BlockquoteNode,
  type BulletMarker,
  type CodeSpanNode,
  type ColumnAlignment,
  type DocumentNode,
  type EmphasisNode,
  type HeadingNode,
  type LinkNode,
  type ListItemNode,
  type ListNode,
  type OrderedMarker,
  type ParagraphNode,
  type ParseNode,
  type Segment,
  type StrikethroughNode,
  type TableCellNode,
  type TableHeaderNode,
  type TableNode,
  type TableRowNode,
  type TextBlockNode,
  type TextNode,
} from "./ast.ts";
import { InvariantViolation } from "./errors.ts";

const processor = remark().use(remarkFrontmatter).use(remarkGfm);

/** Parse `source` into a render-ready tree. */
export function parseMarkdown(source: string): DocumentNode {
  const tree: Root = processor.parse(source);
  return new MdastAdapter(source, tree).document();
}

/** Removes one container's marker or indentation from a continuation line. */
type Stripper = (line: string) => number;

const quoteStripper: Stripper = (line) => /^ {0,3}>[ \t]?/.exec(line)?.[0].length ?? 0;

const indentStripper = (width: number): Stripper => (line) => {
  let n = 0;
  while (n < width && line[n] === " ") n++;
  return n;
};

interface Scope {
  readonly strippers: readonly Stripper[];
  /** Set inside the items of a tight list. */
  readonly tight: boolean;
}

class MdastAdapter {
  readonly #lineStarts: number[] = [0];

  constructor(readonly source: string, readonly tree: Root) {
    for (let i = 0; i < source.length; i++) {
      if (source[i] === "\n") this.#lineStarts.push(i + 1);
    }
  }

  document(): DocumentNode {
    const doc: DocumentNode = { kind: "Document", children: [] };
    const scope: Scope = { strippers: [], tight: false };
    for (const child of this.tree.children) {
      attach(doc, this.block(child, scope));
    }
    return doc;
  }

  /* ------------------------------ blocks ------------------------------ */

  block(node: RootContent, scope: Scope): ParseNode {
    switch (node.type) {
      case "paragraph":
        return this.paragraph(node, scope, false);
      case "heading": {
        const heading: HeadingNode = {
          kind: "Heading",
          level: node.depth,
          children: [],
        };
        return attach(heading, ...this.inlines(node.children, scope));
      }
      case "blockquote": {
        const inner: Scope = {
          strippers: [...scope.strippers, quoteStripper],
          tight: false,
        };
        const quote: BlockquoteNode = { kind: "Blockquote", children: [] };
        return attach(quote, ...node.children.map((c) => this.block(c, inner)));
      }
      case "list":
        return this.list(node, scope);
      case "code":
        return this.code(node, scope);
      case "html":
        return { kind: "HTMLBlock", lines: this.verbatimLines(node, scope), children: [] };
      case "thematicBreak":
        return { kind: "ThematicBreak", children: [] };
      case "table":
        return this.table(node, scope);
      case "yaml":
        return { kind: "FrontMatter", lines: this.verbatimLines(node, scope), children: [] };
      case "definition":
      case "footnoteDefinition":
        return { kind: "Definition", lines: this.verbatimLines(node, scope), children: [] };
      default:
        throw new InvariantViolation(
          `unexpected mdast ${node.type} node at block level`,
        );
    }
  }

  paragraph(node: Paragraph, scope: Scope, taskItem: boolean): ParseNode {
    const lines = this.proseLines(this.span(node), scope);
    if (taskItem && lines.length > 0) {
      // the checkbox is rendered by the list item
      const first = lines[0];
      const box = /^\[[ xX]\][ \t]+/.exec(this.source.slice(first.start, first.stop));
      if (box) lines[0] = { start: first.start + box[0].length, stop: first.stop };
    }
    const para: ParagraphNode | TextBlockNode = scope.tight
      ? { kind: "TextBlock", lines, children: [] }
      : { kind: "Paragraph", lines, children: [] };
    return attach(para, ...this.inlines(node.children, scope));
  }

  list(node: List, scope: Scope): ListNode {
    const ordered = node.ordered === true;
    const tight = !node.spread && !node.children.some((item) => item.spread);
    const list: ListNode = {
      kind: "List",
      ordered,
      start: ordered ? node.start ?? 1 : 1,
      marker: this.listMarker(node, ordered),
      tight,
      children: [],
    };
    return attach(list, ...node.children.map((item) => this.listItem(item, scope, tight)));
  }

  listMarker(node: List, ordered: boolean): BulletMarker | OrderedMarker {
    const first = node.children[0];
    if (!first) return ordered ? "." : "-";
    const text = this.source.slice(this.span(first).start);
    const marker = ordered ? /^\d*([.)])/.exec(text)?.[1] : text[0];
    switch (marker) {
      case "-":
      case "*":
      case "+":
      case ".":
      case ")":
        return marker;
      default:
        return ordered ? "." : "-";
    }
  }

  listItem(node: ListItem, scope: Scope, tight: boolean): ListItemNode {
    const start = this.point(node, "start");
    const content = node.children[0]
      ? this.point(node.children[0], "start")
      : undefined;
    const offset = content && content.line === start.line
      ? content.column - start.column
      : 2;
    const inner: Scope = {
      strippers: [...scope.strippers, indentStripper(offset)],
      tight,
    };
    const checked = typeof node.checked === "boolean" ? node.checked : undefined;
    const item: ListItemNode = { kind: "ListItem", offset, checked, children: [] };
    return attach(
      item,
      ...node.children.map((child, i) =>
        child.type === "paragraph"
          ? this.paragraph(child, inner, i === 0 && checked !== undefined)
          : this.block(child, inner)
      ),
    );
  }

  code(node: Code, scope: Scope): ParseNode {
    const span = this.span(node);
    const fenced = /^[ \t]*(```|~~~)/.test(this.source.slice(span.start, span.stop));
    const first = this.point(node, "start").line + (fenced ? 1 : 0);
    const lines = node.value.length > 0
      ? node.value.split("\n").map((text, i) => this.locate(text, first + i, scope))
      : [];
    if (!fenced) return { kind: "CodeBlock", lines, children: [] };
    return {
      kind: "FencedCodeBlock",
      language: node.lang ?? undefined,
      meta: node.meta ?? undefined,
      lines,
      children: [],
    };
  }

  table(node: Table, scope: Scope): ParseNode {
    const alignments: ColumnAlignment[] = (node.align ?? []).map((a) => a ?? "none");
    const table: TableNode = { kind: "Table", alignments, children: [] };
    node.children.forEach((row, r) => {
      const cells = row.children.map((cell): TableCellNode => {
        const head = cell.children[0];
        const tail = cell.children[cell.children.length - 1];
        const at = this.span(cell).start;
        const lines: Segment[] = head && tail
          ? [{ start: this.span(head).start, stop: this.span(tail).stop }]
          : [{ start: at, stop: at }];
        const tableCell: TableCellNode = { kind: "TableCell", lines, children: [] };
        return attach(tableCell, ...this.inlines(cell.children, scope));
      });
      const tableRow: TableHeaderNode | TableRowNode = r === 0
        ? { kind: "TableHeader", children: [] }
        : { kind: "TableRow", children: [] };
      attach(table, attach(tableRow, ...cells));
    });
    return table;
  }

  /* ------------------------------ inlines ----------------------------- */

  inlines(nodes: readonly PhrasingContent[], scope: Scope): ParseNode[] {
    const out: ParseNode[] = [];
    for (const node of nodes) {
      if (node.type === "break") {
        const prev = out[out.length - 1];
        if (prev?.kind === "Text") {
          prev.softLineBreak = false;
          prev.hardLineBreak = true;
        } else {
          const at = this.span(node).start;
          out.push({
            kind: "Text",
            segment: { start: at, stop: at },
            softLineBreak: false,
            hardLineBreak: true,
            children: [],
          });
        }
        continue;
      }
      out.push(...this.inline(node, scope));
    }
    return out;
  }

  inline(node: Exclude<PhrasingContent, { type: "break" }>, scope: Scope): ParseNode[] {
    const span = this.span(node);
    switch (node.type) {
      case "text":
        return this.textNodes(span, scope);
      case "emphasis":
      case "strong": {
        const emphasis: EmphasisNode = {
          kind: "Emphasis",
          level: node.type === "strong" ? 2 : 1,
          span,
          children: [],
        };
        return [attach(emphasis, ...this.inlines(node.children, scope))];
      }
      case "delete": {
        const strike: StrikethroughNode = { kind: "Strikethrough", span, children: [] };
        return [attach(strike, ...this.inlines(node.children, scope))];
      }
      case "inlineCode": {
        const raw = this.source.slice(span.start, span.stop);
        const fence = /^`+/.exec(raw)?.[0].length ?? 0;
        const content = { start: span.start + fence, stop: span.stop - fence };
        const code: CodeSpanNode = { kind: "CodeSpan", span, children: [] };
        return [attach(code, ...this.textNodes(content, scope))];
      }
      case "link":
      case "linkReference": {
        const raw = this.source.slice(span.start, span.stop);
        if (!raw.startsWith("[")) {
          return [{ kind: "AutoLink", span, children: [] }];
        }
        // link text is kept for the hard breaks it may hold
        const link: LinkNode = { kind: "Link", span, children: [] };
        return [attach(link, ...this.inlines(node.children, scope))];
      }
      case "image":
      case "imageReference":
        return [{ kind: "Image", span, children: [] }];
      case "html":
        return [{ kind: "RawHTML", span, children: [] }];
      case "footnoteReference":
        return [{ kind: "FootnoteReference", span, children: [] }];
      default: {
        const unreachable: never = node;
        throw new InvariantViolation(
          `unexpected mdast inline ${JSON.stringify(unreachable)}`,
        );
      }
    }
  }

  /** One Text per source line of `range`; all but the last soft-break. */
  textNodes(range: Segment, scope: Scope): TextNode[] {
    const segments = this.proseLines(range, scope);
    return segments.map((segment, i): TextNode => {
      const last = i === segments.length - 1;
      return {
        kind: "Text",
        segment: last ? segment : trimEnd(this.source, segment),
        softLineBreak: !last,
        hardLineBreak: false,
        children: [],
      };
    });
  }

  /* ------------------------------ lines ------------------------------- */

  /**
   * Per-line segments of a prose range: the first line from `range.start`,
   * continuation lines without container markers and leading whitespace,
   * the last one up to `range.stop`.
   */
  proseLines(range: Segment, scope: Scope): Segment[] {
    const first = this.lineOf(range.start);
    const last = this.lineOf(range.stop);
    const lines: Segment[] = [];
    for (let line = first; line <= last; line++) {
      const [lineStart, lineEnd] = this.lineBounds(line);
      let start = line === first ? range.start : this.stripContainers(line, scope);
      if (line !== first) {
        while (start < lineEnd && isBlank(this.source[start])) start++;
      }
      const stop = line === last ? Math.min(range.stop, lineEnd) : lineEnd;
      lines.push({ start: Math.max(start, lineStart), stop: Math.max(stop, start) });
    }
    return lines;
  }

  /** Source lines a verbatim block covers, container markers removed. */
  verbatimLines(node: Nodes, scope: Scope): Segment[] {
    const start = this.point(node, "start");
    const end = this.point(node, "end");
    const lines: Segment[] = [];
    for (let line = start.line; line <= end.line; line++) {
      const [, lineEnd] = this.lineBounds(line);
      const from = line === start.line
        ? this.offsetOf(start)
        : this.stripContainers(line, scope);
      const to = line === end.line ? Math.min(this.offsetOf(end), lineEnd) : lineEnd;
      lines.push({ start: from, stop: Math.max(from, to) });
    }
    return lines;
  }

  /**
   * Segment of one processed content line (`text`, as remark reports it) on
   * source line `line`. Content runs to the end of its line, so it is located
   * as a suffix; failing that (tabs expanded), the stripped source line.
   */
  locate(text: string, line: number, scope: Scope): Segment {
    const [, lineEnd] = this.lineBounds(line);
    const from = this.stripContainers(line, scope);
    if (this.source.slice(from, lineEnd).endsWith(text)) {
      return { start: lineEnd - text.length, stop: lineEnd };
    }
    return { start: from, stop: lineEnd };
  }

  stripContainers(line: number, scope: Scope): number {
    const [lineStart, lineEnd] = this.lineBounds(line);
    let at = lineStart;
    for (const strip of scope.strippers) {
      at += strip(this.source.slice(at, lineEnd));
    }
    return at;
  }

  /** `[start, end)` of 1-based `line`, the end before any `\r\n`. */
  lineBounds(line: number): [number, number] {
    const start = this.#lineStarts[line - 1];
    if (start === undefined) {
      throw new InvariantViolation(`line ${line} is outside the source`);
    }
    const next = this.#lineStarts[line];
    let end = next === undefined ? this.source.length : next - 1;
    if (end > start && this.source[end - 1] === "\r") end--;
    return [start, end];
  }

  /** 1-based line holding `offset`. */
  lineOf(offset: number): number {
    let lo = 0;
    let hi = this.#lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.#lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  /* ----------------------------- positions ---------------------------- */

  point(node: Nodes, edge: "start" | "end") {
    const point = node.position?.[edge];
    if (!point) {
      throw new InvariantViolation(`mdast ${node.type} node has no position`);
    }
    return point;
  }

  offsetOf(point: { line: number; column: number; offset?: number }): number {
    return point.offset ?? this.#lineStarts[point.line - 1] + point.column - 1;
  }

  span(node: Nodes): Segment {
    return {
      start: this.offsetOf(this.point(node, "start")),
      stop: this.offsetOf(this.point(node, "end")),
    };
  }
}

function isBlank(ch: string | undefined) {
  return ch === " " || ch === "\t";
}

function trimEnd(source: string, segment: Segment): Segment {
  let stop = segment.stop;
  while (stop > segment.start && isBlank(source[stop - 1])) stop--;
  return { start: segment.start, stop };
}

/**
 * Markdown pretty-printer: walks a {@link ParseNode} tree and writes a
 * canonical, re-wrapped rendering of it.
 *
 * The renderer holds only immutable configuration; everything that changes
 * during one render (the writer, the stack of container prefixes, the layout
 * of the table being written) lives in a per-render {@link RenderContext}.
 *
 * Canonical style in brief:
 * - prose is reflowed to `maxWidth` (see `reflow.ts`);
 * - ATX headings (`#` × level);
 * - fenced code with backtick fences (tildes when the info string holds a
 *   backtick), optionally run through a registered
 *   {@link CodeFormatter};
 * - tables padded to per-column widths (see `table-layout.ts`);
 * - `---` for thematic breaks;
 * - at most one blank line between blocks, one newline at the end.
 *
 * Constructs without a formatting rule (raw HTML, links, images) pass through
 * as their source text.
 *
 * @example
 * ```ts
 * const sink = new BufferSink();
 * await new MarkdownRenderer({ maxWidth: 72 }).render(doc, source, sink);
 * console.log(sink.text);
 * ```
 */

import {
  type BlockquoteNode,
  type CodeBlockNode,
  type CodeSpanNode,
  type EmphasisNode,
  expectKind,
  type FencedCodeBlockNode,
  type HeadingNode,
  isKind,
  linesText,
  type ListItemNode,
  type ListNode,
  nextSibling,
  type NodeKind,
  type ParagraphNode,
  type ParseNode,
  previousSibling,
  type Segment,
  segmentText,
  type StrikethroughNode,
  type TableCellNode,
  type TableHeaderNode,
  type TableNode,
  type TableRowNode,
  type TextBlockNode,
  type TextNode,
  textWidth,
  walk,
  type WalkStatus,
} from "./ast.ts";
import { type CodeFormatter, CodeFormatterRegistry } from "./code-fmt.ts";
import { ConfigError, FormatError, InvariantViolation } from "./errors.ts";
import { opensBlock, reflowRuns } from "./reflow.ts";
import {
  delimiterRow,
  layoutTable,
  padCell,
  type TableLayout,
} from "./table-layout.ts";
import { MarkdownWriter, type OutputSink } from "./writer.ts";

export type DecoratedKind =
  | "Emphasis"
  | "CodeSpan"
  | "Blockquote"
  | "Strikethrough";

export interface Decorator {
  readonly prefix: string;
  readonly suffix: string;
}

export const defaultDecorators: Readonly<Record<DecoratedKind, Decorator>> = {
  Emphasis: { prefix: "**", suffix: "**" },
  CodeSpan: { prefix: "`", suffix: "`" },
  Blockquote: { prefix: "> ", suffix: "" },
  Strikethrough: { prefix: "~~", suffix: "~~" },
};

/** `increment`: item i is `start + i`; `repeat-start`: every item is `start`. */
export type ListNumbering = "increment" | "repeat-start";

/** `preserve`: a hard break ends the reflowed line; `collapse`: it becomes a space. */
export type HardBreakPolicy = "preserve" | "collapse";

export type Logger = Partial<
  Record<"debug" | "info" | "warn" | "error", (...args: unknown[]) => void>
>;

export interface RendererOptions {
  maxWidth?: number;
  codeFormatters?: CodeFormatterRegistry;
  decorators?: Partial<Record<DecoratedKind, Decorator>>;
  listNumbering?: ListNumbering;
  hardBreaks?: HardBreakPolicy;
  logger?: Logger;
}

const blockKinds: ReadonlySet<NodeKind> = new Set<NodeKind>([
  "Paragraph",
  "TextBlock",
  "Heading",
  "Blockquote",
  "CodeBlock",
  "FencedCodeBlock",
  "HTMLBlock",
  "List",
  "ThematicBreak",
  "Table",
  "FrontMatter",
  "Definition",
]);

/** Mutable state of a single render. */
export class RenderContext {
  /** Continuation prefix of each open container, outermost first. */
  readonly containers: string[] = [];
  /** Set while a table renders; rows and cells read it. */
  table?: { readonly layout: TableLayout; column: number };
  #blankRequested = false;

  constructor(readonly source: string, readonly out: MarkdownWriter) {}

  get prefix(): string {
    return this.containers.join("");
  }

  /** Separate what follows by one blank line (written lazily, collapsed). */
  requestBlank() {
    this.#blankRequested = true;
  }

  cancelBlank() {
    this.#blankRequested = false;
  }

  /**
   * At the start of a line, write any requested blank line, then the container
   * prefixes (without trailing spaces when `trimPrefix`).
   */
  startLine(trimPrefix = false) {
    if (!this.out.atLineStart) return;
    if (this.#blankRequested) {
      this.#blankRequested = false;
      this.out.write(this.prefix.trimEnd() + "\n");
    }
    const prefix = trimPrefix ? this.prefix.trimEnd() : this.prefix;
    if (prefix.length > 0) this.out.write(prefix);
  }

  line(text: string) {
    this.startLine();
    this.out.write(text + "\n");
  }

  /** A line of verbatim content (code, raw HTML) under the container prefixes. */
  verbatimLine(text: string) {
    this.startLine(text.length === 0);
    this.out.verbatim(text + "\n");
  }

  requireTable(node: ParseNode) {
    if (!this.table) {
      throw new InvariantViolation(
        `${node.kind} rendered outside of a table layout`,
      );
    }
    return this.table;
  }

  text(segment: Segment): string {
    return segmentText(this.source, segment);
  }
}

export class MarkdownRenderer {
  readonly maxWidth: number;
  readonly codeFormatters: CodeFormatterRegistry;
  readonly decorators: Readonly<Record<DecoratedKind, Decorator>>;
  readonly listNumbering: ListNumbering;
  readonly hardBreaks: HardBreakPolicy;
  readonly #logger?: Logger;

  constructor(options: RendererOptions = {}) {
    const maxWidth = options.maxWidth ?? 80;
    if (!Number.isInteger(maxWidth) || maxWidth < 1) {
      throw new ConfigError(
        `maxWidth must be a positive integer, got ${maxWidth}`,
      );
    }
    this.maxWidth = maxWidth;
    this.codeFormatters = options.codeFormatters ?? new CodeFormatterRegistry();
    this.decorators = { ...defaultDecorators, ...options.decorators };
    this.listNumbering = options.listNumbering ?? "increment";
    this.hardBreaks = options.hardBreaks ?? "preserve";
    this.#logger = options.logger;
  }

  /**
   * Render `document` (parsed from `source`) into `sink`. A formatter failure
   * rejects with {@link FormatError}; output written before it stays written.
   */
  async render(
    document: ParseNode,
    source: string,
    sink: OutputSink,
  ): Promise<void> {
    const ctx = new RenderContext(source, new MarkdownWriter(sink));
    await walk(document, (node, entering) => this.visit(ctx, node, entering));
  }

  /** One walker callback: dispatch on the node kind. */
  visit(
    ctx: RenderContext,
    node: ParseNode,
    entering: boolean,
  ): WalkStatus | Promise<WalkStatus> {
    if (entering && blockKinds.has(node.kind)) this.separate(ctx, node);

    switch (node.kind) {
      case "Document":
        if (!entering) ctx.out.finish();
        return "continue";
      case "Paragraph":
      case "TextBlock":
        return this.renderProse(ctx, node, entering);
      case "Heading":
        return this.renderHeading(ctx, node, entering);
      case "Blockquote":
        return this.renderBlockquote(ctx, node, entering);
      case "CodeBlock":
        return this.renderCodeBlock(ctx, node, entering);
      case "FencedCodeBlock":
        return this.renderFencedCodeBlock(ctx, node, entering);
      case "HTMLBlock":
      case "FrontMatter":
      case "Definition":
        if (entering) {
          for (const line of node.lines) ctx.verbatimLine(ctx.text(line));
        }
        return "skip-children";
      case "List":
        return this.renderList(ctx, node, entering);
      case "ListItem":
        return this.renderListItem(ctx, node, entering);
      case "ThematicBreak":
        if (entering) ctx.line("---");
        return "continue";
      case "Table":
        return this.renderTable(ctx, node, entering);
      case "TableHeader":
      case "TableRow":
        return this.renderTableRow(ctx, node, entering);
      case "TableCell":
        return this.renderTableCell(ctx, node, entering);
      case "CodeSpan":
        return this.renderCodeSpan(ctx, node, entering);
      case "Emphasis":
      case "Strikethrough":
        return this.renderDecorated(ctx, node, entering);
      case "Text":
        return this.renderText(ctx, node, entering);
      case "String":
        if (entering) ctx.out.write(node.value);
        return "continue";
      case "AutoLink":
      case "Image":
      case "Link":
      case "RawHTML":
      case "FootnoteReference":
        if (entering) ctx.out.write(ctx.text(node.span));
        return "skip-children";
      default: {
        const unreachable: never = node;
        throw new InvariantViolation(
          `no rendering rule for ${JSON.stringify(unreachable)}`,
        );
      }
    }
  }

  /**
   * Blank line between a block and its previous sibling. Lists that follow a
   * List (top level) or a tight item's text (inside an item) stay attached.
   */
  private separate(ctx: RenderContext, node: ParseNode) {
    const prev = previousSibling(node);
    if (!prev) return;
    if (node.kind === "List" && (prev.kind === "List" || prev.kind === "TextBlock")) {
      return;
    }
    ctx.requestBlank();
  }

  /** Width left for text after the container prefixes. */
  private availableWidth(ctx: RenderContext, extra = 0): number {
    return Math.max(1, this.maxWidth - textWidth(ctx.prefix) - extra);
  }

  private renderProse(
    ctx: RenderContext,
    node: ParagraphNode | TextBlockNode,
    entering: boolean,
  ): WalkStatus {
    if (!entering) {
      if (isKind(node.parent, "Document")) ctx.requestBlank();
      return "skip-children";
    }
    // a task item's checkbox shares the first line with the text
    const parent = node.parent;
    const checkbox = isKind(parent, "ListItem") &&
        parent.checked !== undefined && parent.children[0] === node
      ? 4
      : 0;
    // a wrapped line must not start with something that reparses as a block
    const lines = reflowRuns(
      this.proseRuns(ctx, node),
      this.availableWidth(ctx, checkbox),
      opensBlock,
    );
    for (const line of lines) ctx.line(line);
    return "skip-children";
  }

  /**
   * Paragraph text split at hard line breaks. Under `preserve` every run but
   * the last ends in a backslash hard break; under `collapse` the runs are
   * joined back into one.
   */
  proseRuns(ctx: RenderContext, node: ParagraphNode | TextBlockNode): string[] {
    const breaks = hardBreakOffsets(node);
    const runs: string[] = [];
    let current = "";
    for (const line of node.lines) {
      const at = breaks.find((b) => b >= line.start && b <= line.stop);
      if (at === undefined) {
        current += ctx.source.slice(line.start, line.stop) + "\n";
      } else {
        current += ctx.source.slice(line.start, at);
        runs.push(current);
        current = "";
      }
    }
    runs.push(current);

    const nonEmpty = runs.map((r) => r.trim()).filter((r) => r.length > 0);
    if (this.hardBreaks === "collapse") return [nonEmpty.join(" ")];
    return nonEmpty.map((r, i) =>
      i < nonEmpty.length - 1 && !r.endsWith("\\") ? r + "\\" : r
    );
  }

  private renderHeading(
    ctx: RenderContext,
    node: HeadingNode,
    entering: boolean,
  ): WalkStatus {
    if (entering) {
      ctx.startLine();
      const hashes = "#".repeat(node.level);
      ctx.out.write(node.children.length > 0 ? hashes + " " : hashes);
    } else {
      ctx.out.write("\n");
      ctx.requestBlank();
    }
    return "continue";
  }

  private renderBlockquote(
    ctx: RenderContext,
    _node: BlockquoteNode,
    entering: boolean,
  ): WalkStatus {
    const { prefix, suffix } = this.decorators.Blockquote;
    if (entering) {
      ctx.startLine();
      ctx.out.write(prefix);
      ctx.containers.push(prefix);
    } else {
      ctx.containers.pop();
      ctx.out.write(suffix);
      if (!ctx.out.atLineStart) ctx.out.write("\n");
      ctx.requestBlank();
    }
    return "continue";
  }

  private renderCodeBlock(
    ctx: RenderContext,
    node: CodeBlockNode,
    entering: boolean,
  ): WalkStatus {
    if (entering) {
      for (const line of node.lines) {
        const text = ctx.text(line);
        ctx.verbatimLine(text.length > 0 ? "    " + text : "");
      }
    }
    return "skip-children";
  }

  private async renderFencedCodeBlock(
    ctx: RenderContext,
    node: FencedCodeBlockNode,
    entering: boolean,
  ): Promise<WalkStatus> {
    if (!entering) return "continue";
    const code = node.lines.length > 0
      ? linesText(ctx.source, node.lines) + "\n"
      : "";
    const info = (node.language ?? "") + (node.meta ? " " + node.meta : "");
    const fence = fenceFor(code, info);
    ctx.line(fence + info);

    const formatter = node.language
      ? this.codeFormatters.lookup(node.language)
      : undefined;
    const body = formatter && node.language
      ? await this.formatCode(formatter, node.language, code)
      : code;
    for (const line of splitLines(body)) ctx.verbatimLine(line);
    ctx.line(fence);
    return "skip-children";
  }

  private async formatCode(
    formatter: CodeFormatter,
    language: string,
    code: string,
  ): Promise<string> {
    this.#log("debug", `formatting ${language} code block`, {
      formatter: formatter.constructor.name,
      bytes: code.length,
    });
    let formatted: string;
    try {
      formatted = await formatter.format(code);
    } catch (err) {
      if (err instanceof FormatError) throw err;
      throw new FormatError(
        `${language} formatter failed: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { language },
        { cause: err },
      );
    }
    return formatted.length > 0 && !formatted.endsWith("\n")
      ? formatted + "\n"
      : formatted;
  }

  private renderList(
    ctx: RenderContext,
    node: ListNode,
    entering: boolean,
  ): WalkStatus {
    if (!entering) {
      const next = nextSibling(node);
      if (next && next.kind !== "List") ctx.requestBlank();
    }
    return "continue";
  }

  /** `3. `, `- ` and so on, for one item of `list`. */
  listMarker(list: ListNode, item: ListItemNode): string {
    if (!list.ordered) return list.marker + " ";
    const n = this.listNumbering === "increment"
      ? list.start + list.children.indexOf(item)
      : list.start;
    return `${n}${list.marker} `;
  }

  private renderListItem(
    ctx: RenderContext,
    node: ListItemNode,
    entering: boolean,
  ): WalkStatus {
    if (!entering) {
      ctx.containers.pop();
      if (!ctx.out.atLineStart) ctx.out.write("\n");
      // items of one list are not separated
      ctx.cancelBlank();
      return "continue";
    }
    const list = expectKind(node.parent, "List");
    const marker = this.listMarker(list, node);
    const checkbox = node.checked === undefined
      ? ""
      : node.checked
      ? "[x] "
      : "[ ] ";
    ctx.startLine();
    const lead = marker + checkbox;
    ctx.out.write(node.children.length > 0 ? lead : lead.trimEnd());
    ctx.containers.push(" ".repeat(textWidth(marker)));
    return "continue";
  }

  private renderTable(
    ctx: RenderContext,
    node: TableNode,
    entering: boolean,
  ): WalkStatus {
    if (entering) {
      ctx.table = { layout: layoutTable(node, ctx.source), column: 0 };
    } else {
      ctx.table = undefined;
      ctx.requestBlank();
    }
    return "continue";
  }

  private renderTableRow(
    ctx: RenderContext,
    node: TableHeaderNode | TableRowNode,
    entering: boolean,
  ): WalkStatus {
    const table = ctx.requireTable(node);
    const { widths } = table.layout;
    if (entering) {
      table.column = 0;
      ctx.startLine();
      return "continue";
    }
    // rows shorter than the header get empty cells
    for (let c = table.column; c < widths.length; c++) {
      ctx.out.write(padCell("", widths[c]));
    }
    ctx.out.write("|\n");
    if (node.kind === "TableHeader") ctx.line(delimiterRow(table.layout));
    return "continue";
  }

  private renderTableCell(
    ctx: RenderContext,
    node: TableCellNode,
    entering: boolean,
  ): WalkStatus {
    const table = ctx.requireTable(node);
    if (entering) {
      const width = table.layout.widths[table.column];
      if (width === undefined) {
        throw new InvariantViolation(
          `table cell ${table.column} has no column width`,
        );
      }
      ctx.out.write(padCell(linesText(ctx.source, node.lines), width));
      table.column++;
    }
    return "skip-children";
  }

  private renderCodeSpan(
    ctx: RenderContext,
    node: CodeSpanNode,
    entering: boolean,
  ): WalkStatus {
    const { prefix, suffix } = this.decorators.CodeSpan;
    const content = this.inlineChildren(ctx, node);
    // the fence must outrun any backtick run inside the span
    const longest = Math.max(
      0,
      ...[...content.matchAll(/`+/g)].map((m) => m[0].length),
    );
    const times = prefix === "`" && longest > 0 ? longest + 1 : 1;
    if (entering) {
      ctx.out.write(prefix.repeat(times) + content);
      return "skip-children";
    }
    ctx.out.write(suffix.repeat(times));
    return "continue";
  }

  private renderDecorated(
    ctx: RenderContext,
    node: EmphasisNode | StrikethroughNode,
    entering: boolean,
  ): WalkStatus {
    let { prefix, suffix } = this.decorators[node.kind];
    if (node.kind === "Emphasis" && node.level === 1) {
      prefix = prefix.slice(0, 1);
      suffix = suffix.slice(0, 1);
    }
    if (entering) {
      ctx.out.write(prefix + this.inlineChildren(ctx, node));
      return "skip-children";
    }
    ctx.out.write(suffix);
    return "continue";
  }

  /**
   * Text of an inline span on one line: Text children as raw source with line
   * breaks turned into spaces, anything else as its source span.
   */
  private inlineChildren(
    ctx: RenderContext,
    node: CodeSpanNode | EmphasisNode | StrikethroughNode,
  ): string {
    let text = "";
    for (const child of node.children) {
      if (child.kind === "Text") {
        text += ctx.text(child.segment);
        if (child.softLineBreak || child.hardLineBreak) text += " ";
      } else {
        text += rawInline(ctx, child);
      }
    }
    return text;
  }

  private renderText(
    ctx: RenderContext,
    node: TextNode,
    entering: boolean,
  ): WalkStatus {
    if (!entering) return "continue";
    ctx.out.write(ctx.text(node.segment));
    if (node.hardLineBreak || node.softLineBreak) {
      // a heading is a single line
      ctx.out.write(isKind(node.parent, "Heading") ? " " : "\n");
    }
    return "continue";
  }

  #log(level: keyof Logger, ...args: unknown[]) {
    this.#logger?.[level]?.(...args);
  }
}

/** Source text of an inline node nested in a decorated span. */
function rawInline(ctx: RenderContext, node: ParseNode): string {
  switch (node.kind) {
    case "Text":
      return ctx.text(node.segment);
    case "String":
      return node.value;
    case "CodeSpan":
    case "Emphasis":
    case "Strikethrough":
    case "AutoLink":
    case "Image":
    case "Link":
    case "RawHTML":
    case "FootnoteReference":
      return ctx.text(node.span);
    default:
      throw new InvariantViolation(
        `${node.kind} cannot appear inside an inline span`,
      );
  }
}

/** End offsets of the text before each hard line break in `node`. */
function hardBreakOffsets(node: ParseNode): number[] {
  const offsets: number[] = [];
  const children: readonly ParseNode[] = node.children;
  for (const child of children) {
    if (child.kind === "Text" && child.hardLineBreak) {
      offsets.push(child.segment.stop);
    }
    offsets.push(...hardBreakOffsets(child));
  }
  return offsets;
}

/**
 * A fence longer than any fence of the same character inside `code`.
 * Backticks, unless the info string holds one: a backtick fence cannot.
 */
export function fenceFor(code: string, info = ""): string {
  const char = info.includes("`") ? "~" : "`";
  const inner = char === "`" ? /^ {0,3}(`{3,})/gm : /^ {0,3}(~{3,})/gm;
  let longest = 0;
  for (const m of code.matchAll(inner)) {
    longest = Math.max(longest, m[1].length);
  }
  return char.repeat(Math.max(3, longest + 1));
}

/** Lines of `text` without terminators; a final newline ends the last line. */
function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Parse tree consumed by the renderer.
 *
 * Node kinds form a closed tagged union on `kind`. Nodes that span source text
 * carry {@link Segment}s (half-open offsets into the source string) rather than
 * copies of the text, so the renderer can emit the original bytes unmodified
 * where no normalization applies. A multi-line block holds one segment per
 * source line, without the line terminator and, inside containers, without the
 * container's markers and indentation.
 *
 * The tree is built once (see `mdast.ts`) and is read-only while rendering.
 *
 * @example
 * ```ts
 * const doc = parseMarkdown("# Title\n");
 * await walk(doc, (node, entering) => {
 *   if (entering) console.log(node.kind);
 *   return "continue";
 * });
 * ```
 */

import { InvariantViolation } from "./errors.ts";

/** Half-open `[start, stop)` range of UTF-16 offsets into the source. */
export interface Segment {
  readonly start: number;
  readonly stop: number;
}

interface NodeBase<K extends string, C extends ParseNode = ParseNode> {
  readonly kind: K;
  /** Non-owning back reference; absent on the Document. */
  parent?: ParseNode;
  readonly children: C[];
}

export type DocumentNode = NodeBase<"Document">;

export interface ParagraphNode extends NodeBase<"Paragraph"> {
  readonly lines: readonly Segment[];
}

/** A paragraph inside a tight list item. */
export interface TextBlockNode extends NodeBase<"TextBlock"> {
  readonly lines: readonly Segment[];
}

export interface HeadingNode extends NodeBase<"Heading"> {
  readonly level: 1 | 2 | 3 | 4 | 5 | 6;
}

export type BlockquoteNode = NodeBase<"Blockquote">;

/** Indented (non-fenced) code. */
export interface CodeBlockNode extends NodeBase<"CodeBlock"> {
  readonly lines: readonly Segment[];
}

export interface FencedCodeBlockNode extends NodeBase<"FencedCodeBlock"> {
  readonly language?: string;
  /** Remainder of the info string after the language tag. */
  readonly meta?: string;
  readonly lines: readonly Segment[];
}

export interface HTMLBlockNode extends NodeBase<"HTMLBlock"> {
  readonly lines: readonly Segment[];
}

export type BulletMarker = "-" | "*" | "+";
export type OrderedMarker = "." | ")";

export interface ListNode extends NodeBase<"List", ListItemNode> {
  readonly ordered: boolean;
  readonly start: number;
  readonly marker: BulletMarker | OrderedMarker;
  readonly tight: boolean;
}

export interface ListItemNode extends NodeBase<"ListItem"> {
  /** Source columns from the item's marker to its content. */
  readonly offset: number;
  /** GFM task state; absent for plain items. */
  readonly checked?: boolean;
}

export type ThematicBreakNode = NodeBase<"ThematicBreak">;

export type ColumnAlignment = "left" | "center" | "right" | "none";

export interface TableNode
  extends NodeBase<"Table", TableHeaderNode | TableRowNode> {
  readonly alignments: readonly ColumnAlignment[];
}

export type TableHeaderNode = NodeBase<"TableHeader", TableCellNode>;
export type TableRowNode = NodeBase<"TableRow", TableCellNode>;

export interface TableCellNode extends NodeBase<"TableCell"> {
  readonly lines: readonly Segment[];
}

export interface AutoLinkNode extends NodeBase<"AutoLink"> {
  readonly span: Segment;
}

export interface CodeSpanNode extends NodeBase<"CodeSpan", TextNode> {
  readonly span: Segment;
}

export interface EmphasisNode extends NodeBase<"Emphasis"> {
  /** 1 for emphasis, 2 for strong emphasis. */
  readonly level: 1 | 2;
  readonly span: Segment;
}

export interface ImageNode extends NodeBase<"Image"> {
  readonly span: Segment;
}

export interface LinkNode extends NodeBase<"Link"> {
  readonly span: Segment;
}

export interface RawHTMLNode extends NodeBase<"RawHTML"> {
  readonly span: Segment;
}

export interface TextNode extends NodeBase<"Text"> {
  readonly segment: Segment;
  softLineBreak: boolean;
  hardLineBreak: boolean;
}

export interface StringNode extends NodeBase<"String"> {
  readonly value: string;
}

export interface FrontMatterNode extends NodeBase<"FrontMatter"> {
  readonly lines: readonly Segment[];
}

/** Link reference or footnote definition, kept verbatim. */
export interface DefinitionNode extends NodeBase<"Definition"> {
  readonly lines: readonly Segment[];
}

export interface StrikethroughNode extends NodeBase<"Strikethrough"> {
  readonly span: Segment;
}

export interface FootnoteReferenceNode extends NodeBase<"FootnoteReference"> {
  readonly span: Segment;
}

export type ParseNode =
  | DocumentNode
  | ParagraphNode
  | TextBlockNode
  | HeadingNode
  | BlockquoteNode
  | CodeBlockNode
  | FencedCodeBlockNode
  | HTMLBlockNode
  | ListNode
  | ListItemNode
  | ThematicBreakNode
  | TableNode
  | TableHeaderNode
  | TableRowNode
  | TableCellNode
  | AutoLinkNode
  | CodeSpanNode
  | EmphasisNode
  | ImageNode
  | LinkNode
  | RawHTMLNode
  | TextNode
  | StringNode
  | FrontMatterNode
  | DefinitionNode
  | StrikethroughNode
  | FootnoteReferenceNode;

export type NodeKind = ParseNode["kind"];

export type NodeOfKind<K extends NodeKind> = Extract<ParseNode, { kind: K }>;

export function isKind<K extends NodeKind>(
  node: ParseNode | undefined,
  kind: K,
): node is NodeOfKind<K> {
  return node?.kind === kind;
}

/** Narrow or fail: the tree shape guarantees the kind, so a miss is a bug. */
export function expectKind<K extends NodeKind>(
  node: ParseNode | undefined,
  kind: K,
): NodeOfKind<K> {
  if (!isKind(node, kind)) {
    throw new InvariantViolation(
      `expected a ${kind} node, got ${node ? node.kind : "nothing"}`,
    );
  }
  return node;
}

/* ============================== Building ================================ */

/** Append children, wiring their parent back references. */
export function attach<P extends ParseNode>(
  parent: P,
  ...children: P["children"]
): P {
  const list: ParseNode[] = parent.children;
  for (const child of children) {
    child.parent = parent;
    list.push(child);
  }
  return parent;
}

/* ============================== Navigation ============================== */

export function nextSibling(node: ParseNode): ParseNode | undefined {
  const siblings: readonly ParseNode[] | undefined = node.parent?.children;
  if (!siblings) return undefined;
  return siblings[siblings.indexOf(node) + 1];
}

export function previousSibling(node: ParseNode): ParseNode | undefined {
  const siblings: readonly ParseNode[] | undefined = node.parent?.children;
  if (!siblings) return undefined;
  const i = siblings.indexOf(node);
  return i > 0 ? siblings[i - 1] : undefined;
}

/* ================================ Text ================================== */

export function segmentText(source: string, segment: Segment): string {
  return source.slice(segment.start, segment.stop);
}

/** Raw text of a node's line segments, joined by newlines. */
export function linesText(source: string, lines: readonly Segment[]): string {
  return lines.map((line) => segmentText(source, line)).join("\n");
}

/** Display width used for reflow and table layout: Unicode code points. */
export function textWidth(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

/* ================================ Walk ================================== */

export type WalkStatus = "continue" | "skip-children" | "stop";

/**
 * Called once when entering and once when leaving each node. Returning
 * `"skip-children"` on enter still produces the matching exit call;
 * `"stop"` ends the traversal. Throwing aborts it.
 */
export type Visitor = (
  node: ParseNode,
  entering: boolean,
) => WalkStatus | Promise<WalkStatus>;

/** Depth-first, strictly sequential traversal. */
export async function walk(
  node: ParseNode,
  visitor: Visitor,
): Promise<WalkStatus> {
  const status = await visitor(node, true);
  if (status === "stop") return status;
  if (status !== "skip-children") {
    const children: readonly ParseNode[] = node.children;
    for (const child of children) {
      if (await walk(child, visitor) === "stop") return "stop";
    }
  }
  return await visitor(node, false);
}

// Table layout: per-column widths from raw cell content, plus the padded
// cell and delimiter-row text the renderer writes.

import {
  type ColumnAlignment,
  linesText,
  type TableCellNode,
  type TableNode,
  textWidth,
} from "./ast.ts";
import { InvariantViolation } from "./errors.ts";

export interface TableLayout {
  /** Maximum raw content width of each column, header included. */
  readonly widths: readonly number[];
  readonly alignments: readonly ColumnAlignment[];
}

/** Raw content width of a cell: the summed width of its segments. */
export function cellWidth(cell: TableCellNode, source: string): number {
  return textWidth(linesText(source, cell.lines));
}

/**
 * Column count comes from the first (header) row. A later row with more
 * cells than the header has no column to land in.
 */
export function layoutTable(table: TableNode, source: string): TableLayout {
  const [header] = table.children;
  const columns = header ? header.children.length : 0;
  const widths = new Array<number>(columns).fill(0);

  table.children.forEach((row, r) => {
    if (row.children.length > columns) {
      throw new InvariantViolation(
        `table row ${r} has ${row.children.length} cells, header has ${columns}`,
      );
    }
    row.children.forEach((cell, c) => {
      widths[c] = Math.max(widths[c], cellWidth(cell, source));
    });
  });

  const alignments = widths.map((_, c) => table.alignments[c] ?? "none");
  // a centered delimiter needs a dash between its colons
  alignments.forEach((a, c) => {
    if (a === "center") widths[c] = Math.max(widths[c], 1);
  });

  return { widths, alignments };
}

/** `| ` + content left-aligned to the column width + space. */
export function padCell(content: string, width: number): string {
  const pad = Math.max(0, width - textWidth(content));
  return "| " + content + " ".repeat(pad) + " ";
}

/** Dash run for one column: width + 2, with alignment colons at its ends. */
export function delimiterCell(width: number, alignment: ColumnAlignment) {
  const run = width + 2;
  switch (alignment) {
    case "left":
      return ":" + "-".repeat(run - 1);
    case "right":
      return "-".repeat(run - 1) + ":";
    case "center":
      return ":" + "-".repeat(run - 2) + ":";
    case "none":
      return "-".repeat(run);
  }
}

/** The delimiter row written after the header, without its newline. */
export function delimiterRow(layout: TableLayout): string {
  return layout.widths
    .map((w, c) => "|" + delimiterCell(w, layout.alignments[c]))
    .join("") + "|";
}

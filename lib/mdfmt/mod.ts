/**
 * mdfmt: canonical Markdown pretty-printing.
 *
 * @example
 * ```ts
 * import { CodeFormatterRegistry, formatMarkdown, SpawnedCodeFormatter } from "mdfmt";
 *
 * const out = await formatMarkdown(source, {
 *   maxWidth: 72,
 *   codeFormatters: new CodeFormatterRegistry()
 *     .register(["go"], new SpawnedCodeFormatter("gofmt")),
 * });
 * ```
 */

import { parseMarkdown } from "./mdast.ts";
import { MarkdownRenderer, type RendererOptions } from "./render.ts";
import { BufferSink, type OutputSink } from "./writer.ts";

export * from "./ast.ts";
export * from "./code-fmt.ts";
export * from "./config.ts";
export * from "./errors.ts";
export * from "./mdast.ts";
export * from "./reflow.ts";
export * from "./render.ts";
export * from "./table-layout.ts";
export * from "./writer.ts";

/** Parse `source` and render it into `sink`. */
export async function renderMarkdown(
  source: string,
  sink: OutputSink,
  options?: RendererOptions,
): Promise<void> {
  await new MarkdownRenderer(options).render(parseMarkdown(source), source, sink);
}

/** Formatted text of `source`. */
export async function formatMarkdown(
  source: string,
  options?: RendererOptions,
): Promise<string> {
  const sink = new BufferSink();
  await renderMarkdown(source, sink, options);
  return sink.text;
}

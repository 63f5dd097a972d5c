import { test } from "node:test";
import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { BufferSink, MarkdownWriter, StreamSink } from "./writer.ts";

function writerWithBuffer() {
  const sink = new BufferSink();
  return { sink, w: new MarkdownWriter(sink) };
}

test("MarkdownWriter", async (t) => {
  await t.test("blank-line runs collapse to one", () => {
    const { sink, w } = writerWithBuffer();
    w.write("para\n\n");
    w.write("\n");
    w.write("\n\n");
    w.write("next\n");
    w.finish();
    assert.equal(sink.text, "para\n\nnext\n");
  });

  await t.test("no leading blank lines, one trailing newline", () => {
    const { sink, w } = writerWithBuffer();
    w.write("\n\n");
    w.write("# Title\n\n");
    w.finish();
    assert.equal(sink.text, "# Title\n");
  });

  await t.test("content and its first newline reach the sink at once", () => {
    const { sink, w } = writerWithBuffer();
    w.write("```go\n");
    assert.equal(sink.text, "```go\n");
    w.write("text\n\n");
    assert.equal(sink.text, "```go\ntext\n");
  });

  await t.test("tracks the line start", () => {
    const { w } = writerWithBuffer();
    assert.equal(w.atLineStart, true);
    w.write("- ");
    assert.equal(w.atLineStart, false);
    w.write("item\n");
    assert.equal(w.atLineStart, true);
  });

  await t.test("verbatim text keeps its blank lines", () => {
    const { sink, w } = writerWithBuffer();
    w.write("```\n");
    w.verbatim("a\n\n\nb\n\n");
    w.write("```\n");
    w.finish();
    assert.equal(sink.text, "```\na\n\n\nb\n\n```\n");
  });

  await t.test("a pending blank line is flushed before verbatim text", () => {
    const { sink, w } = writerWithBuffer();
    w.write("para\n\n");
    w.verbatim("<div>\n");
    w.finish();
    assert.equal(sink.text, "para\n\n<div>\n");
  });

  await t.test("finish terminates an open line and is a no-op when empty", () => {
    const a = writerWithBuffer();
    a.w.write("open");
    a.w.finish();
    assert.equal(a.sink.text, "open\n");

    const b = writerWithBuffer();
    b.w.finish();
    assert.equal(b.sink.text, "");
  });
});

test("StreamSink writes through to the stream", async () => {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.setEncoding("utf8");
  stream.on("data", (c: string) => chunks.push(c));
  const sink = new StreamSink(stream);
  sink.write("a");
  sink.write("b\n");
  stream.end();
  await new Promise<void>((resolve) => stream.on("end", () => resolve()));
  assert.equal(chunks.join(""), "ab\n");
});

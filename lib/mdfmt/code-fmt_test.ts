import { test } from "node:test";
import assert from "node:assert/strict";
import {
  type CodeFormatter,
  CodeFormatterRegistry,
  SpawnedCodeFormatter,
} from "./code-fmt.ts";
import { FormatError } from "./errors.ts";

const fixed = (out: string): CodeFormatter => ({ format: () => out });

test("code formatter registry", async (t) => {
  await t.test("lookup by any registered tag", () => {
    const go = fixed("go");
    const registry = new CodeFormatterRegistry().register(["go", "golang"], go);
    assert.equal(registry.lookup("go"), go);
    assert.equal(registry.lookup("golang"), go);
    assert.deepEqual(registry.tags, ["go", "golang"]);
  });

  await t.test("unmatched and differently-cased tags are absent", () => {
    const registry = new CodeFormatterRegistry().register(["go"], fixed("go"));
    assert.equal(registry.lookup("Go"), undefined);
    assert.equal(registry.lookup("rust"), undefined);
    assert.equal(new CodeFormatterRegistry().lookup("go"), undefined);
  });

  await t.test("last registration wins for a colliding tag", () => {
    const first = fixed("first");
    const second = fixed("second");
    const registry = new CodeFormatterRegistry()
      .register(["go", "golang"], first)
      .register(["golang"], second);
    assert.equal(registry.lookup("go"), first);
    assert.equal(registry.lookup("golang"), second);
  });
});

test("spawned code formatter", async (t) => {
  const upper =
    "let s = ''; process.stdin.setEncoding('utf8'); process.stdin.on('data', (c) => s += c); process.stdin.on('end', () => process.stdout.write(s.toUpperCase()));";

  await t.test("pipes code through the command", async () => {
    const fmt = new SpawnedCodeFormatter(process.execPath, ["-e", upper]);
    assert.equal(await fmt.format("func main() {}\n"), "FUNC MAIN() {}\n");
  });

  await t.test("non-zero exit is a FormatError with exit code and stderr", async () => {
    const fmt = new SpawnedCodeFormatter(process.execPath, [
      "-e",
      "process.stderr.write('1:1: expected package'); process.exit(2)",
    ]);
    await assert.rejects(fmt.format("not go"), (err: unknown) => {
      assert.ok(err instanceof FormatError);
      assert.equal(err.details.exitCode, 2);
      assert.equal(err.details.stderr, "1:1: expected package");
      assert.equal(
        err.message,
        `${process.execPath} exited with code 2: 1:1: expected package`,
      );
      return true;
    });
  });

  await t.test("extra environment on top of the inherited one", async () => {
    const fmt = new SpawnedCodeFormatter(
      process.execPath,
      ["-e", "process.stdout.write(`${process.env.MDFMT_STYLE}:${process.env.PATH === undefined}`)"],
      { env: { MDFMT_STYLE: "tabs" } },
    );
    assert.equal(await fmt.format(""), "tabs:false");
  });

  await t.test("missing executable is a FormatError", async () => {
    const fmt = new SpawnedCodeFormatter("definitely-not-a-real-formatter");
    await assert.rejects(fmt.format("x"), (err: unknown) => {
      assert.ok(err instanceof FormatError);
      assert.match(err.message, /^unable to run definitely-not-a-real-formatter: /);
      return true;
    });
  });
});

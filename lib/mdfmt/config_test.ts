import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SpawnedCodeFormatter } from "./code-fmt.ts";
import { loadConfig, parseConfig, resolveRendererOptions } from "./config.ts";
import { ConfigError } from "./errors.ts";

test("parseConfig", async (t) => {
  await t.test("fills in defaults", () => {
    assert.deepEqual(parseConfig({}), {
      maxWidth: 80,
      listNumbering: "increment",
      hardBreaks: "preserve",
      formatters: [],
    });
  });

  await t.test("rejects invalid values with a readable message", () => {
    assert.throws(() => parseConfig({ maxWidth: 0 }), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.match(err.message, /^invalid configuration:\n/);
      assert.match(err.message, /maxWidth/);
      return true;
    });
  });

  await t.test("rejects unknown keys and bad registrations", () => {
    assert.throws(() => parseConfig({ width: 72 }), ConfigError);
    assert.throws(
      () => parseConfig({ formatters: [{ languages: [], command: "gofmt" }] }),
      ConfigError,
    );
    assert.throws(() => parseConfig({ listNumbering: "roman" }), ConfigError);
  });
});

test("loadConfig", async (t) => {
  const dir = await mkdtemp(join(tmpdir(), "mdfmt-config-"));
  t.after(() => rm(dir, { recursive: true, force: true }));

  await t.test("reads JSON5 with comments and trailing commas", async () => {
    const path = join(dir, ".mdfmt.json5");
    await writeFile(
      path,
      `{
        // narrow docs
        maxWidth: 72,
        hardBreaks: 'collapse',
        formatters: [
          { languages: ['go', 'golang'], command: 'gofmt', },
        ],
      }`,
    );
    const config = await loadConfig(path);
    assert.equal(config.maxWidth, 72);
    assert.equal(config.hardBreaks, "collapse");
    assert.equal(config.listNumbering, "increment");
    assert.deepEqual(config.formatters, [
      { languages: ["go", "golang"], command: "gofmt", args: [] },
    ]);
  });

  await t.test("a missing file is an error unless optional", async () => {
    const path = join(dir, "absent.json5");
    await assert.rejects(loadConfig(path), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.match(err.message, /^unable to read /);
      assert.equal(err.source, path);
      return true;
    });
    assert.equal((await loadConfig(path, { optional: true })).maxWidth, 80);
  });

  await t.test("syntax errors name the file", async () => {
    const path = join(dir, "broken.json5");
    await writeFile(path, "{ maxWidth: ");
    await assert.rejects(loadConfig(path), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.ok(err.message.startsWith(`unable to parse ${path}: `));
      return true;
    });
  });

  await t.test("schema errors name the file", async () => {
    const path = join(dir, "invalid.json5");
    await writeFile(path, "{ maxWidth: -1 }");
    await assert.rejects(loadConfig(path), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.ok(err.message.startsWith(`invalid configuration in ${path}:\n`));
      return true;
    });
  });
});

test("resolveRendererOptions", async (t) => {
  await t.test("registers spawned formatters in order", () => {
    const options = resolveRendererOptions(parseConfig({
      maxWidth: 60,
      listNumbering: "repeat-start",
      formatters: [
        { languages: ["go", "golang"], command: "gofmt" },
        { languages: ["golang"], command: "goimports", args: ["-local", "x"] },
      ],
    }));
    assert.equal(options.maxWidth, 60);
    assert.equal(options.listNumbering, "repeat-start");
    assert.equal(options.hardBreaks, "preserve");

    const go = options.codeFormatters?.lookup("go");
    const golang = options.codeFormatters?.lookup("golang");
    assert.ok(go instanceof SpawnedCodeFormatter);
    assert.ok(golang instanceof SpawnedCodeFormatter);
    assert.equal(go.command, "gofmt");
    assert.equal(golang.command, "goimports");
    assert.deepEqual(golang.args, ["-local", "x"]);
  });

  await t.test("formatter environment reaches the spawned command", async () => {
    const options = resolveRendererOptions(parseConfig({
      formatters: [{
        languages: ["txt"],
        command: process.execPath,
        args: ["-e", "process.stdout.write(process.env.MDFMT_CASE ?? 'unset')"],
        env: { MDFMT_CASE: "upper" },
      }],
    }));
    assert.equal(await options.codeFormatters?.lookup("txt")?.format("x"), "upper");
  });

  await t.test("environment values must be strings", () => {
    assert.throws(
      () => parseConfig({ formatters: [{ languages: ["go"], command: "gofmt", env: { N: 1 } }] }),
      ConfigError,
    );
  });
});

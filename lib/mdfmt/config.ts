/**
 * Formatter configuration: a zod schema, a JSON5 file loader and the mapping
 * from validated configuration to {@link RendererOptions}.
 *
 * @example
 * ```json5
 * // .mdfmt.json5
 * {
 *   maxWidth: 72,
 *   listNumbering: "increment",
 *   formatters: [
 *     { languages: ["go", "golang"], command: "gofmt" },
 *     { languages: ["ts"], command: "prettier", args: ["--parser", "typescript"] },
 *     { languages: ["sql"], command: "sqlfmt", env: { SQLFMT_DIALECT: "ansi" } },
 *   ],
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import JSON5 from "json5";
import { z } from "zod";
import { CodeFormatterRegistry, SpawnedCodeFormatter } from "./code-fmt.ts";
import { ConfigError } from "./errors.ts";
import type { Logger, RendererOptions } from "./render.ts";

export const formatterRegistrationSchema = z.object({
  languages: z.array(z.string().min(1)).min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  // added to the inherited environment
  env: z.record(z.string(), z.string()).optional(),
  timeoutMs: z.number().int().positive().optional(),
}).strict();

export const mdfmtConfigSchema = z.object({
  maxWidth: z.number().int().positive().default(80),
  listNumbering: z.enum(["increment", "repeat-start"]).default("increment"),
  hardBreaks: z.enum(["preserve", "collapse"]).default("preserve"),
  formatters: z.array(formatterRegistrationSchema).default([]),
}).strict();

export type FormatterRegistration = z.infer<typeof formatterRegistrationSchema>;
export type MdfmtConfig = z.infer<typeof mdfmtConfigSchema>;
export type MdfmtConfigInput = z.input<typeof mdfmtConfigSchema>;

/** Validate an already-parsed configuration value. */
export function parseConfig(raw: unknown, source?: string): MdfmtConfig {
  const parsed = mdfmtConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `invalid configuration${source ? ` in ${source}` : ""}:\n${
        z.prettifyError(parsed.error)
      }`,
      source,
    );
  }
  return parsed.data;
}

/**
 * Read and validate a JSON5 configuration file. With `optional`, a missing
 * file yields the defaults instead of an error.
 */
export async function loadConfig(
  path: string,
  init?: { optional?: boolean },
): Promise<MdfmtConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (init?.optional && isNotFound(err)) return parseConfig({});
    throw new ConfigError(`unable to read ${path}: ${messageOf(err)}`, path);
  }

  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (err) {
    throw new ConfigError(`unable to parse ${path}: ${messageOf(err)}`, path);
  }
  return parseConfig(raw, path);
}

/**
 * Renderer options for a configuration. Formatters register in file order, so
 * a later entry wins for a language listed twice.
 */
export function resolveRendererOptions(
  config: MdfmtConfig,
  init?: { cwd?: string; logger?: Logger },
): RendererOptions {
  const codeFormatters = new CodeFormatterRegistry();
  for (const f of config.formatters) {
    codeFormatters.register(
      f.languages,
      new SpawnedCodeFormatter(f.command, f.args, {
        cwd: init?.cwd,
        timeoutMs: f.timeoutMs,
        env: f.env,
      }),
    );
  }
  return {
    maxWidth: config.maxWidth,
    listNumbering: config.listNumbering,
    hardBreaks: config.hardBreaks,
    codeFormatters,
    logger: init?.logger,
  };
}

function isNotFound(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function messageOf(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

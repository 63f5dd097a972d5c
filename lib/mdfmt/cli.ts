import { Console } from "node:console";
import { readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { Readable, Writable } from "node:stream";
import { text } from "node:stream/consumers";
import chalk from "chalk";
import { Command, CommanderError, Option } from "commander";
import { z } from "zod";
import { loadConfig, parseConfig, resolveRendererOptions } from "./config.ts";
import { ConfigError } from "./errors.ts";
import { formatMarkdown, renderMarkdown } from "./mod.ts";
import type { Logger } from "./render.ts";
import { StreamSink } from "./writer.ts";

export const defaultConfigFile = ".mdfmt.json5";

export interface CliIO {
  readonly stdin: Readable;
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly cwd: string;
}

const cliOptionsSchema = z.object({
  width: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  listNumbering: z.enum(["increment", "repeat-start"]).optional(),
  hardBreaks: z.enum(["preserve", "collapse"]).optional(),
  write: z.boolean().default(false),
  check: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export class CLI {
  constructor(
    readonly io: CliIO = {
      stdin: process.stdin,
      stdout: process.stdout,
      stderr: process.stderr,
      cwd: process.cwd(),
    },
  ) {}

  /** Format one file (or stdin); resolves to the process exit code. */
  async format(file: string | undefined, opts: CliOptions): Promise<number> {
    if (opts.write && opts.check) {
      throw new ConfigError("--write and --check are mutually exclusive");
    }
    if (opts.write && !file) {
      throw new ConfigError("--write needs a file to rewrite");
    }

    const logger = this.logger(opts.verbose);
    const configPath = resolve(this.io.cwd, opts.config ?? defaultConfigFile);
    const loaded = await loadConfig(configPath, {
      optional: opts.config === undefined,
    });
    const config = parseConfig({
      ...loaded,
      maxWidth: opts.width ?? loaded.maxWidth,
      listNumbering: opts.listNumbering ?? loaded.listNumbering,
      hardBreaks: opts.hardBreaks ?? loaded.hardBreaks,
    });
    logger.debug?.("configuration", config);

    const path = file ? resolve(this.io.cwd, file) : undefined;
    const options = resolveRendererOptions(config, {
      cwd: path ? dirname(path) : this.io.cwd,
      logger,
    });
    const source = path ? await readFile(path, "utf8") : await text(this.io.stdin);

    if (opts.check) {
      if (await formatMarkdown(source, options) === source) return 0;
      this.io.stderr.write(chalk.yellow(`${file ?? "<stdin>"} is not formatted`) + "\n");
      return 1;
    }

    if (opts.write && path) {
      // fully rendered before touching the file
      const formatted = await formatMarkdown(source, options);
      if (formatted !== source) {
        await writeFile(path, formatted);
        logger.info?.(`formatted ${file}`);
      }
      return 0;
    }

    await renderMarkdown(source, new StreamSink(this.io.stdout), options);
    return 0;
  }

  command(onExit: (code: number) => void) {
    return new Command()
      .name("mdfmt")
      .version("0.1.0")
      .description("Rewrite Markdown in a canonical, re-wrapped style.")
      .argument("[file]", "Markdown file to format (default: stdin)")
      .option("-w, --width <n>", "maximum line width")
      .option(
        "-c, --config <file>",
        `JSON5 configuration file (default: ${defaultConfigFile} when present)`,
      )
      .addOption(
        new Option("--list-numbering <mode>", "ordered list numbering")
          .choices(["increment", "repeat-start"]),
      )
      .addOption(
        new Option("--hard-breaks <mode>", "hard line breaks in paragraphs")
          .choices(["preserve", "collapse"]),
      )
      .option("--write", "rewrite the file in place")
      .option("--check", "exit 1 when the file is not already formatted")
      .option("--verbose", "debug logging to stderr")
      .exitOverride()
      .configureOutput({
        writeOut: (s) => this.io.stdout.write(s),
        writeErr: (s) => this.io.stderr.write(s),
      })
      .action(async (file: string | undefined, raw: unknown) => {
        const opts = cliOptionsSchema.safeParse(raw);
        if (!opts.success) {
          throw new ConfigError(z.prettifyError(opts.error));
        }
        onExit(await this.format(file, opts.data));
      });
  }

  /** Parse `argv` (without the node and script entries) and run. */
  async run(argv: readonly string[]): Promise<number> {
    let exitCode = 0;
    const program = this.command((code) => {
      exitCode = code;
    });
    try {
      await program.parseAsync([...argv], { from: "user" });
    } catch (err) {
      // usage errors were already printed by commander
      if (err instanceof CommanderError) return err.exitCode;
      this.report(err);
      return 1;
    }
    return exitCode;
  }

  report(err: unknown) {
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    this.io.stderr.write(chalk.red(message) + "\n");
  }

  logger(verbose: boolean): Logger {
    const log = new Console({ stdout: this.io.stderr, stderr: this.io.stderr });
    return {
      debug: verbose ? log.debug.bind(log) : undefined,
      info: verbose ? log.info.bind(log) : undefined,
      warn: log.warn.bind(log),
      error: log.error.bind(log),
    };
  }
}

/**
 * Pluggable formatting for fenced code blocks.
 *
 * A {@link CodeFormatter} turns code into its formatted equivalent or fails
 * with a {@link FormatError}. The {@link CodeFormatterRegistry} maps language
 * tags (case-sensitive, e.g. `go` and `golang`) to formatters; a later
 * registration for a tag replaces the earlier one. Fenced blocks whose tag has
 * no formatter are written verbatim by the renderer.
 *
 * @example
 * ```ts
 * const registry = new CodeFormatterRegistry()
 *   .register(["go", "golang"], new SpawnedCodeFormatter("gofmt"));
 * await registry.lookup("go")?.format("package main\nfunc main(){}\n");
 * ```
 */

import { Spawnable, type SpawnRunResult } from "../universal/spawnable.ts";
import { FormatError } from "./errors.ts";

export type MaybePromise<T> = T | Promise<T>;

export interface CodeFormatter {
  /** Formatted equivalent of `code`; throws {@link FormatError} on failure. */
  format(code: string): MaybePromise<string>;
}

export class CodeFormatterRegistry {
  readonly #byTag = new Map<string, CodeFormatter>();

  register(languageTags: Iterable<string>, formatter: CodeFormatter): this {
    for (const tag of languageTags) this.#byTag.set(tag, formatter);
    return this;
  }

  lookup(tag: string): CodeFormatter | undefined {
    return this.#byTag.get(tag);
  }

  get tags(): string[] {
    return [...this.#byTag.keys()];
  }
}

/**
 * Pipes code through an external executable: the code goes to stdin, the
 * formatted code is read from stdout. A spawn failure or a non-zero exit is a
 * {@link FormatError} carrying the command line, exit code and stderr.
 */
export class SpawnedCodeFormatter implements CodeFormatter {
  readonly #spawnable: Spawnable;

  constructor(
    readonly command: string,
    readonly args: readonly string[] = [],
    init?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> },
  ) {
    let s = Spawnable.from(command).withArgs([...args]);
    if (init?.cwd) s = s.withCwd(init.cwd);
    if (init?.env) s = s.withEnv(init.env, { inherit: true });
    if (init?.timeoutMs) s = s.withTimeout(init.timeoutMs);
    this.#spawnable = s;
  }

  async format(code: string): Promise<string> {
    const commandLine = [this.command, ...this.args];
    let result: SpawnRunResult;
    try {
      result = await this.#spawnable.withStdin(code).run();
    } catch (err) {
      throw new FormatError(
        `unable to run ${this.command}: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { command: commandLine },
        { cause: err },
      );
    }
    if (!result.success) {
      const stderr = result.stderr();
      throw new FormatError(
        `${this.command} exited with code ${result.code}${
          stderr.trim() ? `: ${stderr.trim()}` : ""
        }`,
        { command: commandLine, exitCode: result.code, stderr },
      );
    }
    return result.stdout();
  }
}

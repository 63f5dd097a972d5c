// Node.js 20+ — small, self-contained builder around child_process.spawn
// Explicit args only; stdin may be text, bytes or (async) iterables of either.

import { spawn } from "node:child_process";

export type SpawnStdin =
    | Uint8Array
    | string
    | Iterable<string | Uint8Array>
    | AsyncIterable<string | Uint8Array>;

export type SpawnDefaults = {
    args?: string[];
    env?: Record<string, string>;
    cwd?: string;
    stdin?: SpawnStdin;
    timeoutMs?: number;
};

export type SpawnRunResult = Awaited<ReturnType<Spawnable["run"]>>;

export class Spawnable {
    private constructor(
        private readonly cmd: string,
        private readonly defaults: SpawnDefaults = {},
    ) {}

    static from(cmd: string) {
        return new Spawnable(cmd, {});
    }

    withArgs(args: string[]) {
        return new Spawnable(this.cmd, { ...this.defaults, args });
    }

    withEnv<T extends Record<string, string>>(
        env: T,
        opts?: { inherit?: boolean },
    ) {
        const inherited: Record<string, string> = {};
        if (opts?.inherit) {
            for (const [k, v] of Object.entries(process.env)) {
                if (v !== undefined) inherited[k] = v;
            }
        }
        const base = opts?.inherit
            ? { ...inherited, ...this.defaults.env }
            : (this.defaults.env ?? {});
        return new Spawnable(this.cmd, {
            ...this.defaults,
            env: { ...base, ...env },
        });
    }

    withCwd(cwd: string) {
        return new Spawnable(this.cmd, { ...this.defaults, cwd });
    }
    withTimeout(ms: number) {
        return new Spawnable(this.cmd, {
            ...this.defaults,
            timeoutMs: ms,
        });
    }
    withStdin(stdin: SpawnStdin) {
        return new Spawnable(this.cmd, { ...this.defaults, stdin });
    }

    async run() {
        const cfg = this.defaults;
        const args = cfg.args ?? [];

        const child = spawn(this.cmd, args, {
            env: cfg.env,
            cwd: cfg.cwd,
            stdio: "pipe",
            timeout: cfg.timeoutMs,
        });

        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];
        child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

        const exited = new Promise<number>((resolve, reject) => {
            child.once("error", reject);
            child.once("close", (code, signal) => {
                resolve(code ?? (signal ? 128 : 1));
            });
        });

        const w = child.stdin;
        let stdinError: Error | undefined;
        // a child may exit before draining stdin (EPIPE); report it only on success
        w.on("error", (err) => {
            stdinError = err;
        });
        const source = cfg.stdin;
        if (source !== undefined) {
            const write = (chunk: string | Uint8Array) =>
                new Promise<void>((resolve) => {
                    w.write(chunk, () => resolve());
                });
            try {
                if (source instanceof Uint8Array || typeof source === "string") {
                    await write(source);
                } else if (Symbol.asyncIterator in source) {
                    for await (const chunk of source) await write(chunk);
                } else {
                    for (const chunk of source) await write(chunk);
                }
            } finally {
                w.end();
            }
        } else {
            w.end();
        }

        const code = await exited;
        if (code === 0 && stdinError) throw stdinError;
        const stdoutRaw = new Uint8Array(Buffer.concat(stdoutChunks));
        const stderrRaw = new Uint8Array(Buffer.concat(stderrChunks));

        return {
            command: [this.cmd, ...args] as const,
            code,
            success: code === 0,
            stdoutRaw,
            stderrRaw,
            stdout: () => Spawnable.#td.decode(stdoutRaw),
            stderr: () => Spawnable.#td.decode(stderrRaw),
        } as const;
    }

    static #td = new TextDecoder();
}

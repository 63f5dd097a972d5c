#!/usr/bin/env -S npx tsx

// Format Markdown files (or stdin) in the canonical mdfmt style.

import { CLI } from "../lib/mdfmt/cli.ts";

process.exitCode = await new CLI().run(process.argv.slice(2));

/**
 * Trial matcher CLI.
 * Usage:
 *   npm run matcher -- search <condition> [--limit N]
 *   npm run matcher -- match <patient.json> <condition> [--limit N] [--min-score X]
 *   npm run matcher -- match-one <patient.json> <nctId>
 */
import "dotenv/config";
import { readFile } from "node:fs/promises";
import { MatchingError, ValidationError } from "@trialmatch/match-ai";
import { loadConfig } from "./config.js";
import { createMatcherRuntime, type MatcherRuntime } from "./runtime.js";

const USAGE = `Usage:
  matcher search <condition> [--limit N]
  matcher match <patient.json> <condition> [--limit N] [--min-score X]
  matcher match-one <patient.json> <nctId>`;

interface ParsedArgs {
  command: string | undefined;
  positional: string[];
  flags: Map<string, string>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const value = argv[i + 1];
      if (value === undefined) throw new ValidationError([`${arg}: missing value`]);
      flags.set(arg.slice(2), value);
      i++;
    } else {
      positional.push(arg);
    }
  }
  return { command: positional.shift(), positional, flags };
}

function numberFlag(flags: Map<string, string>, name: string): number | undefined {
  const raw = flags.get(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ValidationError([`--${name}: "${raw}" is not a number`]);
  return value;
}

async function readPatient(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError([`${path}: not valid JSON (${err instanceof Error ? err.message : String(err)})`]);
  }
}

async function run(runtime: MatcherRuntime, args: ParsedArgs): Promise<unknown> {
  const [first, second] = args.positional;
  switch (args.command) {
    case "search":
      if (!first) break;
      return runtime.matcher.search(first, numberFlag(args.flags, "limit"));
    case "match":
      if (!first || !second) break;
      return runtime.matcher.match(await readPatient(first), second, {
        maxTrials: numberFlag(args.flags, "limit"),
        minScore: numberFlag(args.flags, "min-score"),
      });
    case "match-one":
      if (!first || !second) break;
      return runtime.matcher.matchOne(await readPatient(first), second);
  }
  throw new ValidationError([`unknown command or missing arguments\n${USAGE}`]);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.command) {
    console.error(USAGE);
    process.exit(1);
  }

  const runtime = createMatcherRuntime(loadConfig());
  try {
    const removed = await runtime.cache.invalidateExpired();
    if (removed > 0) console.log(`[cache] Removed ${removed} expired entries`);
    const output = await run(runtime, args);
    console.log(JSON.stringify(output, null, 2));
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  if (err instanceof MatchingError) console.error(`${err.name} (${err.code}): ${err.message}`);
  else console.error(err);
  process.exit(1);
});

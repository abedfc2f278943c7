#!/usr/bin/env node
import { performance } from "node:perf_hooks";
import { realpathSync } from "node:fs";
import * as readline from "node:readline";
import { pathToFileURL } from "node:url";

import { FuzzyIndexError, collectMatches, createIndex, parseIndexKind, type IndexKind } from "./core/impl/index.js";

const USAGE = "usage: fuzzy-dictionary <query> <k> [trie|fbtrie]";

export interface CliIo {
  stdin: NodeJS.ReadableStream;
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

/** Reads the dictionary from stdin, runs one query and returns the exit status. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const err = (line: string): void => {
    io.stderr.write(line + "\n");
  };

  if (argv.length < 2 || argv.length > 3) {
    err(USAGE);
    return 1;
  }

  const [query, rawK] = argv;
  const rawKind = argv.length === 3 ? argv[2] : undefined;
  const k = /^\d+$/.test(rawK) ? Number(rawK) : NaN;
  if (!Number.isSafeInteger(k)) {
    err(`k must be a non-negative integer, got '${rawK}'`);
    err(USAGE);
    return 1;
  }

  let kind: IndexKind = "trie";
  if (rawKind !== undefined) {
    const parsed = parseIndexKind(rawKind);
    if (parsed) kind = parsed;
    else err(`Unknown index kind '${rawKind}', using 'trie'`);
  }

  const index = createIndex(kind);

  err("Reading from stdin...");
  const lines = readline.createInterface({ input: io.stdin, crlfDelay: Infinity });
  let lineNo = 0;
  for await (const line of lines) {
    lineNo++;
    const word = line.trim();
    if (!word) continue;
    try {
      index.insert(word);
    } catch (e) {
      if (!(e instanceof FuzzyIndexError)) throw e;
      err(`line ${lineNo}: ${e.message}, skipped`);
    }
  }

  err(`Processing query ${query} ${k}`);

  const start = performance.now();
  const { matches } = collectMatches(index.fuzzy(query, k));
  const elapsed = performance.now() - start;

  for (const m of matches) io.stdout.write(`${m.distance} ${m.word}\n`);

  err(`RESULT: ${query}~${k}: [${matches.length} found] in ${elapsed.toFixed(4)}ms using [${index.constructor.name}]`);
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

import { readFile } from "node:fs/promises";

import { loadConfig } from "./config.js";
import { FuzzyIndexError } from "./core/impl/index.js";
import { createDictionary } from "./http/dictionary.js";
import { startServer } from "./http/server.js";

const config = loadConfig();
const dictionary = createDictionary(config.indexKind);

if (config.dictionaryPath) {
  const text = await readFile(config.dictionaryPath, "utf8");
  let skipped = 0;
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim();
    if (!word) continue;
    try {
      dictionary.insert(word);
    } catch (e) {
      if (!(e instanceof FuzzyIndexError)) throw e;
      skipped++;
      console.warn(`skipping dictionary entry: ${e.message}`);
    }
  }
  console.log(`loaded ${dictionary.size()} words from ${config.dictionaryPath} (${skipped} skipped)`);
}

const { server, port } = await startServer({ port: config.port, maxDistance: config.maxDistance, dictionary });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port} (${config.indexKind})`);

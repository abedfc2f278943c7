import { parseIndexKind, type IndexKind } from "./core/impl/index.js";

export interface Config {
  port: number;
  indexKind: IndexKind;
  /** largest maxDistance a search request may ask for */
  maxDistance: number;
  dictionaryPath?: string;
}

export const DEFAULT_CONFIG: Readonly<Config> = {
  port: 3000,
  indexKind: "fbtrie",
  maxDistance: 3,
};

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  let indexKind = DEFAULT_CONFIG.indexKind;
  if (env.INDEX_KIND) {
    const parsed = parseIndexKind(env.INDEX_KIND);
    if (parsed) {
      indexKind = parsed;
    } else {
      console.warn(`Unknown INDEX_KIND '${env.INDEX_KIND}', using 'trie'`);
      indexKind = "trie";
    }
  }

  return {
    port: intFromEnv(env, "PORT", DEFAULT_CONFIG.port, 0, 65535),
    indexKind,
    maxDistance: intFromEnv(env, "MAX_DISTANCE", DEFAULT_CONFIG.maxDistance, 0, 16),
    dictionaryPath: env.DICTIONARY_PATH || undefined,
  };
}

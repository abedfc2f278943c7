import http from "node:http";
import { randomUUID } from "node:crypto";

import { FuzzyIndexError } from "../core/impl/index.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError } from "./problem.js";
import { asInt, asOneOf, asString, isRecord, pushErr } from "./validation.js";
import { createDictionary, type Dictionary, type SearchMode } from "./dictionary.js";

const SERVICE = "fuzzy-dictionary";
const VERSION = "0.1.0";

const MAX_WORD_LENGTH = 256;
const MAX_WORDS_PER_REQUEST = 10000;
const SEARCH_MODES: readonly SearchMode[] = ["word", "prefix"];

export interface ServerOptions {
  port?: number;
  /** largest maxDistance accepted by POST /search */
  maxDistance?: number;
  dictionary?: Dictionary;
}

class BadJsonError extends Error {}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const dictionary = opts.dictionary ?? createDictionary("fbtrie");
  const maxDistance = opts.maxDistance ?? 3;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const invalid = (detail: string, errors?: FieldError[]) =>
      sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail, instance: url.pathname, requestId, errors }));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          index: dictionary.kind,
          words: dictionary.size(),
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "POST" && url.pathname === "/words") {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }
        const body = await readJson(req);
        if (!isRecord(body)) return invalid("body must be an object");

        const errors: FieldError[] = [];
        const wordsVal = body.words;
        if (!Array.isArray(wordsVal)) pushErr(errors, "$.words", "must be an array");
        else if (wordsVal.length < 1) pushErr(errors, "$.words", "must contain at least 1 item");
        else if (wordsVal.length > MAX_WORDS_PER_REQUEST) pushErr(errors, "$.words", `must contain at most ${MAX_WORDS_PER_REQUEST} items`);
        if (errors.length || !Array.isArray(wordsVal)) return invalid("invalid request", errors);

        let inserted = 0;
        let duplicates = 0;
        const failures: Array<{ index: number; code: string; message: string }> = [];

        wordsVal.forEach((w: unknown, index) => {
          const word = asString(w);
          if (!word) {
            failures.push({ index, code: "INVALID_ARGUMENT", message: "word must be a non-empty string" });
            return;
          }
          if (word.length > MAX_WORD_LENGTH) {
            failures.push({ index, code: "INVALID_ARGUMENT", message: "word too long" });
            return;
          }
          try {
            if (dictionary.insert(word)) inserted++;
            else duplicates++;
          } catch (e) {
            if (!(e instanceof FuzzyIndexError)) throw e;
            failures.push({ index, code: e.code, message: e.message });
          }
        });

        const failed = failures.length;
        return sendJson(res, failed > 0 ? 207 : 200, { inserted, duplicates, failed, failures });
      }

      if (req.method === "POST" && url.pathname === "/search") {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!isRecord(body)) return invalid("body must be an object");

        const errors: FieldError[] = [];
        const query = asString(body.query);
        if (query === undefined) pushErr(errors, "$.query", "must be a string");
        else if (query.length > MAX_WORD_LENGTH) pushErr(errors, "$.query", "too long");

        const k = asInt(body.maxDistance);
        if (k === undefined || k < 0 || k > maxDistance) pushErr(errors, "$.maxDistance", `must be an integer between 0 and ${maxDistance}`);

        const limit = body.limit === undefined ? 50 : asInt(body.limit);
        if (limit === undefined || limit < 1 || limit > 1000) pushErr(errors, "$.limit", "must be between 1 and 1000");

        const mode = body.mode === undefined ? "word" : asOneOf(body.mode, SEARCH_MODES);
        if (mode === undefined) pushErr(errors, "$.mode", `must be one of: ${SEARCH_MODES.join(", ")}`);

        if (query === undefined || k === undefined || limit === undefined || mode === undefined || errors.length) {
          return invalid("invalid request", errors);
        }

        const r = dictionary.search({ query, maxDistance: k, limit, mode });
        return sendJson(res, 200, { results: r.results, total: r.total, tookMs: Date.now() - started });
      }

      return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof BadJsonError) return invalid(e.message);
      console.error(`[${requestId}] ${req.method} ${url.pathname} failed`, e);
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return ct.split(";")[0].trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadJsonError("body must be valid JSON");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}

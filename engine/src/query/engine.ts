/**
 * Query Engine
 *
 * Drives schema -> prompt -> transport -> parser for one record or a batch.
 * Public methods never reject: transport failures, parse failures and
 * cardinality mismatches all come back as error results in the slot of the
 * record they belong to.
 *
 * Chunks run one after another; a failed chunk is not retried.
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { errorResult, isErrorResult } from "../types.js";
import { PromptBuilder } from "../prompt/builder.js";
import { ResponseParser } from "../parser/response-parser.js";
import { failChunk, reconcile } from "./reconcile.js";
import type { ILogger } from "@rowfill/shared/logging";
import type { ChatTransport } from "../llm/types.js";
import type { FieldValues, InputRecord, QueryResult, Schema } from "../types.js";

const log = createComponentLogger("query");

export const DEFAULT_BATCH_SIZE = 15;

export const NO_TRANSPORT = "No model backend configured";
export const EMPTY_RESPONSE = "Model returned an empty response";

/** The part of the MCP orchestrator the engine uses. */
export interface PromptEnhancer {
  isEnabled(): boolean;
  enhancePrompt(prompt: string, input?: InputRecord): Promise<string>;
}

export interface BatchProgress {
  /** Records finished so far, failed ones included */
  completed: number;
  total: number;
  chunkIndex: number;
  chunkCount: number;
  /** Error results in the chunk just finished */
  chunkErrors: number;
}

export interface QueryEngineOptions {
  schema: Schema;
  /** null when no backend is configured; every query then yields errors */
  transport: ChatTransport | null;
  enhancer?: PromptEnhancer | null;
  builder?: PromptBuilder;
  parser?: ResponseParser;
  batchSize?: number;
  /** Stream model answers (default: false) */
  stream?: boolean;
  onProgress?: (progress: BatchProgress) => void;
}

/**
 * Usable chunk size: Infinity means one chunk for every record, fractions
 * round down, and anything else that is not a positive number falls back.
 */
export function normalizeBatchSize(requested: number, fallback: number, total: number): number {
  if (requested === Number.POSITIVE_INFINITY) return Math.max(1, total);
  const size = Math.floor(requested);
  return Number.isFinite(size) && size >= 1 ? size : fallback;
}

/** Prefix a caller-supplied context block. */
export function withContext(prompt: string, context?: string): string {
  return context ? `📝 Context information\n${context}\n\n${prompt}` : prompt;
}

export class QueryEngine {
  private readonly schema: Schema;
  private readonly transport: ChatTransport | null;
  private readonly enhancer: PromptEnhancer | null;
  private readonly builder: PromptBuilder;
  private readonly parser: ResponseParser;
  private readonly batchSize: number;
  private readonly stream: boolean;
  private readonly onProgress?: (progress: BatchProgress) => void;

  constructor(options: QueryEngineOptions) {
    this.schema = Object.freeze({ ...options.schema });
    this.transport = options.transport;
    this.enhancer = options.enhancer ?? null;
    this.builder = options.builder ?? new PromptBuilder();
    this.parser = options.parser ?? new ResponseParser();
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.stream = options.stream ?? false;
    this.onProgress = options.onProgress;
  }

  /** Query one record. Resolves an error result instead of rejecting. */
  async querySingle(record: InputRecord, context?: string): Promise<QueryResult> {
    if (!this.transport) {
      return errorResult(NO_TRANSPORT);
    }

    try {
      let prompt = withContext(this.builder.render(this.schema, record, "single"), context);
      if (this.enhancer?.isEnabled()) {
        prompt = await this.enhancer.enhancePrompt(prompt, record);
      }

      const response = await this.transport.complete(prompt, { stream: this.stream });
      if (response === null || response === "") {
        return errorResult(EMPTY_RESPONSE);
      }
      return typeof response === "string" ? this.parser.parse(response) : response;
    } catch (err) {
      log.error("Single query failed", err, { schema: this.schema.name });
      return errorResult(errorMessage(err));
    }
  }

  /**
   * Query records in consecutive chunks of at most `batchSize`. The result
   * has exactly one entry per record, in input order.
   */
  async queryBatch(records: InputRecord[], context?: string, batchSize: number = this.batchSize): Promise<QueryResult[]> {
    const fallback = normalizeBatchSize(this.batchSize, DEFAULT_BATCH_SIZE, records.length);
    const size = normalizeBatchSize(batchSize, fallback, records.length);
    const correlationId = nanoid(10);
    const runLog = log.child({ correlationId, schema: this.schema.name });

    if (!this.transport) {
      runLog.warn("No transport configured, failing every record", { records: records.length });
      return failChunk(records.length, NO_TRANSPORT);
    }

    const chunkCount = Math.ceil(records.length / size);
    runLog.info("Batch started", { records: records.length, batchSize: size, chunks: chunkCount });

    const results: QueryResult[] = [];
    for (let chunkIndex = 0; chunkIndex < chunkCount; chunkIndex++) {
      const chunk = records.slice(chunkIndex * size, (chunkIndex + 1) * size);
      const chunkResults = await this.runChunk(this.transport, chunk, chunkIndex, context, runLog);
      results.push(...chunkResults);

      this.reportProgress({
        completed: results.length,
        total: records.length,
        chunkIndex,
        chunkCount,
        chunkErrors: chunkResults.filter(isErrorResult).length,
      });
    }

    runLog.info("Batch finished", {
      records: records.length,
      errors: results.filter(isErrorResult).length,
    });
    return results;
  }

  private async runChunk(
    transport: ChatTransport,
    chunk: InputRecord[],
    chunkIndex: number,
    context: string | undefined,
    runLog: ILogger,
  ): Promise<QueryResult[]> {
    try {
      const prompt = withContext(this.builder.render(this.schema, chunk, "batch"), context);
      const response = await transport.complete(prompt, { stream: this.stream });

      if (response === null || response === "") {
        runLog.warn("Empty response for chunk", { chunkIndex, size: chunk.length });
        return failChunk(chunk.length, EMPTY_RESPONSE);
      }

      const parsed = typeof response === "string"
        ? this.parser.parseArray(response, chunk.length)
        : [response satisfies FieldValues];

      const { results, delta } = reconcile(parsed, chunk.length);
      if (delta !== 0) {
        runLog.warn("Result count mismatch reconciled", {
          chunkIndex,
          expected: chunk.length,
          received: parsed.length,
          action: delta > 0 ? "padded" : "truncated",
        });
      }
      return results;
    } catch (err) {
      runLog.error("Chunk failed", err, { chunkIndex, size: chunk.length });
      return failChunk(chunk.length, errorMessage(err));
    }
  }

  private reportProgress(progress: BatchProgress): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(progress);
    } catch (err) {
      log.warn("Progress callback threw", { error: errorMessage(err) });
    }
  }
}

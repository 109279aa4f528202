import { createHash } from "node:crypto";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { toBoundaryError } from "../http/boundaryErrors";
import { HttpJsonClient } from "../http/httpJsonClient";
import { buildCacheKey } from "../resilience/cacheKey";
import type { ResilientOperation } from "../resilience/resilientOperation";

type OllamaEmbedResponse = {
  embeddings?: number[][];
};

/**
 * Turns insight text and queries into vectors for the insight store.
 */
export class OllamaEmbedding implements EmbeddingPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly expectedDimension: number,
    private readonly operation: ResilientOperation<number[][]>,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  /**
   * Returns embeddings only when transport and vector shape are valid.
   */
  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    // Vectors depend on exact text, so the key hashes the raw batch instead of normalizing it.
    const cacheKey = buildCacheKey("ollama-embed", {
      model: this.model,
      input: createHash("sha256").update(JSON.stringify(texts)).digest("hex"),
    });

    return this.operation.run(() => this.requestEmbeddings(texts), {
      cacheKey,
    });
  }

  private async requestEmbeddings(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    const response = await this.httpClient.requestJson<OllamaEmbedResponse>({
      url: new URL("/api/embed", this.baseUrl).toString(),
      method: "POST",
      headers: { "content-type": "application/json" },
      body: { model: this.model, input: texts },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toBoundaryError("embedding", "ollama", response.error));
    }

    const vectors = response.value.embeddings ?? [];

    if (vectors.length !== texts.length) {
      return err({
        source: "embedding",
        code: "malformed_response",
        provider: "ollama",
        message: `Ollama embedding response size mismatch. Expected ${texts.length}, got ${vectors.length}.`,
        retryable: false,
      });
    }

    const normalizedVectors: number[][] = [];
    for (let index = 0; index < vectors.length; index += 1) {
      const vector = vectors[index];
      if (!vector) {
        return err({
          source: "embedding",
          code: "malformed_response",
          provider: "ollama",
          message: `Ollama embedding vector at index ${index} was missing.`,
          retryable: false,
        });
      }

      const shapeResult = this.assertVectorShape(vector, index);
      if (shapeResult.isErr()) {
        return err(shapeResult.error);
      }
      normalizedVectors.push(shapeResult.value);
    }

    return ok(normalizedVectors);
  }

  private assertVectorShape(
    vector: number[],
    index: number,
  ): Result<number[], AppBoundaryError> {
    if (vector.length !== this.expectedDimension) {
      return err({
        source: "embedding",
        code: "dimension_mismatch",
        provider: "ollama",
        message: `Embedding dimension mismatch for index ${index}. Expected ${this.expectedDimension}, got ${vector.length}.`,
        retryable: false,
      });
    }

    if (vector.some((value) => !Number.isFinite(value))) {
      return err({
        source: "embedding",
        code: "validation_error",
        provider: "ollama",
        message: `Embedding vector contains non-finite values at index ${index}.`,
        retryable: false,
      });
    }

    return ok(vector);
  }
}

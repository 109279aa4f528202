import { err, ok, ResultAsync, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { InsightEntity } from "../../core/entities/insight";
import type {
  InsightInput,
  InsightLibraryPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  EmbeddingPort,
  IdGeneratorPort,
  InsightRepositoryPort,
} from "../../core/ports/outboundPorts";
import { describeFailure } from "../../shared/errors/errorDetails";

export const DEFAULT_INSIGHT_SOURCE = "self-help-library";

const storageError = (error: unknown): AppBoundaryError => ({
  source: "insights",
  code: "storage_error",
  provider: "pgvector",
  message: describeFailure(error),
  retryable: false,
  cause: error,
});

/**
 * Embeds book learnings for storage and retrieves the closest ones as prompt context.
 */
export class InsightLibraryService implements InsightLibraryPort {
  constructor(
    private readonly embeddingPort: EmbeddingPort,
    private readonly insightRepo: InsightRepositoryPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  async addInsights(
    insights: InsightInput[],
  ): Promise<Result<number, AppBoundaryError>> {
    const entries = insights
      .map((insight) => ({
        content: insight.content.trim(),
        source: insight.source?.trim() || DEFAULT_INSIGHT_SOURCE,
      }))
      .filter((insight) => insight.content.length > 0);

    if (entries.length === 0) {
      return ok(0);
    }

    const vectors = await this.embeddingPort.embedTexts(
      entries.map((entry) => entry.content),
    );
    if (vectors.isErr()) {
      return err(vectors.error);
    }

    const createdAt = this.clock.now();
    const rows: Array<InsightEntity & { embedding: number[] }> = [];
    entries.forEach((entry, index) => {
      const embedding = vectors.value[index];
      if (embedding) {
        rows.push({ id: this.ids.next(), ...entry, createdAt, embedding });
      }
    });

    return ResultAsync.fromPromise(
      this.insightRepo.upsertMany(rows),
      storageError,
    ).map(() => rows.length);
  }

  /**
   * Resolves to an empty string when nothing relevant is stored.
   */
  async retrieveContext(
    query: string,
    limit: number,
  ): Promise<Result<string, AppBoundaryError>> {
    const trimmed = query.trim();
    if (!trimmed) {
      return ok("");
    }

    const vectors = await this.embeddingPort.embedTexts([trimmed]);
    if (vectors.isErr()) {
      return err(vectors.error);
    }

    const queryVector = vectors.value[0];
    if (!queryVector) {
      return ok("");
    }

    return ResultAsync.fromPromise(
      this.insightRepo.searchSimilar(queryVector, limit),
      storageError,
    ).map((matches) =>
      matches.length === 0
        ? ""
        : [
            "Self-Help Book Learnings:",
            ...matches.map((match) => `- ${match.content}`),
          ].join("\n"),
    );
  }
}

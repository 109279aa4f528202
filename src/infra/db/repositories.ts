import { desc, eq } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type postgres from "postgres";
import {
  adviceCategories,
  type AdviceCategory,
} from "../../core/entities/advice";
import type { ConversationTurnEntity } from "../../core/entities/conversation";
import type { InsightEntity, InsightMatch } from "../../core/entities/insight";
import type {
  ConversationHistoryPort,
  InsightRepositoryPort,
} from "../../core/ports/outboundPorts";
import { conversationTurnsTable } from "./schema";

const toVectorLiteral = (embedding: number[]): string =>
  `[${embedding.join(",")}]`;

const isAdviceCategory = (value: string): value is AdviceCategory =>
  adviceCategories.some((category) => category === value);

/**
 * Bridges pgvector operations behind a port so the insight store remains replaceable.
 */
export class PgVectorInsightRepositoryService implements InsightRepositoryPort {
  constructor(private readonly sqlClient: postgres.Sql<{}>) {}

  async upsertMany(
    insights: Array<InsightEntity & { embedding: number[] }>,
  ): Promise<void> {
    for (const insight of insights) {
      await this.sqlClient`
        INSERT INTO insights (id, content, source, embedding, created_at)
        VALUES (${insight.id}, ${insight.content}, ${insight.source}, ${toVectorLiteral(insight.embedding)}::vector, ${insight.createdAt})
        ON CONFLICT (id)
        DO UPDATE SET
          content = EXCLUDED.content,
          source = EXCLUDED.source,
          embedding = EXCLUDED.embedding;
      `;
    }
  }

  /**
   * Ranks stored insights by cosine distance to the query vector.
   */
  async searchSimilar(
    embedding: number[],
    limit: number,
  ): Promise<InsightMatch[]> {
    const rows = await this.sqlClient<
      Array<{ id: string; content: string; source: string; distance: number }>
    >`
      SELECT id, content, source, embedding <=> ${toVectorLiteral(embedding)}::vector AS distance
      FROM insights
      ORDER BY distance ASC
      LIMIT ${limit};
    `;

    return rows.map((row) => ({
      id: row.id,
      content: row.content,
      source: row.source,
      distance: Number(row.distance),
    }));
  }
}

/**
 * Keeps each session's turns as an append-only log.
 */
export class PostgresConversationHistoryRepositoryService
  implements ConversationHistoryPort
{
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async append(turn: ConversationTurnEntity): Promise<void> {
    await this.db.insert(conversationTurnsTable).values(turn);
  }

  /**
   * Returns the latest turns in chronological order.
   */
  async listRecent(
    sessionId: string,
    limit: number,
  ): Promise<ConversationTurnEntity[]> {
    const rows = await this.db
      .select()
      .from(conversationTurnsTable)
      .where(eq(conversationTurnsTable.sessionId, sessionId))
      .orderBy(desc(conversationTurnsTable.createdAt))
      .limit(limit);

    return rows
      .flatMap((row) =>
        isAdviceCategory(row.category)
          ? [{ ...row, category: row.category }]
          : [],
      )
      .reverse();
  }
}

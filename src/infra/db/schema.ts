import {
  index,
  pgTable,
  text,
  timestamp,
  vector,
} from "drizzle-orm/pg-core";

export const INSIGHT_VECTOR_DIMENSION = 768;

export const insightsTable = pgTable("insights", {
  id: text("id").primaryKey(),
  content: text("content").notNull(),
  source: text("source").notNull(),
  embedding: vector("embedding", {
    dimensions: INSIGHT_VECTOR_DIMENSION,
  }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
});

export const conversationTurnsTable = pgTable(
  "conversation_turns",
  {
    id: text("id").primaryKey(),
    sessionId: text("session_id").notNull(),
    category: text("category").notNull(),
    userInput: text("user_input").notNull(),
    response: text("response").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    sessionIdx: index("conversation_turns_session_idx").on(
      table.sessionId,
      table.createdAt,
    ),
  }),
);

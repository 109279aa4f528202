import type { ConversationTurnEntity } from "../../core/entities/conversation";
import type { ConversationHistoryPort } from "../../core/ports/outboundPorts";

/**
 * Process-local history for runs without Postgres; lost on restart.
 */
export class InMemoryConversationHistory implements ConversationHistoryPort {
  private readonly sessions = new Map<string, ConversationTurnEntity[]>();

  async append(turn: ConversationTurnEntity): Promise<void> {
    const turns = this.sessions.get(turn.sessionId) ?? [];
    turns.push(turn);
    this.sessions.set(turn.sessionId, turns);
  }

  async listRecent(
    sessionId: string,
    limit: number,
  ): Promise<ConversationTurnEntity[]> {
    if (limit <= 0) {
      return [];
    }

    const turns = this.sessions.get(sessionId) ?? [];
    return turns.slice(-limit);
  }
}

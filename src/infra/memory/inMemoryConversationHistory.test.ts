import { describe, expect, it } from "vitest";
import type { ConversationTurnEntity } from "../../core/entities/conversation";
import { InMemoryConversationHistory } from "./inMemoryConversationHistory";

const turn = (
  sessionId: string,
  index: number,
): ConversationTurnEntity => ({
  id: `${sessionId}-${index}`,
  sessionId,
  category: "generic",
  userInput: `question ${index}`,
  response: `answer ${index}`,
  createdAt: new Date(Date.UTC(2026, 2, 10, 12, index)),
});

describe("InMemoryConversationHistory", () => {
  it("keeps sessions apart and returns the latest turns in order", async () => {
    const history = new InMemoryConversationHistory();

    for (let index = 1; index <= 4; index += 1) {
      await history.append(turn("a", index));
    }
    await history.append(turn("b", 1));

    const recent = await history.listRecent("a", 2);

    expect(recent.map((entry) => entry.id)).toEqual(["a-3", "a-4"]);
    expect(await history.listRecent("b", 5)).toHaveLength(1);
    expect(await history.listRecent("missing", 5)).toEqual([]);
  });

  it("returns no turns for a non-positive limit", async () => {
    const history = new InMemoryConversationHistory();
    await history.append(turn("a", 1));
    await history.append(turn("a", 2));

    expect(await history.listRecent("a", 0)).toEqual([]);
    expect(await history.listRecent("a", -1)).toEqual([]);
  });
});

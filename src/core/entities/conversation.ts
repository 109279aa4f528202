import type { AdviceCategory } from "./advice";

/**
 * One exchange in a session; sessions are append-only logs of these.
 */
export type ConversationTurnEntity = {
  id: string;
  sessionId: string;
  category: AdviceCategory;
  userInput: string;
  response: string;
  createdAt: Date;
};

import type { Result } from "neverthrow";
import type { AdviceFailure, AdviceResult } from "../entities/advice";
import type { AppBoundaryError } from "../entities/appError";

export type InsightInput = {
  content: string;
  source?: string;
};

export interface AdvicePort {
  /**
   * Accepts untrusted input so validation failures surface as 400-style results instead of throws.
   */
  getAdvice(input: unknown): Promise<Result<AdviceResult, AdviceFailure>>;
}

export interface InsightLibraryPort {
  addInsights(
    insights: InsightInput[],
  ): Promise<Result<number, AppBoundaryError>>;
  retrieveContext(
    query: string,
    limit: number,
  ): Promise<Result<string, AppBoundaryError>>;
}

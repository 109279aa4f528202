import type { AppBoundaryError } from "./appError";

export const adviceCategories = ["generic", "portfolio", "domain"] as const;

export type AdviceCategory = (typeof adviceCategories)[number];

type AdviceRequestBase = {
  userInput: string;
  context?: string;
  newsKeywords?: string;
  sessionId?: string;
  temperature?: number;
  maxTokens?: number;
};

export type GenericAdviceRequest = AdviceRequestBase & {
  category: "generic";
};

export type PortfolioAdviceRequest = AdviceRequestBase & {
  category: "portfolio";
  portfolioDetails: string;
};

export type DomainAdviceRequest = AdviceRequestBase & {
  category: "domain";
  domainDetails: string;
  domainType?: string;
};

export type AdviceRequest =
  | GenericAdviceRequest
  | PortfolioAdviceRequest
  | DomainAdviceRequest;

export type AdviceResult = {
  category: AdviceCategory;
  advice: string;
  /** True when the LLM call failed and `advice` carries the fallback apology. */
  degraded: boolean;
  model?: string;
  contextSources: {
    news: "ok" | "skipped" | "degraded";
    insights: "ok" | "skipped" | "degraded";
  };
};

export type AdviceFailureKind = "validation" | "configuration" | "upstream";

/**
 * Orchestrator-level failure shaped for an HTTP-like response.
 */
export type AdviceFailure = {
  kind: AdviceFailureKind;
  httpStatus: 400 | 500 | 502;
  message: string;
  issues?: string[];
  cause?: AppBoundaryError;
};

import type { AdviceRequest } from "../../core/entities/advice";

export const ADVISOR_SYSTEM_PROMPT =
  "You are a careful financial advisor. Ground your answer in the supplied context and say when information is missing.";

export const genericAdviceTemplate = [
  "You are a helpful financial advisor. Use the following context and user query to provide detailed financial advice.",
  "",
  "Context:",
  "{context}",
  "",
  "Conversation History:",
  "{history}",
  "",
  "User Query:",
  "{userInput}",
  "",
  "Please provide a clear, well-structured response that incorporates both general financial principles and any relevant current information from the context.",
].join("\n");

export const portfolioAdviceTemplate = [
  "You are a portfolio management advisor. Analyze the following portfolio details along with the provided context and conversation history.",
  "",
  "Portfolio Details:",
  "{portfolioDetails}",
  "",
  "Additional Context:",
  "{context}",
  "",
  "Conversation History:",
  "{history}",
  "",
  "User Query:",
  "{userInput}",
  "",
  "Provide your advice in the following sections:",
  "1. Portfolio Overview",
  "2. Risk Analysis",
  "3. Strategic Recommendations",
  "4. Next Steps",
].join("\n");

export const domainAdviceTemplate = [
  "You are a financial advisor specialised in the {domainType} domain. Use the following domain information and context to provide targeted advice.",
  "",
  "Domain Details:",
  "{domainDetails}",
  "",
  "Context:",
  "{context}",
  "",
  "Conversation History:",
  "{history}",
  "",
  "User Query:",
  "{userInput}",
  "",
  "Provide specific recommendations and insights relevant to this domain.",
].join("\n");

export type PromptSections = {
  context: string;
  history: string;
};

/**
 * Replaces `{name}` placeholders; unknown placeholders are left as written.
 */
export const renderTemplate = (
  template: string,
  variables: Record<string, string>,
): string =>
  template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.hasOwn(variables, name) ? (variables[name] ?? "") : placeholder,
  );

const assertNever = (value: never): never => {
  throw new Error(`Unhandled advice category: ${JSON.stringify(value)}`);
};

export const buildAdvicePrompt = (
  request: AdviceRequest,
  sections: PromptSections,
): string => {
  const shared = {
    context: sections.context,
    history: sections.history,
    userInput: request.userInput,
  };

  switch (request.category) {
    case "generic":
      return renderTemplate(genericAdviceTemplate, shared);
    case "portfolio":
      return renderTemplate(portfolioAdviceTemplate, {
        ...shared,
        portfolioDetails: request.portfolioDetails,
      });
    case "domain":
      return renderTemplate(domainAdviceTemplate, {
        ...shared,
        domainDetails: request.domainDetails,
        domainType: request.domainType ?? "general",
      });
    default:
      return assertNever(request);
  }
};

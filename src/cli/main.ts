import { Command, InvalidArgumentError } from "commander";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import { adviceCategories } from "../core/entities/advice";
import type { StockQuoteSeries } from "../core/entities/quote";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

/**
 * Renders the newest daily bars as aligned rows for terminal inspection.
 */
export const formatQuoteTable = (
  series: StockQuoteSeries,
  limit: number,
): string => {
  const lines = [
    `Daily prices for ${series.symbol}${series.metadata.lastRefreshed ? ` (last refreshed ${series.metadata.lastRefreshed})` : ""}`,
    "date        open      high      low       close     volume",
  ];

  series.records.slice(0, limit).forEach((record) => {
    lines.push(
      [
        record.date.padEnd(10),
        record.open.toFixed(2).padStart(9),
        record.high.toFixed(2).padStart(9),
        record.low.toFixed(2).padStart(9),
        record.close.toFixed(2).padStart(9),
        String(record.volume).padStart(10),
      ].join(" "),
    );
  });

  if (series.records.length === 0) {
    lines.push("- none");
  }

  return lines.join("\n");
};

/**
 * Runs one command against a fresh runtime and always releases its connections.
 */
const withRuntime = async (
  task: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = createRuntime();
  try {
    await task(runtime);
  } finally {
    await runtime.close();
  }
};

type AdviseOptions = {
  category: string;
  input: string;
  context?: string;
  portfolio?: string;
  domain?: string;
  domainType?: string;
  news?: string;
  session?: string;
};

/**
 * Defines a single command surface so every operation goes through the same resilience policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("finadvisor").description("Financial advisory assistant CLI");

  cli
    .command("advise")
    .description("Ask for advice in one of the supported categories")
    .requiredOption(
      "--category <category>",
      `Advice category (${adviceCategories.join(", ")})`,
    )
    .requiredOption("--input <text>", "User question")
    .option("--context <text>", "Extra context to include in the prompt")
    .option("--portfolio <text>", "Portfolio details (portfolio category)")
    .option("--domain <text>", "Domain details (domain category)")
    .option("--domain-type <type>", "Domain label, e.g. real-estate")
    .option("--news <keywords>", "Keywords for the news search")
    .option("--session <id>", "Session id for conversation history")
    .action(async (opts: AdviseOptions) =>
      withRuntime(async (runtime) => {
        const result = await runtime.advice.getAdvice({
          category: opts.category,
          userInput: opts.input,
          context: opts.context,
          portfolioDetails: opts.portfolio,
          domainDetails: opts.domain,
          domainType: opts.domainType,
          newsKeywords: opts.news,
          sessionId: opts.session,
        });

        if (result.isErr()) {
          const { cause, ...failure } = result.error;
          console.error(
            JSON.stringify(
              { ...failure, code: cause?.code, provider: cause?.provider },
              null,
              2,
            ),
          );
          process.exitCode = 1;
          return;
        }

        console.log(result.value.advice);
        logger.info(
          {
            category: result.value.category,
            degraded: result.value.degraded,
            contextSources: result.value.contextSources,
          },
          "Advice delivered",
        );
      }),
    );

  cli
    .command("news")
    .description("Fetch formatted financial news")
    .option("--query <text>", "Search query")
    .option("--count <n>", "Number of articles (1-10)", parsePositiveInt, 5)
    .option("--max-age-hours <n>", "Maximum article age", parsePositiveInt, 24)
    .action(
      async (opts: { query?: string; count: number; maxAgeHours: number }) =>
        withRuntime(async (runtime) => {
          const result = await runtime.news.fetchLatestNews({
            query: opts.query,
            numArticles: opts.count,
            maxAgeHours: opts.maxAgeHours,
          });

          if (result.isErr()) {
            logger.error({ error: result.error }, "News fetch failed");
            process.exitCode = 1;
            return;
          }

          console.log(result.value);
        }),
    );

  cli
    .command("quote")
    .description("Print recent daily prices for a ticker")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .option("--limit <n>", "Rows to print", parsePositiveInt, 5)
    .action(async (opts: { symbol: string; limit: number }) =>
      withRuntime(async (runtime) => {
        const result = await runtime.quotes.fetchDailySeries(opts.symbol);

        if (result.isErr()) {
          logger.error({ error: result.error }, "Quote fetch failed");
          process.exitCode = 1;
          return;
        }

        console.log(formatQuoteTable(result.value, opts.limit));
      }),
    );

  cli
    .command("insights:add")
    .description("Embed and store self-help book learnings")
    .requiredOption("--text <text...>", "One or more insight texts")
    .option("--source <source>", "Book or author the insights come from")
    .action(async (opts: { text: string[]; source?: string }) =>
      withRuntime(async (runtime) => {
        if (!runtime.insights) {
          logger.error(
            { insightStore: env.INSIGHT_STORE },
            "Insight store is disabled; set INSIGHT_STORE=pgvector",
          );
          process.exitCode = 1;
          return;
        }

        const result = await runtime.insights.addInsights(
          opts.text.map((content) => ({ content, source: opts.source })),
        );

        if (result.isErr()) {
          logger.error({ error: result.error }, "Storing insights failed");
          process.exitCode = 1;
          return;
        }

        logger.info({ stored: result.value }, "Insights stored");
      }),
    );

  cli
    .command("status")
    .description("Report configuration and live limiter/cache state")
    .action(async () =>
      withRuntime(async (runtime) => {
        logger.info(
          {
            groq: { baseUrl: env.GROQ_BASE_URL, model: env.GROQ_MODEL },
            tavily: env.TAVILY_BASE_URL,
            alphaVantage: env.ALPHA_VANTAGE_BASE_URL,
            ollama: {
              baseUrl: env.OLLAMA_BASE_URL,
              model: env.OLLAMA_EMBED_MODEL,
            },
            credentials: {
              GROQ_API_KEY: env.GROQ_API_KEY.length > 0,
              TAVILY_API_KEY: env.TAVILY_API_KEY.length > 0,
              ALPHA_VANTAGE_API_KEY: env.ALPHA_VANTAGE_API_KEY.length > 0,
            },
            insightStore: env.INSIGHT_STORE,
            historyStore: env.HISTORY_STORE,
            operations: runtime.snapshots(),
          },
          "Runtime status",
        );
      }),
    );

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};

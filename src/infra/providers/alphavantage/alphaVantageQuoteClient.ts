import { err, ok, type Result } from "neverthrow";
import {
  missingCredentialError,
  type AppBoundaryError,
} from "../../../core/entities/appError";
import type {
  OhlcRecord,
  StockQuoteMetadata,
  StockQuoteSeries,
} from "../../../core/entities/quote";
import type { StockQuotePort } from "../../../core/ports/outboundPorts";
import { toBoundaryError } from "../../http/boundaryErrors";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { buildCacheKey } from "../../resilience/cacheKey";
import type { ResilientOperation } from "../../resilience/resilientOperation";

type AlphaVantageDailyBar = {
  "1. open"?: string;
  "2. high"?: string;
  "3. low"?: string;
  "4. close"?: string;
  "5. volume"?: string;
};

type AlphaVantageDailyResponse = {
  "Meta Data"?: {
    "1. Information"?: string;
    "2. Symbol"?: unknown;
    "3. Last Refreshed"?: string;
    "4. Output Size"?: string;
    "5. Time Zone"?: string;
  };
  "Time Series (Daily)"?: Record<string, AlphaVantageDailyBar | null>;
  Information?: unknown;
  Note?: unknown;
  "Error Message"?: unknown;
};

const symbolPattern = /^[A-Za-z0-9.-]{1,12}$/;

const trimmedText = (value: unknown): string =>
  typeof value === "string" ? value.trim() : "";

const parseNumericValue = (raw: unknown): number | null => {
  if (typeof raw !== "string" || !raw) {
    return null;
  }

  const parsed = Number.parseFloat(raw.trim());
  return Number.isFinite(parsed) ? parsed : null;
};

const toRecord = (
  date: string,
  bar: AlphaVantageDailyBar | null,
): OhlcRecord | null => {
  if (!bar || typeof bar !== "object") {
    return null;
  }

  const open = parseNumericValue(bar["1. open"]);
  const high = parseNumericValue(bar["2. high"]);
  const low = parseNumericValue(bar["3. low"]);
  const close = parseNumericValue(bar["4. close"]);
  const volume = parseNumericValue(bar["5. volume"]);

  if (
    open === null ||
    high === null ||
    low === null ||
    close === null ||
    volume === null
  ) {
    return null;
  }

  return { date, open, high, low, close, volume };
};

/**
 * Reads the compact daily OHLC series for a ticker from Alpha Vantage.
 */
export class AlphaVantageQuoteClient implements StockQuotePort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly operation: ResilientOperation<StockQuoteSeries>,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async fetchDailySeries(
    rawSymbol: string,
  ): Promise<Result<StockQuoteSeries, AppBoundaryError>> {
    const symbol = rawSymbol.trim().toUpperCase();

    if (!symbolPattern.test(symbol)) {
      return err({
        source: "quote",
        code: "validation_error",
        provider: "alphavantage",
        message: `Invalid ticker symbol '${rawSymbol}'.`,
        retryable: false,
      });
    }

    if (!this.apiKey.trim()) {
      return err(
        missingCredentialError("quote", "alphavantage", "ALPHA_VANTAGE_API_KEY"),
      );
    }

    return this.operation.run(() => this.requestSeries(symbol), {
      cacheKey: buildCacheKey("alphavantage-daily", { symbol }),
    });
  }

  private async requestSeries(
    symbol: string,
  ): Promise<Result<StockQuoteSeries, AppBoundaryError>> {
    const url = new URL("/query", this.baseUrl);
    url.searchParams.set("function", "TIME_SERIES_DAILY");
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("outputsize", "compact");
    url.searchParams.set("apikey", this.apiKey);

    const response =
      await this.httpClient.requestJson<AlphaVantageDailyResponse>({
        url: url.toString(),
        method: "GET",
        timeoutMs: this.timeoutMs,
      });

    if (response.isErr()) {
      return err(toBoundaryError("quote", "alphavantage", response.error));
    }

    const payload = response.value;
    if (!payload || typeof payload !== "object") {
      return err({
        source: "quote",
        code: "malformed_response",
        provider: "alphavantage",
        message: "Daily series payload was not an object.",
        retryable: false,
      });
    }

    // Alpha Vantage answers throttled calls with HTTP 200 and a Note/Information body.
    const note = trimmedText(payload.Note) || trimmedText(payload.Information);
    if (note) {
      return err({
        source: "quote",
        code: "rate_limited",
        provider: "alphavantage",
        message: note,
        retryable: true,
      });
    }

    const errorMessage = trimmedText(payload["Error Message"]);
    if (errorMessage) {
      return err({
        source: "quote",
        code: "validation_error",
        provider: "alphavantage",
        message: errorMessage,
        retryable: false,
      });
    }

    const series = payload["Time Series (Daily)"];
    if (!series || typeof series !== "object") {
      return err({
        source: "quote",
        code: "malformed_response",
        provider: "alphavantage",
        message: "Daily series payload did not contain 'Time Series (Daily)'.",
        retryable: false,
      });
    }

    const records = Object.entries(series)
      .map(([date, bar]) => toRecord(date, bar))
      .filter((record): record is OhlcRecord => record !== null)
      .sort((left, right) => right.date.localeCompare(left.date));

    const meta = payload["Meta Data"];
    const metadata: StockQuoteMetadata = {
      information: meta?.["1. Information"],
      lastRefreshed: meta?.["3. Last Refreshed"],
      outputSize: meta?.["4. Output Size"],
      timeZone: meta?.["5. Time Zone"],
    };

    return ok({
      symbol: trimmedText(meta?.["2. Symbol"]).toUpperCase() || symbol,
      metadata,
      records,
    });
  }
}

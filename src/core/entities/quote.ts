export type OhlcRecord = {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type StockQuoteMetadata = {
  information?: string;
  lastRefreshed?: string;
  outputSize?: string;
  timeZone?: string;
};

export type StockQuoteSeries = {
  symbol: string;
  metadata: StockQuoteMetadata;
  /** Newest trading day first. */
  records: OhlcRecord[];
};

export type NewsQuery = {
  query?: string;
  numArticles?: number;
  maxAgeHours?: number;
};

export type NewsArticle = {
  title: string;
  url: string;
  publishedDate: string;
  snippet: string;
};

/**
 * Provider search outcome before it is flattened into prompt context.
 */
export type NewsSearchResult = {
  answer?: string;
  articles: NewsArticle[];
};

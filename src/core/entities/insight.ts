export type InsightEntity = {
  id: string;
  content: string;
  source: string;
  createdAt: Date;
};

export type InsightMatch = {
  id: string;
  content: string;
  source: string;
  distance: number;
};

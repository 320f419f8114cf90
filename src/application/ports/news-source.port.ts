/** Article as returned by NewsAPI. */
export interface NewsApiArticle {
  source?: { id?: string | null; name?: string | null } | null;
  author?: string | null;
  title?: string | null;
  description?: string | null;
  url?: string | null;
  urlToImage?: string | null;
  publishedAt?: string | null;
  content?: string | null;
}

export interface EverythingQuery {
  q?: string;
  domains?: string;
  language?: string;
  sortBy?: string;
  from?: string;
  to?: string;
}

export interface TopHeadlinesQuery {
  country: string;
  category?: string;
}

export interface NewsSourceStatus {
  status: 'ok' | 'error';
  totalResults?: number;
  articlesFound?: number;
  message?: string;
}

export interface INewsSource {
  fetchEverything(query: EverythingQuery): Promise<NewsApiArticle[]>;
  fetchTopHeadlines(query: TopHeadlinesQuery): Promise<NewsApiArticle[]>;
  status(): Promise<NewsSourceStatus>;
}

import { ArticleId } from '../value-objects/article-id';

export interface ArticleProps {
  title: string;
  url: string;
  summary: string;
  publishedAt: string;
  sourceName: string;
  author: string;
  imageUrl?: string;
}

/** Wire and cache-file shape of an article. */
export interface ArticleRecord {
  id: string;
  title: string;
  url: string;
  summary: string;
  published_at: string;
  source_name: string;
  author: string;
  image_url?: string;
}

export class Article {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly summary: string;
  readonly publishedAt: string;
  readonly sourceName: string;
  readonly author: string;
  readonly imageUrl?: string;

  private constructor(id: string, props: ArticleProps) {
    this.id = id;
    this.title = props.title;
    this.url = props.url;
    this.summary = props.summary;
    this.publishedAt = props.publishedAt;
    this.sourceName = props.sourceName;
    this.author = props.author;
    this.imageUrl = props.imageUrl;
    Object.freeze(this);
  }

  static create(props: ArticleProps): Article {
    const id = ArticleId.fromSource(props.url, props.publishedAt).toString();
    return new Article(id, props);
  }

  static fromRecord(record: ArticleRecord): Article {
    return new Article(record.id, {
      title: record.title,
      url: record.url,
      summary: record.summary,
      publishedAt: record.published_at,
      sourceName: record.source_name,
      author: record.author,
      imageUrl: record.image_url,
    });
  }

  toRecord(): ArticleRecord {
    const record: ArticleRecord = {
      id: this.id,
      title: this.title,
      url: this.url,
      summary: this.summary,
      published_at: this.publishedAt,
      source_name: this.sourceName,
      author: this.author,
    };
    if (this.imageUrl) record.image_url = this.imageUrl;
    return record;
  }
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/** Narrows untrusted JSON (cache files) to an ArticleRecord. */
export function isArticleRecord(value: unknown): value is ArticleRecord {
  if (!value || typeof value !== 'object') return false;
  const v = value as Record<string, unknown>;
  return (
    isString(v.id) &&
    isString(v.title) &&
    isString(v.url) &&
    isString(v.summary) &&
    isString(v.published_at) &&
    isString(v.source_name) &&
    isString(v.author) &&
    (v.image_url === undefined || isString(v.image_url))
  );
}

import { createHash } from 'node:crypto';

/**
 * Stable article identifier: SHA-256 of `url|publishedAt`. Two fetches of
 * the same story yield the same id across processes and restarts.
 */
export class ArticleId {
  private constructor(private readonly value: string) {}

  static fromSource(url: string, publishedAt: string): ArticleId {
    const digest = createHash('sha256')
      .update(`${url}|${publishedAt}`, 'utf8')
      .digest('hex');
    return new ArticleId(digest);
  }

  /** Vector record id, e.g. `headlines_<digest>`. */
  toRecordId(prefix: string): string {
    return `${prefix}_${this.value}`;
  }

  toString(): string {
    return this.value;
  }
}

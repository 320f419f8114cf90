import { Inject, Injectable } from '@nestjs/common';
import { Article } from '../../domain/entities/article.entity';
import { ArticleId } from '../../domain/value-objects/article-id';
import { CLOCK } from '../ports';
import { IClock } from '../ports/clock.port';
import { NewsApiArticle } from '../ports/news-source.port';
import { VectorFieldValue, VectorRecord } from '../ports/vector-store.port';

/** Characters of article body kept in the embedded text. */
export const CONTENT_EXCERPT_LENGTH = 1000;

/**
 * Turns raw NewsAPI articles into domain articles and vector records.
 */
@Injectable()
export class ArticlePreparationService {
  constructor(@Inject(CLOCK) private readonly clock: IClock) {}

  toArticle(raw: NewsApiArticle): Article {
    return Article.create({
      title: raw.title || '',
      url: raw.url || '',
      summary: raw.description || '',
      publishedAt: raw.publishedAt || '',
      sourceName: raw.source?.name || '',
      author: raw.author || '',
      imageUrl: raw.urlToImage || undefined,
    });
  }

  buildText(raw: NewsApiArticle): string {
    const parts = [raw.title, raw.description, raw.content?.slice(0, CONTENT_EXCERPT_LENGTH)];
    return parts
      .filter((part): part is string => Boolean(part))
      .join(' ')
      .trim();
  }

  buildMetadata(raw: NewsApiArticle, sourceType: string): Record<string, VectorFieldValue> {
    const metadata: Record<string, VectorFieldValue> = {
      source_type: sourceType,
      title: raw.title || '',
      description: raw.description || '',
      url: raw.url || '',
      published_at: raw.publishedAt || '',
      source_name: raw.source?.name || '',
      author: raw.author || '',
      content_type: 'news_article',
      processed_at: this.clock.now().toISOString(),
    };
    if (raw.urlToImage) metadata.image_url = raw.urlToImage;
    return metadata;
  }

  /**
   * @param recordPrefix `news`, `headlines` or `domain_<domain>`
   * @param sourceType stored as `source_type` metadata
   */
  toVectorRecord(raw: NewsApiArticle, recordPrefix: string, sourceType: string): VectorRecord {
    const id = ArticleId.fromSource(raw.url || '', raw.publishedAt || '');
    return {
      id: id.toRecordId(recordPrefix),
      text: this.buildText(raw),
      metadata: this.buildMetadata(raw, sourceType),
    };
  }
}

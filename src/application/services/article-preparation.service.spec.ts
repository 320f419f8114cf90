import { createHash } from 'node:crypto';
import { NewsApiArticle } from '../ports/news-source.port';
import { FixedClock } from '../../../test/fakes/fixed-clock';
import { ArticlePreparationService } from './article-preparation.service';

describe('ArticlePreparationService', () => {
  const service = new ArticlePreparationService(new FixedClock('2024-05-01'));
  const raw: NewsApiArticle = {
    source: { id: null, name: 'Example Wire' },
    author: 'J. Doe',
    title: 'Rates hold steady',
    description: 'The central bank left rates unchanged.',
    url: 'https://example.com/rates',
    urlToImage: 'https://example.com/rates.jpg',
    publishedAt: '2024-05-01T07:00:00Z',
    content: 'Body text',
  };
  const digest = createHash('sha256')
    .update('https://example.com/rates|2024-05-01T07:00:00Z')
    .digest('hex');

  it('joins title, description and content', () => {
    expect(service.buildText(raw)).toBe(
      'Rates hold steady The central bank left rates unchanged. Body text',
    );
  });

  it('keeps the first 1000 characters of content and skips empty parts', () => {
    const text = service.buildText({ title: '', description: null, content: 'x'.repeat(1500) });
    expect(text).toBe('x'.repeat(1000));
    expect(service.buildText({})).toBe('');
  });

  it('builds metadata with the processing time and optional image', () => {
    expect(service.buildMetadata(raw, 'technology')).toEqual({
      source_type: 'technology',
      title: 'Rates hold steady',
      description: 'The central bank left rates unchanged.',
      url: 'https://example.com/rates',
      published_at: '2024-05-01T07:00:00Z',
      source_name: 'Example Wire',
      author: 'J. Doe',
      content_type: 'news_article',
      processed_at: '2024-05-01T09:30:00.000Z',
      image_url: 'https://example.com/rates.jpg',
    });
    expect(service.buildMetadata({ ...raw, urlToImage: null }, 'x')).not.toHaveProperty(
      'image_url',
    );
  });

  it('derives the record id from url and publish time', () => {
    const record = service.toVectorRecord(raw, 'domain_bbc.co.uk', 'domain_bbc.co.uk');
    expect(record.id).toBe(`domain_bbc.co.uk_${digest}`);
    expect(service.toVectorRecord(raw, 'news', 'rates').id).toBe(`news_${digest}`);
  });

  it('maps to a domain article with the same id', () => {
    expect(service.toArticle(raw).toRecord()).toEqual({
      id: digest,
      title: 'Rates hold steady',
      url: 'https://example.com/rates',
      summary: 'The central bank left rates unchanged.',
      published_at: '2024-05-01T07:00:00Z',
      source_name: 'Example Wire',
      author: 'J. Doe',
      image_url: 'https://example.com/rates.jpg',
    });
  });
});

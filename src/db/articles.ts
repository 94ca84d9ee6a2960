/**
 * PostgreSQL article queries
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ArticleFields, ArticlePage, ArticleQuery, StoredArticle } from '../types/index.js';
import { DuplicateArticleError } from './repository.js';
import type { ArticleRepository } from './repository.js';

const UNIQUE_VIOLATION = '23505';
const URL_CONSTRAINT = 'uq_article_url';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * The part of a pg Pool or PoolClient the repository talks to
 */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlExecutor & { release(): void }>;
}

const articleQuerySchema = z.object({
  page: z.number().int().min(1).default(1),
  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  search: z.string().trim().min(1).optional(),
  author: z.string().trim().min(1).optional(),
  dateFrom: z.date().optional(),
  dateTo: z.date().optional(),
});

const articleRowSchema = z.object({
  id: z.number().int(),
  url: z.string(),
  title: z.string(),
  content: z.string(),
  author: z.string().nullable(),
  subtitle: z.string().nullable(),
  image_url: z.string().nullable(),
  word_count: z.number().int().nullable(),
  reading_time: z.string().nullable(),
  published_at: z.date(),
  scraped_at: z.date(),
  tags: z.array(z.string()),
  related_urls: z.array(z.string()),
});

type ArticleRow = z.infer<typeof articleRowSchema>;

const idRowSchema = z.object({ id: z.number().int() });
const countRowSchema = z.object({ count: z.number().int() });

const SELECT_ARTICLE = `
  SELECT
    a.*,
    COALESCE(
      (SELECT array_agg(t.name ORDER BY t.name)
         FROM article_tags at JOIN tags t ON t.id = at.tag_id
        WHERE at.article_id = a.id),
      '{}'
    ) AS tags,
    COALESCE(
      (SELECT array_agg(r.related_url ORDER BY r.id)
         FROM related_articles r
        WHERE r.article_id = a.id),
      '{}'
    ) AS related_urls
  FROM articles a
`;

function mapArticleRow(row: ArticleRow): StoredArticle {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    content: row.content,
    author: row.author,
    subtitle: row.subtitle,
    imageUrl: row.image_url,
    publishedAt: row.published_at,
    scrapedAt: row.scraped_at,
    wordCount: row.word_count ?? 0,
    readingTime: row.reading_time ?? '',
    tags: row.tags,
    relatedUrls: row.related_urls,
  };
}

function firstId(rows: unknown[]): number | undefined {
  return rows.length > 0 ? idRowSchema.parse(rows[0]).id : undefined;
}

function firstCount(rows: unknown[]): number {
  return rows.length > 0 ? countRowSchema.parse(rows[0]).count : 0;
}

function mapArticleRows(rows: unknown[]): StoredArticle[] {
  return rows.map((row) => mapArticleRow(articleRowSchema.parse(row)));
}

/**
 * Tags in the order their rows are locked: de-duplicated and sorted, so
 * concurrent inserts sharing tags always wait on each other in one direction.
 */
export function tagLockOrder(tags: readonly string[]): string[] {
  return [...new Set(tags)].sort();
}

function isUrlConflict(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION &&
    'constraint' in error &&
    error.constraint === URL_CONSTRAINT
  );
}

export class PgArticleRepository implements ArticleRepository {
  constructor(private readonly pool: SqlPool) {}

  async insert(article: ArticleFields): Promise<number> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const { rows } = await client.query(
        `INSERT INTO articles
           (url, title, content, author, subtitle, image_url, word_count, reading_time, published_at, scraped_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING id`,
        [
          article.url,
          article.title,
          article.content,
          article.author,
          article.subtitle,
          article.imageUrl,
          article.wordCount,
          article.readingTime,
          article.publishedAt,
          article.scrapedAt,
        ]
      );

      const id = firstId(rows);
      if (id === undefined) {
        throw new Error(`Insert returned no id for ${article.url}`);
      }

      await this.attachTags(client, id, article.tags);

      for (const relatedUrl of article.relatedUrls) {
        await client.query('INSERT INTO related_articles (article_id, related_url) VALUES ($1, $2)', [
          id,
          relatedUrl,
        ]);
      }

      await client.query('COMMIT');
      return id;
    } catch (error) {
      await this.rollback(client);
      if (isUrlConflict(error)) {
        throw new DuplicateArticleError(article.url);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async count(): Promise<number> {
    const { rows } = await this.pool.query('SELECT COUNT(*)::int AS count FROM articles');
    return firstCount(rows);
  }

  async findByUrl(url: string): Promise<StoredArticle | null> {
    const { rows } = await this.pool.query(`${SELECT_ARTICLE} WHERE a.url = $1`, [url]);
    return mapArticleRows(rows)[0] ?? null;
  }

  async findById(id: number): Promise<StoredArticle | null> {
    const { rows } = await this.pool.query(`${SELECT_ARTICLE} WHERE a.id = $1`, [id]);
    return mapArticleRows(rows)[0] ?? null;
  }

  /**
   * Newest-first page of articles with optional text, author and date filters
   */
  async list(query: ArticleQuery = {}): Promise<ArticlePage> {
    const { page, pageSize, search, author, dateFrom, dateTo } = articleQuerySchema.parse(query);

    const conditions: string[] = [];
    const params: unknown[] = [];

    if (search) {
      params.push(`%${search}%`);
      conditions.push(`(a.title ILIKE $${params.length} OR a.content ILIKE $${params.length})`);
    }
    if (author) {
      params.push(`%${author}%`);
      conditions.push(`a.author ILIKE $${params.length}`);
    }
    if (dateFrom) {
      params.push(dateFrom);
      conditions.push(`a.published_at >= $${params.length}`);
    }
    if (dateTo) {
      params.push(dateTo);
      conditions.push(`a.published_at <= $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.pool.query(`SELECT COUNT(*)::int AS count FROM articles a ${where}`, params);
    const total = firstCount(countResult.rows);

    const { rows } = await this.pool.query(
      `${SELECT_ARTICLE} ${where}
       ORDER BY a.published_at DESC, a.id DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, pageSize, (page - 1) * pageSize]
    );

    return {
      articles: mapArticleRows(rows),
      total,
      page,
      pageSize,
      totalPages: Math.ceil(total / pageSize),
    };
  }

  private async attachTags(client: SqlExecutor, articleId: number, tags: string[]): Promise<void> {
    for (const name of tagLockOrder(tags)) {
      // DO UPDATE (not DO NOTHING) so RETURNING yields the id of an existing tag
      const { rows } = await client.query(
        `INSERT INTO tags (name) VALUES ($1)
         ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
         RETURNING id`,
        [name]
      );
      const tagId = firstId(rows);
      if (tagId === undefined) {
        throw new Error(`Tag upsert returned no id for "${name}"`);
      }
      await client.query(
        'INSERT INTO article_tags (article_id, tag_id) VALUES ($1, $2) ON CONFLICT DO NOTHING',
        [articleId, tagId]
      );
    }
  }

  private async rollback(client: SqlExecutor): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      logger.warn({ error }, 'Rollback failed');
    }
  }
}

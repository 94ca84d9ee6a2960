/**
 * PostgreSQL Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Articles Table
-- One row per canonical article URL
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS articles (
  id SERIAL PRIMARY KEY,
  url VARCHAR(1024) NOT NULL,
  title VARCHAR(512) NOT NULL,
  content TEXT NOT NULL,
  author VARCHAR(255),
  subtitle TEXT,
  image_url VARCHAR(1024),
  word_count INTEGER,
  reading_time VARCHAR(32),
  published_at TIMESTAMPTZ NOT NULL,
  scraped_at TIMESTAMPTZ NOT NULL,
  CONSTRAINT uq_article_url UNIQUE (url)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Tags
-- Shared by name across articles
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS tags (
  id SERIAL PRIMARY KEY,
  name VARCHAR(100) NOT NULL,
  CONSTRAINT uq_tag_name UNIQUE (name)
);

CREATE TABLE IF NOT EXISTS article_tags (
  article_id INTEGER NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
  tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (article_id, tag_id)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Related Articles
-- Plain URLs owned by the parent article
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS related_articles (
  id SERIAL PRIMARY KEY,
  article_id INTEGER NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
  related_url VARCHAR(1024) NOT NULL
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes for Performance
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_articles_published_at ON articles(published_at DESC);
CREATE INDEX IF NOT EXISTS idx_articles_author ON articles(author);
CREATE INDEX IF NOT EXISTS idx_related_articles_article ON related_articles(article_id);
`;

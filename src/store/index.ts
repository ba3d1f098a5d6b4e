import Database from 'better-sqlite3';
import {
  ARTICLE_STATUSES,
  Article,
  ArticleInput,
  ArticleStatus,
  ExportRecord,
  GlossaryTerm,
} from '../types';
import { StorageError } from '../utils/errors';
import { cleanOptional, errorMessage, logger, sha256Text } from '../utils';

interface ArticleRow {
  article_url: string;
  search_url: string | null;
  title: string | null;
  journal: string | null;
  published_date: string | null;
  abstract_en: string | null;
  abstract_en_hash: string | null;
  abstract_zh: string | null;
  status: string;
  last_error: string | null;
  crawled_at: string | null;
  translated_at: string | null;
}

interface GlossaryRow {
  term: string;
  source_term: string;
  translation: string | null;
  first_article_url: string;
}

const ARTICLE_COLUMNS =
  'article_url, search_url, title, journal, published_date, abstract_en, abstract_en_hash, ' +
  'abstract_zh, status, last_error, crawled_at, translated_at';

function statusRank(status: ArticleStatus): number {
  return ARTICLE_STATUSES.indexOf(status);
}

function toStatus(value: string): ArticleStatus {
  return ARTICLE_STATUSES.find((status) => status === value) ?? 'discovered';
}

function fromRow(row: ArticleRow): Article {
  return {
    articleUrl: row.article_url,
    searchUrl: row.search_url,
    title: row.title,
    journal: row.journal,
    publishedDate: row.published_date,
    abstractEn: row.abstract_en,
    abstractEnHash: row.abstract_en_hash,
    abstractZh: row.abstract_zh,
    status: toStatus(row.status),
    lastError: row.last_error,
    crawledAt: row.crawled_at,
    translatedAt: row.translated_at,
  };
}

function toRow(article: Article): ArticleRow {
  return {
    article_url: article.articleUrl,
    search_url: article.searchUrl,
    title: article.title,
    journal: article.journal,
    published_date: article.publishedDate,
    abstract_en: article.abstractEn,
    abstract_en_hash: article.abstractEnHash,
    abstract_zh: article.abstractZh,
    status: article.status,
    last_error: article.lastError,
    crawled_at: article.crawledAt,
    translated_at: article.translatedAt,
  };
}

/**
 * 合并一次写入与已有记录
 *
 * 空值不会覆盖已有的非空字段，状态只升不降。
 */
export function mergeArticle(existing: Article | undefined, input: ArticleInput): Article {
  const keep = (incoming: string | null | undefined, current: string | null | undefined) =>
    cleanOptional(incoming) ?? current ?? null;

  const abstractEn = keep(input.abstractEn, existing?.abstractEn);
  const currentStatus = existing?.status ?? 'discovered';
  const advances = !existing || statusRank(input.status) >= statusRank(currentStatus);

  return {
    articleUrl: input.articleUrl,
    searchUrl: keep(input.searchUrl, existing?.searchUrl),
    title: keep(input.title, existing?.title),
    journal: keep(input.journal, existing?.journal),
    publishedDate: keep(input.publishedDate, existing?.publishedDate),
    abstractEn,
    abstractEnHash: abstractEn ? sha256Text(abstractEn) : null,
    abstractZh: existing?.abstractZh ?? null,
    status: advances ? input.status : currentStatus,
    lastError: advances ? input.lastError ?? null : existing?.lastError ?? null,
    crawledAt: keep(input.crawledAt, existing?.crawledAt),
    translatedAt: existing?.translatedAt ?? null,
  };
}

/**
 * 文章存储（SQLite）
 *
 * 以 article_url 为唯一键；同一 URL 的写入在事务内完成读取与合并。
 */
export class ArticleStore {
  private readonly db: Database.Database;

  constructor(readonly dbPath: string) {
    try {
      this.db = new Database(dbPath);
      if (dbPath !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.createTables();
    } catch (error) {
      throw new StorageError(`无法打开数据库 ${dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    logger.debug(`数据库已打开: ${dbPath}`);
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS articles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        article_url TEXT NOT NULL UNIQUE,
        search_url TEXT,
        title TEXT,
        journal TEXT,
        published_date TEXT,
        abstract_en TEXT,
        abstract_en_hash TEXT,
        abstract_zh TEXT,
        status TEXT NOT NULL DEFAULT 'discovered',
        last_error TEXT,
        crawled_at TEXT,
        translated_at TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_articles_hash ON articles(abstract_en_hash);
      CREATE INDEX IF NOT EXISTS idx_articles_status ON articles(status);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS glossary_terms (
        term TEXT PRIMARY KEY,
        source_term TEXT NOT NULL,
        translation TEXT,
        first_article_url TEXT NOT NULL,
        created_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`${action}失败: ${errorMessage(error)}`, { cause: error });
    }
  }

  get(articleUrl: string): Article | undefined {
    return this.guard('读取文章', () => {
      const row = this.db
        .prepare<[string], ArticleRow>(`SELECT ${ARTICLE_COLUMNS} FROM articles WHERE article_url = ?`)
        .get(articleUrl);
      return row ? fromRow(row) : undefined;
    });
  }

  /**
   * 按 URL 插入或合并
   */
  upsert(input: ArticleInput): Article {
    return this.guard('写入文章', () =>
      this.db.transaction(() => {
        const merged = mergeArticle(this.get(input.articleUrl), input);
        this.db
          .prepare<ArticleRow>(
            `INSERT INTO articles (${ARTICLE_COLUMNS}) VALUES (
              @article_url, @search_url, @title, @journal, @published_date, @abstract_en,
              @abstract_en_hash, @abstract_zh, @status, @last_error, @crawled_at, @translated_at
            )
            ON CONFLICT(article_url) DO UPDATE SET
              search_url = excluded.search_url,
              title = excluded.title,
              journal = excluded.journal,
              published_date = excluded.published_date,
              abstract_en = excluded.abstract_en,
              abstract_en_hash = excluded.abstract_en_hash,
              abstract_zh = excluded.abstract_zh,
              status = excluded.status,
              last_error = excluded.last_error,
              crawled_at = excluded.crawled_at,
              translated_at = excluded.translated_at`
          )
          .run(toRow(merged));
        return merged;
      })()
    );
  }

  hasAbstract(articleUrl: string): boolean {
    return this.guard('查询摘要', () =>
      Boolean(
        this.db
          .prepare<[string], { found: number }>(
            `SELECT 1 AS found FROM articles
             WHERE article_url = ? AND abstract_en IS NOT NULL AND abstract_en != '' LIMIT 1`
          )
          .get(articleUrl)
      )
    );
  }

  /**
   * 按状态列出有英文摘要的记录（按插入顺序）
   */
  listPending(statuses: ArticleStatus[], limit = 0): Article[] {
    if (statuses.length === 0) return [];
    return this.guard('读取待处理记录', () => {
      const placeholders = statuses.map(() => '?').join(', ');
      const params: (string | number)[] = [...statuses];
      let sql =
        `SELECT ${ARTICLE_COLUMNS} FROM articles ` +
        `WHERE status IN (${placeholders}) AND abstract_en IS NOT NULL AND abstract_en != '' ` +
        'ORDER BY id ASC';
      if (limit > 0) {
        sql += ' LIMIT ?';
        params.push(limit);
      }
      return this.db
        .prepare<(string | number)[], ArticleRow>(sql)
        .all(...params)
        .map(fromRow);
    });
  }

  updateTranslation(articleUrl: string, abstractZh: string, translatedAt: string): void {
    this.guard('保存译文', () => {
      const result = this.db
        .prepare<[string, string, string]>(
          `UPDATE articles
           SET abstract_zh = ?, translated_at = ?, status = 'translated', last_error = NULL
           WHERE article_url = ?`
        )
        .run(abstractZh, translatedAt, articleUrl);
      if (result.changes === 0) {
        throw new StorageError(`保存译文失败: 记录不存在 ${articleUrl}`);
      }
    });
  }

  /**
   * 标记翻译失败；已翻译的记录保持不变
   */
  markTranslateFailed(articleUrl: string, message: string): void {
    this.guard('标记翻译失败', () => {
      this.db
        .prepare<[string, string]>(
          `UPDATE articles SET status = 'translate_failed', last_error = ?
           WHERE article_url = ? AND status != 'translated'`
        )
        .run(message, articleUrl);
    });
  }

  /**
   * 查找相同英文摘要已有的译文
   */
  findCachedTranslation(abstractEnHash: string): string | null {
    return this.guard('查询翻译缓存', () => {
      const row = this.db
        .prepare<[string], { abstract_zh: string }>(
          `SELECT abstract_zh FROM articles
           WHERE abstract_en_hash = ? AND status = 'translated'
             AND abstract_zh IS NOT NULL AND abstract_zh != ''
           ORDER BY id ASC LIMIT 1`
        )
        .get(abstractEnHash);
      return row ? row.abstract_zh : null;
    });
  }

  listForExport(searchUrl?: string): ExportRecord[] {
    return this.guard('读取导出记录', () => {
      const columns =
        'article_url, title, journal, published_date, abstract_en, abstract_zh';
      if (searchUrl) {
        return this.db
          .prepare<[string], ExportRecord>(
            `SELECT ${columns} FROM articles WHERE search_url = ? ORDER BY id ASC`
          )
          .all(searchUrl);
      }
      return this.db
        .prepare<[], ExportRecord>(`SELECT ${columns} FROM articles ORDER BY id ASC`)
        .all();
    });
  }

  countByStatus(): Record<ArticleStatus, number> {
    return this.guard('统计状态', () => {
      const counts: Record<ArticleStatus, number> = {
        discovered: 0,
        fetch_failed: 0,
        fetched: 0,
        translate_failed: 0,
        translated: 0,
      };
      const rows = this.db
        .prepare<[], { status: string; count: number }>(
          'SELECT status, COUNT(*) AS count FROM articles GROUP BY status'
        )
        .all();
      for (const row of rows) {
        counts[toStatus(row.status)] += row.count;
      }
      return counts;
    });
  }

  loadGlossary(): GlossaryTerm[] {
    return this.guard('读取术语表', () =>
      this.db
        .prepare<[], GlossaryRow>(
          'SELECT term, source_term, translation, first_article_url FROM glossary_terms ORDER BY rowid ASC'
        )
        .all()
        .map((row) => ({
          term: row.term,
          sourceTerm: row.source_term,
          translation: row.translation,
          firstArticleUrl: row.first_article_url,
        }))
    );
  }

  /**
   * 保存术语；已存在的术语不会被覆盖
   */
  saveGlossaryTerm(term: GlossaryTerm): void {
    this.guard('保存术语', () => {
      this.db
        .prepare<[string, string, string | null, string]>(
          `INSERT OR IGNORE INTO glossary_terms (term, source_term, translation, first_article_url)
           VALUES (?, ?, ?, ?)`
        )
        .run(term.term, term.sourceTerm, term.translation, term.firstArticleUrl);
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.debug(`数据库已关闭: ${this.dbPath}`);
    }
  }
}

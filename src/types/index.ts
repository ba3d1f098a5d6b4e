/**
 * 文章状态
 *
 * 排序即优先级：upsert 时状态只会前进，不会回退。
 */
export const ARTICLE_STATUSES = [
  'discovered',
  'fetch_failed',
  'fetched',
  'translate_failed',
  'translated',
] as const;

export type ArticleStatus = (typeof ARTICLE_STATUSES)[number];

/**
 * 已持久化的文章记录
 */
export interface Article {
  articleUrl: string;
  searchUrl: string | null;
  title: string | null;
  journal: string | null;
  publishedDate: string | null;
  abstractEn: string | null;
  abstractEnHash: string | null;
  /** 仅当 status 为 translated 时非空 */
  abstractZh: string | null;
  status: ArticleStatus;
  lastError: string | null;
  crawledAt: string | null;
  translatedAt: string | null;
}

/**
 * 抓取阶段写入的字段（不包含译文）
 */
export interface ArticleInput {
  articleUrl: string;
  status: ArticleStatus;
  searchUrl?: string | null;
  title?: string | null;
  journal?: string | null;
  publishedDate?: string | null;
  abstractEn?: string | null;
  lastError?: string | null;
  crawledAt?: string | null;
}

/**
 * 导出记录
 */
export interface ExportRecord {
  article_url: string;
  title: string | null;
  journal: string | null;
  published_date: string | null;
  abstract_en: string | null;
  abstract_zh: string | null;
}

export type ExportFormat = 'csv' | 'jsonl' | 'txt';

/**
 * 从文章详情页提取的字段
 */
export interface ArticleFields {
  title: string | null;
  journal: string | null;
  publishedDate: string | null;
  abstractEn: string | null;
}

export type SiteKind = 'search' | 'proceedings';

export type NextPage =
  | { kind: 'next'; url: string }
  | { kind: 'end' }
  | { kind: 'ambiguous'; reason: string };

/**
 * 站点适配器：只解析已获取的页面内容，不做任何网络请求
 */
export interface SiteAdapter {
  readonly kind: SiteKind;
  readonly name: string;
  matches(url: URL): boolean;
  extractLinks(html: string, pageUrl: string): string[];
  nextPage(html: string, currentUrl: string): NextPage;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * HTTP 传输层
 */
export interface HttpTransport {
  get(url: string, options: { timeoutMs: number }): Promise<HttpResponse>;
}

export interface FetchResult {
  url: string;
  status: number;
  body: string;
  attempts: number;
}

export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

export type TraversalStopReason =
  | 'exhausted'
  | 'max_pages'
  | 'page_failed'
  | 'ambiguous_next'
  | 'article_limit'
  | 'cancelled';

export interface TraversalReport {
  pagesVisited: number;
  articlesFound: number;
  stopReason: TraversalStopReason;
  error?: string;
}

/**
 * 术语表条目
 */
export interface GlossaryTerm {
  /** 归一化后的术语（小写、合并空白） */
  term: string;
  /** 首次出现时的原文写法 */
  sourceTerm: string;
  /** 规范译名；模型未给出括注时为 null */
  translation: string | null;
  firstArticleUrl: string;
}

/**
 * 单篇摘要的术语渲染计划
 */
export interface GlossaryContext {
  targetLanguage: string;
  /** 首次出现，需要以「英文（中文）」形式给出 */
  bilingual: string[];
  /** 已出现过，只保留英文 */
  monolingual: string[];
}

/**
 * 翻译能力（OpenAI 兼容的聊天接口，或测试替身）
 */
export interface TranslationCapability {
  translate(text: string, context: GlossaryContext): Promise<string>;
}

/**
 * 术语切分能力
 */
export interface TermSegmenter {
  /** 切分会调用模型时为 true，调用需经过限速与重试 */
  readonly remote?: boolean;
  segment(text: string): Promise<string[]> | string[];
}

/**
 * 爬虫配置接口
 */
export interface CrawlerConfig {
  dbPath: string;
  concurrency: number;
  /** 每秒请求数，<= 0 表示不限速 */
  rate: number;
  maxPages: number;
  limitArticles: number;
  resume: boolean;
  timeout: number;
  maxAttempts: number;
  retryDelay: number;
  maxRetryDelay: number;
  jitter: number;
  userAgent: string;
}

export type SiteSelection = SiteKind | 'auto';

export interface CrawlRequest {
  startUrl: string;
  site: SiteSelection;
  signal?: AbortSignal;
}

/**
 * 抓取结果汇总
 */
export interface CrawlSummary {
  runId: string;
  startUrl: string;
  discovered: number;
  fetched: number;
  failed: number;
  skipped: number;
  pagesVisited: number;
  stopReason: TraversalStopReason;
  cancelled: boolean;
  errors: string[];
}

export type TermSource = 'vocabulary' | 'llm';

/**
 * 翻译配置接口
 */
export interface TranslatorConfig {
  dbPath: string;
  apiKey?: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  targetLanguage: string;
  concurrency: number;
  rate: number;
  maxItems: number;
  timeout: number;
  maxAttempts: number;
  retryDelay: number;
  maxRetryDelay: number;
  jitter: number;
  termSource: TermSource;
  termsFile?: string;
}

export interface TranslateRequest {
  signal?: AbortSignal;
}

/**
 * 翻译结果汇总
 */
export interface TranslateSummary {
  runId: string;
  submitted: number;
  translated: number;
  failed: number;
  cached: number;
  cancelled: boolean;
  errors: string[];
}

export type CrawlOutcome =
  | { kind: 'fetched'; articleUrl: string; title: string | null }
  | { kind: 'failed'; articleUrl: string; error: string };

export type TranslationOutcome =
  | { kind: 'translated'; article: Article; abstractZh: string; cached: boolean }
  | { kind: 'failed'; article: Article; error: string };

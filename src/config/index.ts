import * as dotenv from 'dotenv';
import * as path from 'path';
import { CrawlerConfig, TranslatorConfig, TermSource } from '../types';

/**
 * 默认爬虫配置
 */
export const defaultCrawlerConfig: CrawlerConfig = {
  dbPath: 'papers.sqlite',
  concurrency: 3,
  rate: 1.5, // 每秒 1.5 个请求
  maxPages: 0, // 0 表示不限页数
  limitArticles: 0, // 0 表示不限篇数
  resume: true, // 已有英文摘要的文章不再重复抓取
  timeout: 30000,
  maxAttempts: 4,
  retryDelay: 1000,
  maxRetryDelay: 30000,
  jitter: 0.25,
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
};

/**
 * 默认翻译配置
 */
export const defaultTranslatorConfig: TranslatorConfig = {
  dbPath: 'papers.sqlite',
  model: 'gpt-4o-mini',
  temperature: 0.2,
  maxTokens: 2000,
  targetLanguage: '简体中文',
  concurrency: 3,
  rate: 1.5,
  maxItems: 0, // 0 表示处理全部待翻译记录
  timeout: 120000,
  maxAttempts: 4,
  retryDelay: 2000,
  maxRetryDelay: 60000,
  jitter: 0.25,
  termSource: 'vocabulary',
};

export function requestHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
  };
}

/**
 * 默认术语表文件
 */
export const defaultTermsFile = path.resolve(__dirname, '..', '..', 'data', 'terms.json');

/**
 * 页面选择器配置
 */
export const siteSelectors = {
  search: {
    hosts: ['nature.com'],
    articleLink: 'a[href]',
    articlePath: /^\/articles\/[^/]+\/?$/,
    nextLink: ['link[rel="next"][href]', 'a[rel="next"][href]'],
    nextText: ['next', 'next page'],
  },
  proceedings: {
    hosts: [
      'aclanthology.org',
      'proceedings.mlr.press',
      'papers.nips.cc',
      'proceedings.neurips.cc',
      'openaccess.thecvf.com',
    ],
    articleLink: 'a[href]',
    // ACL Anthology / PMLR / NeurIPS / CVF 的论文详情页路径
    articlePaths: [
      /^\/[A-Z0-9]\d{2}-\d{4}\/?$/,
      /^\/\d{4}\.[a-z0-9-]+\.\d+\/?$/,
      /^\/v\d+\/[\w-]+\.html$/,
      /^\/paper_files\/paper\/\d{4}\/hash\/[0-9a-f]+-Abstract[\w-]*\.html$/,
      /^\/content\/[\w-]+\/html\/[\w-]+_paper\.html$/,
    ],
    nextLink: [
      'a[rel="next"][href]',
      '.pagination .next a[href]',
      '.pagination a.next[href]',
      'a.next[href]',
      'a[aria-label="Next"][href]',
    ],
    pagination: '.pagination',
  },
};

/**
 * AI 提示模板配置
 */
export const aiPrompts = {
  translateSystem:
    '你是学术翻译助手，输出{targetLanguage}，忠实准确，风格正式。',

  translate: `请将下面英文摘要翻译为{targetLanguage}。
规则：
1) 下列术语在本文中首次出现时写成「英文术语（中文翻译）」，之后只保留英文术语：
{bilingual}
2) 下列术语已在其他文章中解释过，全文只保留英文术语，不要添加括号中文：
{monolingual}
3) 模型名、方法名、数据集名、缩写保留英文。
4) 不要添加原文没有的信息，不要扩写。
5) 只返回译文，不要包含其他说明文字。

英文摘要：
{abstract}`,

  extractTerms: `请从以下学术论文摘要中提取需要统一译名的专业术语（英文原文写法），用逗号分隔：
- 只提取摘要中原样出现的术语
- 不要提取普通词汇和人名
- 按首次出现的顺序排列

摘要：{abstract}

术语：`,
};

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * 读取 .env 文件到 process.env
 */
export function loadEnvironment(): void {
  dotenv.config();
}

/**
 * 从环境变量读取翻译配置
 */
export function translatorConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<TranslatorConfig> {
  const config: Partial<TranslatorConfig> = {};
  const apiKey = nonEmpty(env.OPENAI_API_KEY);
  const baseURL = nonEmpty(env.OPENAI_BASE_URL);
  const model = nonEmpty(env.AI_MODEL);
  const temperature = parseNumber(env.AI_TEMPERATURE);
  const maxTokens = parseNumber(env.AI_MAX_TOKENS);
  const dbPath = nonEmpty(env.PAPERS_DB);
  const termsFile = nonEmpty(env.TERMS_FILE);

  if (apiKey) config.apiKey = apiKey;
  if (baseURL) config.baseURL = baseURL;
  if (model) config.model = model;
  if (temperature !== undefined) config.temperature = temperature;
  if (maxTokens !== undefined) config.maxTokens = maxTokens;
  if (dbPath) config.dbPath = dbPath;
  if (termsFile) config.termsFile = termsFile;
  return config;
}

/**
 * 从环境变量读取爬虫配置
 */
export function crawlerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<CrawlerConfig> {
  const dbPath = nonEmpty(env.PAPERS_DB);
  return dbPath ? { dbPath } : {};
}

export function isTermSource(value: string): value is TermSource {
  return value === 'vocabulary' || value === 'llm';
}

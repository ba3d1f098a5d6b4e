import * as cheerio from 'cheerio';
import { ArticleFields } from './types';
import { cleanOptional, cleanText } from './utils';
import { ContentError } from './utils/errors';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: JsonObject, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string') {
      const cleaned = cleanOptional(value);
      if (cleaned) return cleaned;
    }
  }
  return null;
}

/**
 * 展开 JSON-LD 中的 @graph / mainEntity 嵌套
 */
function collectJsonLd(out: JsonObject[], value: unknown): void {
  if (Array.isArray(value)) {
    value.forEach((item) => collectJsonLd(out, item));
    return;
  }
  if (!isJsonObject(value)) return;
  if ('@graph' in value) {
    collectJsonLd(out, value['@graph']);
    return;
  }
  out.push(value);
  for (const key of ['mainEntity', 'mainEntityOfPage']) {
    if (key in value) collectJsonLd(out, value[key]);
  }
}

function readJsonLd($: cheerio.CheerioAPI): JsonObject[] {
  const objects: JsonObject[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;
    try {
      collectJsonLd(objects, JSON.parse(raw));
    } catch {
      // 页面上的 JSON-LD 常有语法错误，跳过该块
      return;
    }
  });
  return objects;
}

function isArticleType(type: unknown): boolean {
  return Array.isArray(type)
    ? type.some((t) => String(t).includes('Article'))
    : typeof type === 'string' && type.includes('Article');
}

function pickArticle(objects: JsonObject[]): JsonObject {
  return objects.find((o) => isArticleType(o['@type'])) ?? objects[0] ?? {};
}

function meta($: cheerio.CheerioAPI, ...selectors: string[]): string | null {
  for (const selector of selectors) {
    const value = cleanOptional($(selector).first().attr('content'));
    if (value) return value;
  }
  return null;
}

/**
 * 从 "Abstract" 标题之后的段落中拼出摘要
 */
function domAbstract($: cheerio.CheerioAPI): string | null {
  const direct = cleanOptional($('.acl-abstract, #abstract, .abstract').first().text());
  if (direct) return direct.replace(/^abstract[:\s]*/i, '') || null;

  const header = $('h1, h2, h3, h4')
    .toArray()
    .find((el) => cleanText($(el).text()).toLowerCase().includes('abstract'));
  if (!header) return null;

  const parts: string[] = [];
  for (const sibling of $(header).nextAll().toArray()) {
    if (/^h[1-4]$/i.test(sibling.tagName)) break;
    const paragraphs = sibling.tagName.toLowerCase() === 'p' ? $(sibling) : $(sibling).find('p');
    paragraphs.each((_, p) => {
      const text = cleanOptional($(p).text());
      if (text) parts.push(text);
    });
  }
  return cleanOptional(parts.join(' '));
}

/**
 * 提取文章详情页字段：JSON-LD 优先，其次 meta 标签，最后 DOM
 */
export function extractFields(html: string): ArticleFields {
  const $ = cheerio.load(html);
  const article = pickArticle(readJsonLd($));

  const title =
    stringField(article, 'headline', 'name') ??
    meta($, 'meta[name="citation_title"]', 'meta[property="og:title"]') ??
    cleanOptional($('title').first().text());

  const isPartOf = article['isPartOf'];
  const journal =
    (isJsonObject(isPartOf) ? stringField(isPartOf, 'name') : null) ??
    meta(
      $,
      'meta[name="citation_journal_title"]',
      'meta[name="citation_conference_title"]'
    );

  const publishedDate =
    stringField(article, 'datePublished', 'dateCreated') ??
    meta(
      $,
      'meta[name="citation_publication_date"]',
      'meta[name="citation_date"]',
      'meta[name="dc.date"]',
      'meta[property="article:published_time"]'
    );

  // 通用的 description 只有在页面声明为 Article 时才当作摘要
  const describesArticle = isArticleType(article['@type']);
  const abstractEn =
    stringField(article, 'abstract') ??
    (describesArticle ? stringField(article, 'description') : null) ??
    meta($, 'meta[name="citation_abstract"]', 'meta[name="dc.description"]') ??
    (describesArticle
      ? meta($, 'meta[property="og:description"]', 'meta[name="description"]')
      : null) ??
    domAbstract($);

  return { title, journal, publishedDate, abstractEn };
}

/**
 * 提取字段，缺少摘要时抛出 ContentError
 */
export function extractArticle(html: string, url: string): ArticleFields & { abstractEn: string } {
  const fields = extractFields(html);
  if (!fields.abstractEn) {
    throw new ContentError(`未找到摘要: ${url}`);
  }
  return { ...fields, abstractEn: fields.abstractEn };
}

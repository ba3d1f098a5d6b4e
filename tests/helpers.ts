/**
 * 测试共用的替身与页面构造函数
 */

import { Article, GlossaryContext, HttpResponse, HttpTransport, TranslationCapability } from '../src/types';

export const noSleep = async (_ms: number): Promise<void> => undefined;

type Route = HttpResponse | Error | (HttpResponse | Error)[];

/**
 * 进程内 HTTP 替身：按 URL 返回预设响应，数组按顺序逐个返回（最后一个重复）
 */
export class StubTransport implements HttpTransport {
  readonly calls: string[] = [];

  constructor(private readonly routes: Record<string, Route>) {}

  async get(url: string): Promise<HttpResponse> {
    this.calls.push(url);
    const route = this.routes[url];
    if (route === undefined) return { status: 404, body: '' };

    const next = Array.isArray(route) ? (route.length > 1 ? route.shift() : route[0]) : route;
    if (next === undefined) return { status: 404, body: '' };
    if (next instanceof Error) throw next;
    return next;
  }

  callsTo(url: string): number {
    return this.calls.filter((call) => call === url).length;
  }
}

export function ok(body: string): HttpResponse {
  return { status: 200, body };
}

export function listingPage(articlePaths: string[], nextHref?: string): string {
  const items = articlePaths
    .map((href, i) => `<li><a href="${href}">Article ${i + 1}</a></li>`)
    .join('\n');
  const next = nextHref ? `<a rel="next" href="${nextHref}">Next</a>` : '';
  return `<html><body><ul>${items}</ul><nav>${next}</nav></body></html>`;
}

export function articlePage(fields: { title: string; abstract?: string; journal?: string; date?: string }): string {
  const metas = [
    `<meta name="citation_title" content="${fields.title}">`,
    fields.journal ? `<meta name="citation_journal_title" content="${fields.journal}">` : '',
    fields.date ? `<meta name="citation_publication_date" content="${fields.date}">` : '',
    fields.abstract ? `<meta name="citation_abstract" content="${fields.abstract}">` : '',
  ].join('\n');
  return `<html><head>${metas}</head><body><h1>${fields.title}</h1></body></html>`;
}

export function makeArticle(articleUrl: string, abstractEn: string | null, overrides: Partial<Article> = {}): Article {
  return {
    articleUrl,
    searchUrl: null,
    title: null,
    journal: null,
    publishedDate: null,
    abstractEn,
    abstractEnHash: null,
    abstractZh: null,
    status: 'fetched',
    lastError: null,
    crawledAt: null,
    translatedAt: null,
    ...overrides,
  };
}

const DICTIONARY: Record<string, string> = {
  'diffusion model': '扩散模型',
  transformer: '变换器',
  'language model': '语言模型',
};

function escapeForPattern(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 翻译替身：原文加前缀「译文：」，并给每次出现的术语都加括注（包括不该加的），
 * 由 applyGlossary 负责修正
 */
export class StubTranslator implements TranslationCapability {
  readonly calls: { text: string; context: GlossaryContext }[] = [];

  constructor(private readonly fail?: (text: string, attempt: number) => Error | undefined) {}

  async translate(text: string, context: GlossaryContext): Promise<string> {
    this.calls.push({ text, context });
    const error = this.fail?.(text, this.calls.filter((call) => call.text === text).length);
    if (error) throw error;

    let result = text;
    for (const term of [...context.bilingual, ...context.monolingual]) {
      const rendering = DICTIONARY[term.toLowerCase()];
      if (!rendering) continue;
      result = result.replace(
        new RegExp(`(?<![A-Za-z])${escapeForPattern(term)}(?![A-Za-z])`, 'gi'),
        (match) => `${match}（${rendering}）`
      );
    }
    return `译文：${result}`;
  }
}

export function httpStatusError(status: number): Error {
  return Object.assign(new Error(`request failed with status ${status}`), { status });
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

/**
 * 统计同时进行中的调用数
 */
export class ConcurrencyGauge {
  inFlight = 0;
  peak = 0;

  async run<T>(call: () => Promise<T>, delayMs = 5): Promise<T> {
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      return await call();
    } finally {
      this.inFlight--;
    }
  }
}

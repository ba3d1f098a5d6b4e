import * as cheerio from 'cheerio';
import { NextPage, SiteAdapter } from '../types';
import { siteSelectors } from '../config';
import { cleanText, normalizeUrl } from '../utils';

const selectors = siteSelectors.search;

/**
 * 搜索结果列表页（nature.com 搜索页布局）
 */
export class SearchListingAdapter implements SiteAdapter {
  readonly kind = 'search';
  readonly name = '搜索结果列表';

  matches(url: URL): boolean {
    return selectors.hosts.some(
      (host) => url.hostname === host || url.hostname.endsWith(`.${host}`)
    );
  }

  extractLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];
    const seen = new Set<string>();

    $(selectors.articleLink).each((_, el) => {
      const href = $(el).attr('href');
      if (!href) return;
      const url = normalizeUrl(href, pageUrl);
      if (!url || seen.has(url)) return;
      if (!selectors.articlePath.test(new URL(url).pathname)) return;
      seen.add(url);
      links.push(url);
    });

    return links;
  }

  nextPage(html: string, currentUrl: string): NextPage {
    const $ = cheerio.load(html);
    const candidates = new Set<string>();

    for (const selector of selectors.nextLink) {
      $(selector).each((_, el) => {
        const url = normalizeUrl($(el).attr('href') || '', currentUrl);
        if (url) candidates.add(url);
      });
    }

    $('a[href]').each((_, el) => {
      const text = cleanText($(el).text()).toLowerCase();
      if (!selectors.nextText.includes(text)) return;
      const url = normalizeUrl($(el).attr('href') || '', currentUrl);
      if (url) candidates.add(url);
    });

    if (candidates.size === 0) return { kind: 'end' };
    if (candidates.size > 1) {
      return {
        kind: 'ambiguous',
        reason: `发现多个下一页链接: ${[...candidates].join(', ')}`,
      };
    }
    const [url] = [...candidates];
    return { kind: 'next', url };
  }
}

import * as cheerio from 'cheerio';
import { NextPage, SiteAdapter } from '../types';
import { siteSelectors } from '../config';
import { cleanText, normalizeUrl } from '../utils';

const selectors = siteSelectors.proceedings;

/**
 * 会议论文集列表页（ACL Anthology、PMLR、NeurIPS、CVF Open Access）
 */
export class ProceedingsListingAdapter implements SiteAdapter {
  readonly kind = 'proceedings';
  readonly name = '会议论文集列表';

  matches(url: URL): boolean {
    return selectors.hosts.includes(url.hostname);
  }

  extractLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];
    const seen = new Set<string>();

    $(selectors.articleLink).each((_, el) => {
      const url = normalizeUrl($(el).attr('href') || '', pageUrl);
      if (!url || seen.has(url)) return;
      const { pathname } = new URL(url);
      if (!selectors.articlePaths.some((pattern) => pattern.test(pathname))) return;
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

    if (candidates.size > 1) {
      return {
        kind: 'ambiguous',
        reason: `发现多个下一页链接: ${[...candidates].join(', ')}`,
      };
    }
    if (candidates.size === 1) {
      const [url] = [...candidates];
      return { kind: 'next', url };
    }

    // 没有下一页链接，但分页栏显示后面还有页：分页结构可能已变化
    const pagination = $(selectors.pagination).first();
    if (pagination.length === 0) return { kind: 'end' };

    const pages = pagination
      .find('a, span, li')
      .toArray()
      .map((el) => Number(cleanText($(el).text())))
      .filter((n) => Number.isInteger(n) && n > 0);
    const active = Number(
      cleanText(pagination.find('.active, [aria-current="page"]').first().text())
    );
    const last = pages.length > 0 ? Math.max(...pages) : 0;

    if (Number.isInteger(active) && active > 0 && active < last) {
      return {
        kind: 'ambiguous',
        reason: `分页栏显示第 ${active}/${last} 页，但没有找到下一页链接`,
      };
    }
    return { kind: 'end' };
  }
}

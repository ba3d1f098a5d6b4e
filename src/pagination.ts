import { PageFetcher, SiteAdapter, TraversalReport } from './types';
import { errorMessage, logger } from './utils';

export interface TraversalOptions {
  /** 最多访问的列表页数，0 表示不限 */
  maxPages?: number;
  signal?: AbortSignal;
}

/**
 * 分页遍历：从起始列表页开始逐页获取，产出去重后的文章链接
 *
 * 列表页获取失败时提前结束，已产出的链接仍然有效。
 */
export class PaginationTraversal {
  private state: TraversalReport = {
    pagesVisited: 0,
    articlesFound: 0,
    stopReason: 'exhausted',
  };

  constructor(
    private readonly startUrl: string,
    private readonly adapter: SiteAdapter,
    private readonly fetcher: PageFetcher,
    private readonly options: TraversalOptions = {}
  ) {}

  get report(): TraversalReport {
    return { ...this.state };
  }

  async *articleUrls(): AsyncGenerator<string> {
    const maxPages = this.options.maxPages ?? 0;
    const seenArticles = new Set<string>();
    const visitedPages = new Set<string>();
    let pageUrl = this.startUrl;
    this.state = { pagesVisited: 0, articlesFound: 0, stopReason: 'exhausted' };

    for (;;) {
      if (this.options.signal?.aborted) {
        this.stop('cancelled');
        return;
      }
      if (maxPages > 0 && this.state.pagesVisited >= maxPages) {
        this.stop('max_pages');
        return;
      }

      let html: string;
      try {
        html = (await this.fetcher.fetch(pageUrl)).body;
      } catch (error) {
        logger.warn(`列表页获取失败，停止翻页: ${pageUrl} - ${errorMessage(error)}`);
        this.stop('page_failed', `${pageUrl}: ${errorMessage(error)}`);
        return;
      }
      visitedPages.add(pageUrl);
      this.state.pagesVisited++;

      const links = this.adapter.extractLinks(html, pageUrl);
      let fresh = 0;
      for (const url of links) {
        if (seenArticles.has(url)) continue;
        seenArticles.add(url);
        this.state.articlesFound++;
        fresh++;
        yield url;
      }
      logger.info(
        `第 ${this.state.pagesVisited} 页: ${links.length} 个链接，新增 ${fresh} 个 (${pageUrl})`
      );

      const next = this.adapter.nextPage(html, pageUrl);
      if (next.kind === 'end') {
        this.stop('exhausted');
        return;
      }
      if (next.kind === 'ambiguous') {
        logger.warn(`下一页信号不明确，停止翻页: ${next.reason}`);
        this.stop('ambiguous_next', next.reason);
        return;
      }
      if (visitedPages.has(next.url)) {
        const reason = `下一页指向已访问的页面: ${next.url}`;
        logger.warn(reason);
        this.stop('ambiguous_next', reason);
        return;
      }
      pageUrl = next.url;
    }
  }

  private stop(reason: TraversalReport['stopReason'], error?: string): void {
    this.state.stopReason = reason;
    if (error) this.state.error = error;
  }
}

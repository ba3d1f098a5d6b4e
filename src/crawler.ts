import { v4 as uuidv4 } from 'uuid';
import {
  CrawlOutcome,
  CrawlRequest,
  CrawlSummary,
  CrawlerConfig,
  HttpTransport,
} from './types';
import { defaultCrawlerConfig, requestHeaders } from './config';
import { AxiosTransport, RetryingFetcher } from './fetcher';
import { extractArticle } from './extractor';
import { PaginationTraversal } from './pagination';
import { runBounded } from './pool';
import { resolveSiteAdapter } from './sites';
import { ArticleStore } from './store';
import { ConfigurationError } from './utils/errors';
import { RateLimiter } from './utils/rate-limiter';
import { errorMessage, logger, nowIso } from './utils';

export interface CrawlerDeps {
  /** 默认使用 axios */
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
}

interface DiscoveryState {
  limitReached: boolean;
}

/**
 * 学术文章爬虫
 *
 * 逐页遍历列表页，发现的文章链接交给有界并发池抓取详情页并写入数据库。
 */
export class ArticleCrawler {
  private config: CrawlerConfig;
  private transport: HttpTransport;

  constructor(
    private readonly store: ArticleStore,
    config: Partial<CrawlerConfig> = {},
    private readonly deps: CrawlerDeps = {}
  ) {
    this.config = { ...defaultCrawlerConfig, ...config };
    this.transport = deps.transport ?? new AxiosTransport(requestHeaders(this.config.userAgent));
  }

  /**
   * 执行一轮抓取
   */
  async crawl(request: CrawlRequest): Promise<CrawlSummary> {
    const { config } = this;
    const adapter = resolveSiteAdapter(request.site, request.startUrl);
    const limiter = new RateLimiter(config.rate, { sleep: this.deps.sleep });
    const fetcher = new RetryingFetcher(
      this.transport,
      limiter,
      {
        maxAttempts: config.maxAttempts,
        baseDelay: config.retryDelay,
        maxDelay: config.maxRetryDelay,
        jitter: config.jitter,
        sleep: this.deps.sleep,
      },
      config.timeout
    );
    const traversal = new PaginationTraversal(request.startUrl, adapter, fetcher, {
      maxPages: config.maxPages,
      signal: request.signal,
    });

    const summary: CrawlSummary = {
      runId: uuidv4(),
      startUrl: request.startUrl,
      discovered: 0,
      fetched: 0,
      failed: 0,
      skipped: 0,
      pagesVisited: 0,
      stopReason: 'exhausted',
      cancelled: false,
      errors: [],
    };
    const discovery: DiscoveryState = { limitReached: false };

    logger.info(`开始抓取 (${adapter.name}): ${request.startUrl}`);
    logger.debug(`运行 ID: ${summary.runId}`);

    const outcomes = runBounded(
      this.discover(traversal.articleUrls(), request.startUrl, summary, discovery),
      async (articleUrl: string): Promise<CrawlOutcome> => {
        try {
          const page = await fetcher.fetch(articleUrl);
          const fields = extractArticle(page.body, articleUrl);
          this.store.upsert({
            articleUrl,
            status: 'fetched',
            searchUrl: request.startUrl,
            ...fields,
            lastError: null,
            crawledAt: nowIso(),
          });
          return { kind: 'fetched', articleUrl, title: fields.title };
        } catch (error) {
          if (error instanceof ConfigurationError) throw error;
          return { kind: 'failed', articleUrl, error: this.recordFailure(articleUrl, request.startUrl, error) };
        }
      },
      { concurrency: config.concurrency, keyOf: (url) => url, signal: request.signal }
    );

    for await (const outcome of outcomes) {
      if (outcome.kind === 'fetched') {
        summary.fetched++;
        logger.info(`[${summary.fetched + summary.failed}] 已抓取: ${outcome.title || outcome.articleUrl}`);
      } else {
        summary.failed++;
        summary.errors.push(`${outcome.articleUrl}: ${outcome.error}`);
        logger.warn(`[${summary.fetched + summary.failed}] 抓取失败: ${outcome.articleUrl} - ${outcome.error}`);
      }
    }

    const report = traversal.report;
    summary.pagesVisited = report.pagesVisited;
    summary.cancelled = request.signal?.aborted ?? false;
    if (summary.cancelled) {
      summary.stopReason = 'cancelled';
    } else if (discovery.limitReached) {
      summary.stopReason = 'article_limit';
    } else {
      summary.stopReason = report.stopReason;
    }
    if (report.error) {
      summary.errors.unshift(report.error);
    }

    logger.info(
      `抓取结束 (${summary.stopReason}): 发现 ${summary.discovered} 篇，成功 ${summary.fetched} 篇，` +
        `失败 ${summary.failed} 篇，跳过 ${summary.skipped} 篇，列表页 ${summary.pagesVisited} 页`
    );
    return summary;
  }

  /**
   * 登记发现的链接，跳过已有摘要的文章，达到篇数上限后停止翻页
   */
  private async *discover(
    urls: AsyncGenerator<string>,
    searchUrl: string,
    summary: CrawlSummary,
    discovery: DiscoveryState
  ): AsyncGenerator<string> {
    const { limitArticles, resume } = this.config;

    for await (const articleUrl of urls) {
      summary.discovered++;
      try {
        this.store.upsert({ articleUrl, status: 'discovered', searchUrl });
      } catch (error) {
        logger.error(`登记文章失败: ${articleUrl} - ${errorMessage(error)}`);
        summary.errors.push(`${articleUrl}: ${errorMessage(error)}`);
      }

      if (resume && this.store.hasAbstract(articleUrl)) {
        summary.skipped++;
        logger.debug(`已有摘要，跳过: ${articleUrl}`);
      } else {
        yield articleUrl;
      }

      if (limitArticles > 0 && summary.discovered >= limitArticles) {
        discovery.limitReached = true;
        logger.info(`已达到文章数上限 ${limitArticles}，停止翻页`);
        return;
      }
    }
  }

  private recordFailure(articleUrl: string, searchUrl: string, error: unknown): string {
    const message = errorMessage(error);
    try {
      this.store.upsert({
        articleUrl,
        status: 'fetch_failed',
        searchUrl,
        lastError: message,
        crawledAt: nowIso(),
      });
    } catch (storeError) {
      logger.error(`记录失败状态时出错: ${articleUrl} - ${errorMessage(storeError)}`);
      return `${message}; ${errorMessage(storeError)}`;
    }
    return message;
  }
}

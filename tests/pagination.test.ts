import { PaginationTraversal } from '../src/pagination';
import { SearchListingAdapter } from '../src/sites';
import { FetchResult, PageFetcher } from '../src/types';
import { HttpError } from '../src/utils/errors';
import { collect, listingPage } from './helpers';

const BASE = 'https://www.nature.com';
const page = (n: number) => `${BASE}/search?q=diffusion&page=${n}`;
const article = (id: string) => `${BASE}/articles/${id}`;

class MapFetcher implements PageFetcher {
  readonly fetched: string[] = [];

  constructor(private readonly pages: Map<string, string>) {}

  async fetch(url: string): Promise<FetchResult> {
    this.fetched.push(url);
    const body = this.pages.get(url);
    if (body === undefined) throw new HttpError(url, 404);
    return { url, status: 200, body, attempts: 1 };
  }
}

function threePages(): Map<string, string> {
  return new Map([
    [page(1), listingPage(['/articles/a1', '/articles/a2'], '/search?q=diffusion&page=2')],
    [page(2), listingPage(['/articles/a3', '/articles/a4'], '/search?q=diffusion&page=3')],
    [page(3), listingPage(['/articles/a5', '/articles/a6'])],
  ]);
}

describe('分页遍历', () => {
  const adapter = new SearchListingAdapter();

  test('3 页各 2 篇：产出 6 个链接后正常结束', async () => {
    const traversal = new PaginationTraversal(page(1), adapter, new MapFetcher(threePages()));

    const urls = await collect(traversal.articleUrls());

    expect(urls).toEqual(['a1', 'a2', 'a3', 'a4', 'a5', 'a6'].map(article));
    expect(traversal.report).toEqual({ pagesVisited: 3, articlesFound: 6, stopReason: 'exhausted' });
  });

  test('maxPages 限制访问页数', async () => {
    const fetcher = new MapFetcher(threePages());
    const traversal = new PaginationTraversal(page(1), adapter, fetcher, { maxPages: 2 });

    const urls = await collect(traversal.articleUrls());

    expect(urls).toHaveLength(4);
    expect(fetcher.fetched).toEqual([page(1), page(2)]);
    expect(traversal.report.stopReason).toBe('max_pages');
  });

  test('列表页获取失败时停止，已产出的链接保留', async () => {
    const pages = threePages();
    pages.delete(page(2));
    const traversal = new PaginationTraversal(page(1), adapter, new MapFetcher(pages));

    const urls = await collect(traversal.articleUrls());

    expect(urls).toEqual([article('a1'), article('a2')]);
    expect(traversal.report.stopReason).toBe('page_failed');
    expect(traversal.report.error).toBe(`${page(2)}: HTTP 404: ${page(2)}`);
  });

  test('下一页指回已访问页面时停止，并对链接去重', async () => {
    const pages = new Map([
      [page(1), listingPage(['/articles/a1', '/articles/a2'], '/search?q=diffusion&page=2')],
      [page(2), listingPage(['/articles/a2', '/articles/a3'], '/search?q=diffusion&page=1')],
    ]);
    const traversal = new PaginationTraversal(page(1), adapter, new MapFetcher(pages));

    const urls = await collect(traversal.articleUrls());

    expect(urls).toEqual(['a1', 'a2', 'a3'].map(article));
    expect(traversal.report.stopReason).toBe('ambiguous_next');
    expect(traversal.report.pagesVisited).toBe(2);
  });

  test('取消后不再获取新的列表页', async () => {
    const controller = new AbortController();
    const fetcher = new MapFetcher(threePages());
    const traversal = new PaginationTraversal(page(1), adapter, fetcher, {
      signal: controller.signal,
    });

    const urls: string[] = [];
    for await (const url of traversal.articleUrls()) {
      urls.push(url);
      controller.abort();
    }

    expect(urls).toEqual([article('a1'), article('a2')]);
    expect(fetcher.fetched).toEqual([page(1)]);
    expect(traversal.report.stopReason).toBe('cancelled');
  });
});

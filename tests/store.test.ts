import { ArticleStore, mergeArticle } from '../src/store';
import { StorageError } from '../src/utils/errors';
import { sha256Text } from '../src/utils';

const SEARCH = 'https://www.nature.com/search?q=diffusion';
const url = (id: string) => `https://www.nature.com/articles/${id}`;

describe('文章存储', () => {
  let store: ArticleStore;

  beforeEach(() => {
    store = new ArticleStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  test('重复写入同一条记录是幂等的', () => {
    const input = {
      articleUrl: url('a1'),
      status: 'fetched' as const,
      searchUrl: SEARCH,
      title: 'Title A',
      abstractEn: 'Abstract A.',
      crawledAt: '2024-03-01T00:00:00.000Z',
    };

    const first = store.upsert(input);
    const second = store.upsert(input);

    expect(second).toEqual(first);
    expect(store.get(url('a1'))).toEqual(first);
    expect(store.countByStatus().fetched).toBe(1);
    expect(store.listForExport()).toHaveLength(1);
  });

  test('状态不回退，空值不覆盖已有字段', () => {
    store.upsert({
      articleUrl: url('a1'),
      status: 'fetched',
      title: 'Title A',
      journal: 'Nature',
      abstractEn: 'Abstract A.',
    });
    store.upsert({ articleUrl: url('a1'), status: 'discovered', searchUrl: SEARCH, title: '  ' });

    expect(store.get(url('a1'))).toMatchObject({
      status: 'fetched',
      title: 'Title A',
      journal: 'Nature',
      abstractEn: 'Abstract A.',
      abstractEnHash: sha256Text('Abstract A.'),
      searchUrl: SEARCH,
    });
  });

  test('抓取失败不会覆盖已抓取的记录', () => {
    store.upsert({ articleUrl: url('a1'), status: 'fetched', abstractEn: 'Abstract A.' });
    store.upsert({ articleUrl: url('a1'), status: 'fetch_failed', lastError: 'HTTP 503' });

    expect(store.get(url('a1'))).toMatchObject({ status: 'fetched', lastError: null });
  });

  test('listPending 按插入顺序返回有摘要的记录', () => {
    store.upsert({ articleUrl: url('a'), status: 'fetched', abstractEn: 'A.' });
    store.upsert({ articleUrl: url('b'), status: 'discovered' });
    store.upsert({ articleUrl: url('c'), status: 'translate_failed', abstractEn: 'C.' });
    store.upsert({ articleUrl: url('d'), status: 'fetched', abstractEn: 'D.' });

    const pending = store.listPending(['fetched', 'translate_failed']);
    expect(pending.map((a) => a.articleUrl)).toEqual([url('a'), url('c'), url('d')]);
    expect(store.listPending(['fetched', 'translate_failed'], 2).map((a) => a.articleUrl)).toEqual([
      url('a'),
      url('c'),
    ]);
    expect(store.listPending([])).toEqual([]);
  });

  test('保存译文后记录进入 translated，再次抓取不会清除译文', () => {
    store.upsert({ articleUrl: url('a1'), status: 'fetched', abstractEn: 'Abstract A.' });
    store.markTranslateFailed(url('a1'), 'timeout');
    store.updateTranslation(url('a1'), '摘要 A。', '2024-03-02T00:00:00.000Z');
    store.upsert({ articleUrl: url('a1'), status: 'fetched', abstractEn: 'Abstract A.' });

    expect(store.get(url('a1'))).toMatchObject({
      status: 'translated',
      abstractZh: '摘要 A。',
      translatedAt: '2024-03-02T00:00:00.000Z',
      lastError: null,
    });
    expect(store.listPending(['fetched', 'translate_failed'])).toEqual([]);
  });

  test('已翻译的记录不会被标记为翻译失败', () => {
    store.upsert({ articleUrl: url('a1'), status: 'fetched', abstractEn: 'Abstract A.' });
    store.upsert({ articleUrl: url('a2'), status: 'fetched', abstractEn: 'Abstract B.' });
    store.updateTranslation(url('a1'), '摘要 A。', '2024-03-02T00:00:00.000Z');

    store.markTranslateFailed(url('a1'), 'HTTP 400');
    store.markTranslateFailed(url('a2'), 'HTTP 400');

    expect(store.get(url('a1'))?.status).toBe('translated');
    expect(store.get(url('a2'))).toMatchObject({ status: 'translate_failed', lastError: 'HTTP 400' });
  });

  test('保存不存在记录的译文时报存储错误', () => {
    expect(() => store.updateTranslation(url('missing'), '译文', '2024-03-02T00:00:00.000Z')).toThrow(
      StorageError
    );
  });

  test('按英文摘要哈希查找已有译文', () => {
    store.upsert({ articleUrl: url('a1'), status: 'fetched', abstractEn: 'Same abstract.' });
    const hash = sha256Text('Same abstract.');
    expect(store.findCachedTranslation(hash)).toBeNull();

    store.updateTranslation(url('a1'), '相同的摘要。', '2024-03-02T00:00:00.000Z');
    expect(store.findCachedTranslation(hash)).toBe('相同的摘要。');
  });

  test('按列表页筛选导出记录', () => {
    store.upsert({ articleUrl: url('a1'), status: 'fetched', searchUrl: SEARCH, title: 'A' });
    store.upsert({ articleUrl: url('a2'), status: 'fetched', searchUrl: 'https://other.example.org/' });

    expect(store.listForExport(SEARCH)).toEqual([
      {
        article_url: url('a1'),
        title: 'A',
        journal: null,
        published_date: null,
        abstract_en: null,
        abstract_zh: null,
      },
    ]);
  });

  test('术语只保存第一次写入的译名', () => {
    store.saveGlossaryTerm({
      term: 'diffusion model',
      sourceTerm: 'Diffusion Model',
      translation: '扩散模型',
      firstArticleUrl: url('a1'),
    });
    store.saveGlossaryTerm({
      term: 'diffusion model',
      sourceTerm: 'diffusion model',
      translation: '扩散式模型',
      firstArticleUrl: url('a2'),
    });

    expect(store.loadGlossary()).toEqual([
      {
        term: 'diffusion model',
        sourceTerm: 'Diffusion Model',
        translation: '扩散模型',
        firstArticleUrl: url('a1'),
      },
    ]);
  });
});

describe('mergeArticle', () => {
  test('新记录使用写入的状态与字段', () => {
    const merged = mergeArticle(undefined, {
      articleUrl: url('a1'),
      status: 'discovered',
      title: '  Spaced   title ',
    });

    expect(merged).toMatchObject({ status: 'discovered', title: 'Spaced title', abstractEnHash: null });
  });

  test('状态前进时更新错误信息', () => {
    const existing = mergeArticle(undefined, {
      articleUrl: url('a1'),
      status: 'fetch_failed',
      lastError: 'HTTP 503',
    });
    const merged = mergeArticle(existing, {
      articleUrl: url('a1'),
      status: 'fetched',
      abstractEn: 'Abstract.',
    });

    expect(merged.status).toBe('fetched');
    expect(merged.lastError).toBeNull();
  });
});

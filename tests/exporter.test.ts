import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { exportArticles, isExportFormat } from '../src/exporter';
import { ArticleStore } from '../src/store';

const SEARCH = 'https://www.nature.com/search?q=diffusion';
const url = (id: string) => `https://www.nature.com/articles/${id}`;

describe('导出', () => {
  let dir: string;
  let store: ArticleStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-harvest-export-'));
    store = new ArticleStore(':memory:');
    store.upsert({
      articleUrl: url('a1'),
      status: 'fetched',
      searchUrl: SEARCH,
      title: 'Title A',
      journal: 'Nature',
      publishedDate: '2024-01-02',
      abstractEn: 'Short abstract.',
    });
    store.updateTranslation(url('a1'), '简短摘要。', '2024-01-03T00:00:00.000Z');
    store.upsert({ articleUrl: url('a2'), status: 'discovered', searchUrl: 'https://other.example.org/' });
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('CSV 包含固定表头', async () => {
    const file = path.join(dir, 'articles.csv');

    const count = await exportArticles(store, { format: 'csv', outputPath: file, searchUrl: SEARCH });

    expect(count).toBe(1);
    const lines = fs.readFileSync(file, 'utf8').trim().split('\n');
    expect(lines).toEqual([
      'article_url,title,journal,published_date,abstract_en,abstract_zh',
      `${url('a1')},Title A,Nature,2024-01-02,Short abstract.,简短摘要。`,
    ]);
  });

  test('JSONL 每行一条记录，空字段为 null', async () => {
    const file = path.join(dir, 'nested', 'articles.jsonl');

    const count = await exportArticles(store, { format: 'jsonl', outputPath: file });

    expect(count).toBe(2);
    const records = fs
      .readFileSync(file, 'utf8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    expect(records[1]).toEqual({
      article_url: url('a2'),
      title: null,
      journal: null,
      published_date: null,
      abstract_en: null,
      abstract_zh: null,
    });
    expect(records[0].abstract_zh).toBe('简短摘要。');
  });

  test('TXT 输出可读的文本块', async () => {
    const file = path.join(dir, 'articles.txt');

    await exportArticles(store, { format: 'txt', outputPath: file, searchUrl: SEARCH });

    expect(fs.readFileSync(file, 'utf8')).toBe(
      [
        '[1] Title A',
        `链接: ${url('a1')}`,
        '期刊: Nature',
        '日期: 2024-01-02',
        '',
        'Abstract:',
        'Short abstract.',
        '',
        '摘要:',
        '简短摘要。',
        '',
      ].join('\n')
    );
  });

  test('格式校验', () => {
    expect(isExportFormat('jsonl')).toBe(true);
    expect(isExportFormat('xlsx')).toBe(false);
  });
});

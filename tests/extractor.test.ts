import { extractArticle, extractFields } from '../src/extractor';
import { ContentError } from '../src/utils/errors';
import { articlePage } from './helpers';

describe('文章字段提取', () => {
  test('优先读取 JSON-LD（含 @graph 嵌套）', () => {
    const html = `<html><head>
      <script type="application/ld+json">
        {"@context": "https://schema.org", "@graph": [
          {"@type": "WebPage", "name": "Page"},
          {"@type": "ScholarlyArticle", "headline": "Sparse   Diffusion",
           "datePublished": "2024-01-02", "description": "  We study   sparse diffusion. ",
           "isPartOf": {"@type": "Periodical", "name": "Nature"}}
        ]}
      </script>
      <meta name="citation_title" content="Meta title">
    </head><body></body></html>`;

    expect(extractFields(html)).toEqual({
      title: 'Sparse Diffusion',
      journal: 'Nature',
      publishedDate: '2024-01-02',
      abstractEn: 'We study sparse diffusion.',
    });
  });

  test('JSON-LD 语法错误时回退到 citation meta', () => {
    const html = articlePage({
      title: 'Graph Transformers',
      abstract: 'A study of graph transformers.',
      journal: 'Nature Physics',
      date: '2023/05/01',
    }).replace('<head>', '<head><script type="application/ld+json">{broken</script>');

    expect(extractFields(html)).toEqual({
      title: 'Graph Transformers',
      journal: 'Nature Physics',
      publishedDate: '2023/05/01',
      abstractEn: 'A study of graph transformers.',
    });
  });

  test('从 Abstract 标题后的段落拼出摘要', () => {
    const html = `<html><head><title>Page Title</title></head><body>
      <h2>Abstract</h2>
      <p>First part.</p>
      <div><p>Second part.</p></div>
      <h2>Introduction</h2>
      <p>Not included.</p>
    </body></html>`;

    const fields = extractFields(html);

    expect(fields.title).toBe('Page Title');
    expect(fields.abstractEn).toBe('First part. Second part.');
    expect(fields.journal).toBeNull();
  });

  test('ACL Anthology 摘要块去掉标题', () => {
    const html = `<div class="card-body acl-abstract">
      <h5 class="card-title">Abstract</h5>
      <span>We present a parser.</span>
    </div>`;

    expect(extractFields(html).abstractEn).toBe('We present a parser.');
  });

  test('缺少摘要时抛出 ContentError', () => {
    const url = 'https://www.nature.com/articles/empty';
    const html = articlePage({ title: 'Untitled findings' });

    expect(() => extractArticle(html, url)).toThrow(ContentError);
    expect(() => extractArticle(html, url)).toThrow(`未找到摘要: ${url}`);
  });

  test('非文章页面的通用 description 不当作摘要', () => {
    const url = 'https://www.nature.com/articles/landing';
    const html = `<html><head>
      <script type="application/ld+json">{"@type": "WebPage", "description": "Latest research news."}</script>
      <meta property="og:description" content="Latest research news.">
      <meta name="description" content="Latest research news.">
      <meta name="citation_title" content="Landing">
    </head><body></body></html>`;

    expect(extractFields(html).abstractEn).toBeNull();
    expect(() => extractArticle(html, url)).toThrow(`未找到摘要: ${url}`);
  });

  test('声明为 Article 的页面可用 description 作为摘要', () => {
    const html = `<html><head>
      <script type="application/ld+json">{"@type": "NewsArticle", "headline": "Report"}</script>
      <meta name="description" content="A short summary of the report.">
    </head><body></body></html>`;

    expect(extractFields(html).abstractEn).toBe('A short summary of the report.');
  });
});

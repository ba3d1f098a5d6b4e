import * as createCsvWriter from 'csv-writer';
import * as fs from 'fs';
import * as path from 'path';
import { ExportFormat, ExportRecord } from './types';
import { ArticleStore } from './store';
import { ensureDirectoryExists, logger } from './utils';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'jsonl', 'txt'];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface ExportOptions {
  format: ExportFormat;
  outputPath: string;
  /** 只导出从该列表页发现的文章 */
  searchUrl?: string;
}

/**
 * 导出数据库中的文章，返回导出条数
 */
export async function exportArticles(store: ArticleStore, options: ExportOptions): Promise<number> {
  const records = store.listForExport(options.searchUrl);
  ensureDirectoryExists(path.dirname(path.resolve(options.outputPath)));

  switch (options.format) {
    case 'csv':
      await saveToCsv(records, options.outputPath);
      break;
    case 'jsonl':
      saveToJsonl(records, options.outputPath);
      break;
    case 'txt':
      saveToText(records, options.outputPath);
      break;
  }

  logger.info(`已导出 ${records.length} 条记录: ${options.outputPath}`);
  return records.length;
}

/**
 * 保存为CSV格式
 */
async function saveToCsv(records: ExportRecord[], csvPath: string): Promise<void> {
  const csvWriter = createCsvWriter.createObjectCsvWriter({
    path: csvPath,
    header: [
      { id: 'article_url', title: 'article_url' },
      { id: 'title', title: 'title' },
      { id: 'journal', title: 'journal' },
      { id: 'published_date', title: 'published_date' },
      { id: 'abstract_en', title: 'abstract_en' },
      { id: 'abstract_zh', title: 'abstract_zh' },
    ],
    encoding: 'utf8',
  });

  await csvWriter.writeRecords(
    records.map((record) => ({
      article_url: record.article_url,
      title: record.title ?? '',
      journal: record.journal ?? '',
      published_date: record.published_date ?? '',
      abstract_en: record.abstract_en ?? '',
      abstract_zh: record.abstract_zh ?? '',
    }))
  );
}

function saveToJsonl(records: ExportRecord[], filePath: string): void {
  const lines = records.map((record) => JSON.stringify(record));
  fs.writeFileSync(filePath, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8');
}

/**
 * 纯文本格式，便于直接阅读
 */
function saveToText(records: ExportRecord[], filePath: string): void {
  const blocks = records.map((record, index) =>
    [
      `[${index + 1}] ${record.title ?? '(无标题)'}`,
      `链接: ${record.article_url}`,
      `期刊: ${record.journal ?? ''}`,
      `日期: ${record.published_date ?? ''}`,
      '',
      'Abstract:',
      record.abstract_en ?? '',
      '',
      '摘要:',
      record.abstract_zh ?? '',
    ].join('\n')
  );
  fs.writeFileSync(filePath, blocks.length > 0 ? `${blocks.join('\n\n---\n\n')}\n` : '', 'utf8');
}

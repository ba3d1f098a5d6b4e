#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import { ArticleCrawler } from './crawler';
import { AbstractTranslator } from './translator';
import { exportArticles, isExportFormat } from './exporter';
import { ChatTranslator, createTermSegmenter } from './ai';
import { ArticleStore } from './store';
import { getAvailableSites, isSiteSelection } from './sites';
import {
  crawlerConfigFromEnv,
  defaultCrawlerConfig,
  defaultTranslatorConfig,
  isTermSource,
  loadEnvironment,
  translatorConfigFromEnv,
} from './config';
import {
  CrawlSummary,
  CrawlerConfig,
  ExportFormat,
  TranslateSummary,
  TranslatorConfig,
} from './types';
import { ConfigurationError, HarvestError } from './utils/errors';
import { errorMessage, logger } from './utils';

interface CrawlCommandOptions {
  startUrl: string;
  site: string;
  db?: string;
  maxPages?: string;
  limitArticles?: string;
  concurrency?: string;
  rate?: string;
  timeout?: string;
  maxAttempts?: string;
  resume: boolean;
  exportFormat?: string;
  exportPath?: string;
}

interface TranslateCommandOptions {
  db?: string;
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  maxItems?: string;
  concurrency?: string;
  rate?: string;
  terms?: string;
  termSource?: string;
}

interface ExportCommandOptions {
  format: string;
  out: string;
  db?: string;
  searchUrl?: string;
}

interface StatusCommandOptions {
  db?: string;
}

function numberOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`参数 ${name} 必须是非负数: ${value}`);
  }
  return parsed;
}

function exportFormatOption(value: string): ExportFormat {
  if (!isExportFormat(value)) {
    throw new ConfigurationError(`不支持的导出格式: ${value}（可选 csv|jsonl|txt）`);
  }
  return value;
}

/**
 * 去掉未设置的字段，避免覆盖默认值
 */
function defined<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) result[key] = values[key];
  }
  return result;
}

/**
 * 主程序类
 */
class PaperHarvestApp {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * 设置命令行参数
   */
  private setupCommands(): void {
    this.program
      .name('paper-harvest')
      .description('学术文章摘要采集工具 - 分页抓取文章摘要并翻译为中文')
      .version('1.0.0');

    this.program
      .command('crawl')
      .description('从列表页开始逐页抓取文章摘要')
      .requiredOption('-u, --start-url <url>', '起始列表页 URL')
      .option('-s, --site <site>', `站点类型 (auto|${getAvailableSites().join('|')})`, 'auto')
      .option('--db <path>', 'SQLite 数据库路径')
      .option('--max-pages <n>', '最多访问的列表页数 (0 不限)')
      .option('--limit-articles <n>', '最多处理的文章数 (0 不限)')
      .option('-c, --concurrency <n>', '并发抓取数')
      .option('--rate <r>', '每秒请求数 (0 不限速)')
      .option('--timeout <ms>', '单次请求超时(毫秒)')
      .option('--max-attempts <n>', '单个请求最多尝试次数')
      .option('--no-resume', '重新抓取已有摘要的文章')
      .option('--export-format <format>', '抓取完成后导出 (csv|jsonl|txt)')
      .option('--export-path <path>', '导出文件路径')
      .action(async (options: CrawlCommandOptions) => {
        await this.handleCrawlCommand(options);
      });

    this.program
      .command('translate')
      .description('将已抓取的英文摘要翻译为中文')
      .option('--db <path>', 'SQLite 数据库路径')
      .option('-m, --model <model>', '模型名称')
      .option('--base-url <url>', 'OpenAI 兼容接口地址')
      .option('--api-key <key>', 'API Key（默认读取 OPENAI_API_KEY）')
      .option('--max-items <n>', '本轮最多翻译的条数 (0 不限)')
      .option('-c, --concurrency <n>', '并发翻译数')
      .option('--rate <r>', '每秒请求数 (0 不限速)')
      .option('--terms <file>', '术语表文件 (JSON)')
      .option('--term-source <source>', '术语来源 (vocabulary|llm)')
      .action(async (options: TranslateCommandOptions) => {
        await this.handleTranslateCommand(options);
      });

    this.program
      .command('export')
      .description('导出数据库中的文章')
      .requiredOption('-f, --format <format>', '导出格式 (csv|jsonl|txt)')
      .requiredOption('-o, --out <path>', '输出文件路径')
      .option('--db <path>', 'SQLite 数据库路径')
      .option('--search-url <url>', '只导出从该列表页发现的文章')
      .action(async (options: ExportCommandOptions) => {
        await this.handleExportCommand(options);
      });

    this.program
      .command('status')
      .description('查看数据库中各状态的文章数')
      .option('--db <path>', 'SQLite 数据库路径')
      .action((options: StatusCommandOptions) => {
        this.handleStatusCommand(options);
      });
  }

  /**
   * 处理抓取命令
   */
  private async handleCrawlCommand(options: CrawlCommandOptions): Promise<void> {
    await this.runCommand('抓取', async (signal) => {
      if (!isSiteSelection(options.site)) {
        throw new ConfigurationError(`未知的站点类型: ${options.site}`);
      }
      const exportFormat = options.exportFormat
        ? exportFormatOption(options.exportFormat)
        : undefined;

      const config: CrawlerConfig = {
        ...defaultCrawlerConfig,
        ...crawlerConfigFromEnv(),
        ...defined({
          dbPath: options.db,
          maxPages: numberOption(options.maxPages, '--max-pages'),
          limitArticles: numberOption(options.limitArticles, '--limit-articles'),
          concurrency: numberOption(options.concurrency, '--concurrency'),
          rate: numberOption(options.rate, '--rate'),
          timeout: numberOption(options.timeout, '--timeout'),
          maxAttempts: numberOption(options.maxAttempts, '--max-attempts'),
        }),
        resume: options.resume,
      };

      logger.info('=== 文章抓取开始运行 ===');
      const store = new ArticleStore(config.dbPath);
      try {
        const crawler = new ArticleCrawler(store, config);
        const summary = await crawler.crawl({
          startUrl: options.startUrl,
          site: options.site,
          signal,
        });
        this.displayCrawlStatistics(summary);

        if (exportFormat) {
          const outputPath = path.resolve(
            options.exportPath ?? path.join('output', `articles.${exportFormat}`)
          );
          await exportArticles(store, {
            format: exportFormat,
            outputPath,
            searchUrl: options.startUrl,
          });
          console.log(`\n结果已保存到: ${outputPath}`);
        }
      } finally {
        store.close();
      }
    });
  }

  /**
   * 处理翻译命令
   */
  private async handleTranslateCommand(options: TranslateCommandOptions): Promise<void> {
    await this.runCommand('翻译', async (signal) => {
      const termSource = options.termSource;
      if (termSource !== undefined && !isTermSource(termSource)) {
        throw new ConfigurationError(`未知的术语来源: ${termSource}（可选 vocabulary|llm）`);
      }

      const config: TranslatorConfig = {
        ...defaultTranslatorConfig,
        ...translatorConfigFromEnv(),
        ...defined({
          dbPath: options.db,
          model: options.model,
          baseURL: options.baseUrl,
          apiKey: options.apiKey,
          maxItems: numberOption(options.maxItems, '--max-items'),
          concurrency: numberOption(options.concurrency, '--concurrency'),
          rate: numberOption(options.rate, '--rate'),
          termsFile: options.terms ? path.resolve(options.terms) : undefined,
          termSource,
        }),
      };

      logger.info('=== 摘要翻译开始运行 ===');
      logger.info(`模型: ${config.model}${config.baseURL ? ` (${config.baseURL})` : ''}`);
      const translator = new ChatTranslator(config);
      const segmenter = createTermSegmenter(config, translator);

      const store = new ArticleStore(config.dbPath);
      try {
        const summary = await new AbstractTranslator(store, config, {
          translator,
          segmenter,
        }).translate({ signal });
        this.displayTranslateStatistics(summary);
      } finally {
        store.close();
      }
    });
  }

  /**
   * 处理导出命令
   */
  private async handleExportCommand(options: ExportCommandOptions): Promise<void> {
    await this.runCommand('导出', async () => {
      const format = exportFormatOption(options.format);
      const store = new ArticleStore(
        options.db ?? crawlerConfigFromEnv().dbPath ?? defaultCrawlerConfig.dbPath
      );
      try {
        const outputPath = path.resolve(options.out);
        const count = await exportArticles(store, {
          format,
          outputPath,
          searchUrl: options.searchUrl,
        });
        console.log(`\n已导出 ${count} 条记录到: ${outputPath}`);
      } finally {
        store.close();
      }
    });
  }

  private handleStatusCommand(options: StatusCommandOptions): void {
    const store = new ArticleStore(
      options.db ?? crawlerConfigFromEnv().dbPath ?? defaultCrawlerConfig.dbPath
    );
    try {
      console.log('\n=== 文章状态 ===');
      for (const [status, count] of Object.entries(store.countByStatus())) {
        console.log(`${status}: ${count} 篇`);
      }
    } finally {
      store.close();
    }
  }

  /**
   * 运行命令：Ctrl+C 只停止派发新任务，致命错误以退出码 1 结束
   */
  private async runCommand(
    label: string,
    action: (signal: AbortSignal) => Promise<void>
  ): Promise<void> {
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('收到中断信号，等待进行中的任务完成...');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      await action(controller.signal);
    } catch (error) {
      const detail = error instanceof HarvestError ? `[${error.kind}] ` : '';
      logger.error(`${label}运行失败: ${detail}${errorMessage(error)}`);
      process.exitCode = 1;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  }

  /**
   * 显示抓取统计信息
   */
  private displayCrawlStatistics(summary: CrawlSummary): void {
    console.log('\n=== 抓取统计 ===');
    console.log(`起始页面: ${summary.startUrl}`);
    console.log(`结束原因: ${summary.stopReason}${summary.cancelled ? '（已取消）' : ''}`);
    console.log(`列表页数: ${summary.pagesVisited} 页`);
    console.log(`发现文章: ${summary.discovered} 篇`);
    console.log(`成功抓取: ${summary.fetched} 篇`);
    console.log(`跳过已有: ${summary.skipped} 篇`);
    console.log(`失败数量: ${summary.failed} 篇`);
    this.displayErrors(summary.errors);
  }

  /**
   * 显示翻译统计信息
   */
  private displayTranslateStatistics(summary: TranslateSummary): void {
    console.log('\n=== 翻译统计 ===');
    console.log(`提交翻译: ${summary.submitted} 篇${summary.cancelled ? '（已取消）' : ''}`);
    console.log(`翻译成功: ${summary.translated} 篇`);
    console.log(`复用缓存: ${summary.cached} 篇`);
    console.log(`失败数量: ${summary.failed} 篇`);
    this.displayErrors(summary.errors);
  }

  private displayErrors(errors: string[]): void {
    if (errors.length === 0) return;
    console.log('\n=== 错误信息 ===');
    errors.forEach((error, index) => {
      console.log(`${index + 1}. ${error}`);
    });
  }

  /**
   * 运行程序
   */
  async run(): Promise<void> {
    await this.program.parseAsync(process.argv);
  }
}

// 运行主程序
if (require.main === module) {
  loadEnvironment();
  const app = new PaperHarvestApp();
  app.run().catch((error: unknown) => {
    logger.error('程序运行出错:', error);
    process.exit(1);
  });
}

export { PaperHarvestApp };
export { ArticleCrawler } from './crawler';
export { AbstractTranslator } from './translator';
export { exportArticles } from './exporter';
export { ArticleStore } from './store';
export * from './types';

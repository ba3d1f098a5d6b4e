import { v4 as uuidv4 } from 'uuid';
import {
  TermSegmenter,
  TranslateRequest,
  TranslateSummary,
  TranslationCapability,
  TranslatorConfig,
} from './types';
import { defaultTranslatorConfig } from './config';
import { Glossary } from './ai/glossary';
import { TranslationPool } from './ai/translation-pool';
import { ArticleStore } from './store';
import { RateLimiter } from './utils/rate-limiter';
import { errorMessage, logger, nowIso } from './utils';

export interface TranslatorDeps {
  translator: TranslationCapability;
  segmenter: TermSegmenter;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 摘要翻译任务：读取已抓取的记录，翻译后写回数据库
 */
export class AbstractTranslator {
  private config: TranslatorConfig;

  constructor(
    private readonly store: ArticleStore,
    config: Partial<TranslatorConfig>,
    private readonly deps: TranslatorDeps
  ) {
    this.config = { ...defaultTranslatorConfig, ...config };
  }

  async translate(request: TranslateRequest = {}): Promise<TranslateSummary> {
    const { config, store } = this;
    const summary: TranslateSummary = {
      runId: uuidv4(),
      submitted: 0,
      translated: 0,
      failed: 0,
      cached: 0,
      cancelled: false,
      errors: [],
    };

    const pending = store.listPending(['fetched', 'translate_failed'], config.maxItems);
    summary.submitted = pending.length;
    if (pending.length === 0) {
      logger.info('没有待翻译的摘要');
      return summary;
    }

    const seed = store.loadGlossary();
    const glossary = new Glossary(seed, {
      saveTerm: (term) => {
        try {
          store.saveGlossaryTerm(term);
        } catch (error) {
          logger.warn(`术语保存失败: ${term.sourceTerm} - ${errorMessage(error)}`);
          summary.errors.push(`glossary ${term.term}: ${errorMessage(error)}`);
        }
      },
    });
    logger.info(`开始翻译 ${pending.length} 篇摘要（已有术语 ${seed.length} 条）`);

    const pool = new TranslationPool({
      translator: this.deps.translator,
      segmenter: this.deps.segmenter,
      glossary,
      limiter: new RateLimiter(config.rate, { sleep: this.deps.sleep }),
      retry: {
        maxAttempts: config.maxAttempts,
        baseDelay: config.retryDelay,
        maxDelay: config.maxRetryDelay,
        jitter: config.jitter,
        sleep: this.deps.sleep,
      },
      targetLanguage: config.targetLanguage,
      cachedTranslation: (article) =>
        article.abstractEnHash ? store.findCachedTranslation(article.abstractEnHash) : null,
    });

    let index = 0;
    for await (const outcome of pool.translateAll(pending, {
      concurrency: config.concurrency,
      signal: request.signal,
    })) {
      index++;
      const progress = `[${index}/${pending.length}]`;
      const { article } = outcome;

      if (outcome.kind === 'translated') {
        try {
          store.updateTranslation(article.articleUrl, outcome.abstractZh, nowIso());
          summary.translated++;
          if (outcome.cached) summary.cached++;
          logger.info(
            `${progress} 翻译完成${outcome.cached ? '（复用缓存）' : ''}: ${article.title || article.articleUrl}`
          );
        } catch (error) {
          summary.failed++;
          summary.errors.push(`${article.articleUrl}: ${errorMessage(error)}`);
          logger.error(`${progress} 译文保存失败: ${article.articleUrl} - ${errorMessage(error)}`);
        }
        continue;
      }

      summary.failed++;
      summary.errors.push(`${article.articleUrl}: ${outcome.error}`);
      logger.warn(`${progress} 翻译失败: ${article.articleUrl} - ${outcome.error}`);
      try {
        store.markTranslateFailed(article.articleUrl, outcome.error);
      } catch (error) {
        logger.error(`标记翻译失败时出错: ${article.articleUrl} - ${errorMessage(error)}`);
      }
    }

    summary.cancelled = request.signal?.aborted ?? false;
    logger.info(
      `翻译结束${summary.cancelled ? '（已取消）' : ''}: 成功 ${summary.translated} 篇` +
        `（缓存 ${summary.cached} 篇），失败 ${summary.failed} 篇，术语表共 ${glossary.size} 条`
    );
    return summary;
  }
}

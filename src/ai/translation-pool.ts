import {
  Article,
  TermSegmenter,
  TranslationCapability,
  TranslationOutcome,
} from '../types';
import { runBounded } from '../pool';
import { RateLimiter } from '../utils/rate-limiter';
import { RetryPolicy } from '../utils/retry';
import { ContentError, classifyModelError } from '../utils/errors';
import { cleanText, errorMessage, logger } from '../utils';
import { Glossary, applyGlossary } from './glossary';

export interface TranslationPoolDeps {
  translator: TranslationCapability;
  segmenter: TermSegmenter;
  glossary: Glossary;
  limiter: RateLimiter;
  retry: {
    maxAttempts: number;
    baseDelay: number;
    maxDelay: number;
    jitter: number;
    sleep?: (ms: number) => Promise<void>;
  };
  targetLanguage: string;
  /** 相同英文摘要已有译文时直接复用，不调用模型 */
  cachedTranslation?: (article: Article) => string | null;
}

export interface TranslateAllOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * 并发翻译摘要，并通过共享术语表保证术语首次出现双语、之后只保留英文
 */
export class TranslationPool {
  private readonly policy: RetryPolicy;

  constructor(private readonly deps: TranslationPoolDeps) {
    this.policy = new RetryPolicy({
      ...deps.retry,
      beforeAttempt: () => deps.limiter.acquire(),
    });
  }

  translateAll(
    articles: Iterable<Article> | AsyncIterable<Article>,
    options: TranslateAllOptions
  ): AsyncGenerator<TranslationOutcome> {
    return runBounded(articles, (article) => this.translateOne(article), {
      concurrency: options.concurrency,
      keyOf: (article) => article.articleUrl,
      signal: options.signal,
    });
  }

  async translateOne(article: Article): Promise<TranslationOutcome> {
    const abstractEn = article.abstractEn ? cleanText(article.abstractEn) : '';
    if (!abstractEn) {
      return { kind: 'failed', article, error: '缺少英文摘要' };
    }

    const { glossary, segmenter } = this.deps;
    let claimed = false;
    try {
      const terms = segmenter.remote
        ? await this.callModel(
            () => segmenter.segment(abstractEn),
            `术语提取 ${article.title || article.articleUrl}`
          )
        : await segmenter.segment(abstractEn);
      const plan = await glossary.claim(terms, article.articleUrl);
      claimed = true;

      const cached = this.deps.cachedTranslation?.(article) ?? null;
      const raw = cached ?? (await this.callTranslator(abstractEn, plan, article));
      const { text, renderings } = applyGlossary(raw, plan);
      const abstractZh = text.trim();
      if (!abstractZh) {
        throw new ContentError('模型返回空译文');
      }

      await glossary.assign(renderings, article.articleUrl);
      logger.debug(
        `术语: 新引入 ${plan.bilingual.length} 个，沿用 ${plan.monolingual.length} 个 (${article.articleUrl})`
      );
      return { kind: 'translated', article, abstractZh, cached: cached !== null };
    } catch (error) {
      if (claimed) await glossary.release(article.articleUrl);
      return { kind: 'failed', article, error: errorMessage(error) };
    }
  }

  private callTranslator(
    text: string,
    plan: { bilingual: string[]; monolingual: string[] },
    article: Article
  ): Promise<string> {
    const context = {
      targetLanguage: this.deps.targetLanguage,
      bilingual: plan.bilingual,
      monolingual: plan.monolingual,
    };
    return this.callModel(
      () => this.deps.translator.translate(text, context),
      `翻译 ${article.title || article.articleUrl}`
    );
  }

  /**
   * 模型调用统一经过限速器和重试策略
   */
  private callModel<T>(call: () => Promise<T> | T, label: string): Promise<T> {
    return this.policy.execute(async () => {
      try {
        return await call();
      } catch (error) {
        throw classifyModelError(error);
      }
    }, label);
  }
}

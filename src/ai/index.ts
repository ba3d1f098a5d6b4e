import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, MessageContent, SystemMessage } from '@langchain/core/messages';
import {
  GlossaryContext,
  TermSegmenter,
  TranslationCapability,
  TranslatorConfig,
} from '../types';
import { aiPrompts, defaultTermsFile } from '../config';
import { ConfigurationError, ModelError, classifyModelError } from '../utils/errors';
import { cleanText, logger, normalizeTerm } from '../utils';
import { VocabularySegmenter, loadVocabulary } from './segmenter';

export { Glossary, applyGlossary } from './glossary';
export { TranslationPool } from './translation-pool';
export { VocabularySegmenter, loadVocabulary } from './segmenter';

function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

function formatTerms(terms: string[]): string {
  return terms.length > 0 ? terms.map((term) => `- ${term}`).join('\n') : '（无）';
}

/**
 * 基于 OpenAI 兼容接口的摘要翻译器
 *
 * 客户端自身不重试（maxRetries: 0），重试与限速由调用方的 RetryPolicy 负责。
 */
export class ChatTranslator implements TranslationCapability {
  private llm: ChatOpenAI;

  constructor(config: TranslatorConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('缺少 OPENAI_API_KEY，无法调用翻译模型');
    }

    this.llm = new ChatOpenAI({
      apiKey: config.apiKey,
      model: config.model,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      maxRetries: 0,
      timeout: config.timeout,
      ...(config.baseURL ? { configuration: { baseURL: config.baseURL } } : {}),
    });
  }

  /**
   * 单次模型调用，失败时抛出已分类的错误
   */
  async complete(system: string, prompt: string): Promise<string> {
    let content: MessageContent;
    try {
      const response = await this.llm.invoke([
        new SystemMessage(system),
        new HumanMessage(prompt),
      ]);
      content = response.content;
    } catch (error) {
      throw classifyModelError(error);
    }

    const text = messageText(content).trim();
    if (!text) {
      throw new ModelError('模型返回空内容', 422);
    }
    return text;
  }

  translate(text: string, context: GlossaryContext): Promise<string> {
    const system = aiPrompts.translateSystem.replace('{targetLanguage}', context.targetLanguage);
    const prompt = aiPrompts.translate
      .replace('{targetLanguage}', context.targetLanguage)
      .replace('{bilingual}', formatTerms(context.bilingual))
      .replace('{monolingual}', formatTerms(context.monolingual))
      .replace('{abstract}', text);
    return this.complete(system, prompt);
  }
}

/**
 * 由模型提取术语
 *
 * 只保留摘要中原样出现的术语，避免模型改写后无法在译文中定位。
 */
export class LlmTermExtractor implements TermSegmenter {
  readonly remote = true;

  constructor(private readonly translator: ChatTranslator, private readonly targetLanguage: string) {}

  async segment(text: string): Promise<string[]> {
    const prompt = aiPrompts.extractTerms.replace('{abstract}', text);
    const system = aiPrompts.translateSystem.replace('{targetLanguage}', this.targetLanguage);
    const raw = await this.translator.complete(system, prompt);
    const haystack = normalizeTerm(text);
    const seen = new Set<string>();

    return raw
      .split(/[,，\n]/)
      .map((term) => cleanText(term.replace(/^[-*\d.\s]+/, '')))
      .filter((term) => {
        const key = normalizeTerm(term);
        if (!key || seen.has(key) || !haystack.includes(key)) return false;
        seen.add(key);
        return true;
      });
  }
}

/**
 * 根据配置创建术语切分器
 */
export function createTermSegmenter(
  config: TranslatorConfig,
  translator: ChatTranslator
): TermSegmenter {
  if (config.termSource === 'llm') {
    logger.info('术语来源: 模型提取');
    return new LlmTermExtractor(translator, config.targetLanguage);
  }
  const file = config.termsFile ?? defaultTermsFile;
  const segmenter = new VocabularySegmenter(loadVocabulary(file));
  logger.info(`术语来源: 术语表 ${file}（${segmenter.size} 条）`);
  return segmenter;
}

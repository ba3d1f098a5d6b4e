import { GlossaryTerm } from '../types';
import { escapeRegExp, logger, normalizeTerm } from '../utils';

/**
 * 互斥锁：排队执行临界区
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * 术语表持久化接口
 */
export interface GlossarySink {
  saveTerm(term: GlossaryTerm): void | Promise<void>;
}

export interface GlossaryPlan {
  /** 本文首次引入的术语（原文写法） */
  bilingual: string[];
  /** 已被其他文章引入的术语 */
  monolingual: string[];
}

interface Entry extends GlossaryTerm {
  assigned: boolean;
}

/**
 * 全局术语表
 *
 * 同一个术语只由第一个登记它的文章以双语形式给出，其余文章只保留英文。
 * claim / assign / release 都在同一把锁内完成读取-判断-登记。
 */
export class Glossary {
  private readonly entries = new Map<string, Entry>();
  private readonly lock = new Mutex();

  constructor(seed: GlossaryTerm[] = [], private readonly sink?: GlossarySink) {
    for (const term of seed) {
      this.entries.set(normalizeTerm(term.term), { ...term, assigned: true });
    }
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(term: string): GlossaryTerm | undefined {
    const entry = this.entries.get(normalizeTerm(term));
    if (!entry) return undefined;
    const { assigned, ...rest } = entry;
    return assigned ? rest : { ...rest, translation: null };
  }

  /**
   * 为一篇文章登记术语：未出现过的归入 bilingual 并记在该文章名下
   */
  claim(terms: string[], articleUrl: string): Promise<GlossaryPlan> {
    return this.lock.runExclusive(() => {
      const plan: GlossaryPlan = { bilingual: [], monolingual: [] };
      const seen = new Set<string>();
      for (const sourceTerm of terms) {
        const term = normalizeTerm(sourceTerm);
        if (!term || seen.has(term)) continue;
        seen.add(term);

        const entry = this.entries.get(term);
        if (entry && entry.firstArticleUrl !== articleUrl) {
          plan.monolingual.push(sourceTerm);
          continue;
        }
        if (!entry) {
          this.entries.set(term, {
            term,
            sourceTerm,
            translation: null,
            firstArticleUrl: articleUrl,
            assigned: false,
          });
        }
        plan.bilingual.push(sourceTerm);
      }
      return plan;
    });
  }

  /**
   * 写入规范译名；只有登记该术语的文章可以写入，且只写一次
   */
  assign(renderings: Map<string, string | null>, articleUrl: string): Promise<GlossaryTerm[]> {
    return this.lock.runExclusive(async () => {
      const saved: GlossaryTerm[] = [];
      for (const [sourceTerm, translation] of renderings) {
        const entry = this.entries.get(normalizeTerm(sourceTerm));
        if (!entry || entry.assigned || entry.firstArticleUrl !== articleUrl) continue;
        entry.translation = translation;
        entry.assigned = true;
        const { assigned, ...term } = entry;
        if (this.sink) await this.sink.saveTerm(term);
        saved.push(term);
      }
      return saved;
    });
  }

  /**
   * 翻译失败时释放该文章尚未写入译名的术语，让后续文章重新引入
   */
  release(articleUrl: string): Promise<number> {
    return this.lock.runExclusive(() => {
      let released = 0;
      for (const [term, entry] of this.entries) {
        if (entry.firstArticleUrl === articleUrl && !entry.assigned) {
          this.entries.delete(term);
          released++;
        }
      }
      if (released > 0) {
        logger.debug(`释放 ${released} 个术语: ${articleUrl}`);
      }
      return released;
    });
  }
}

// 只处理含中文的括注，保留 "(DM)" 这类英文缩写
const ANNOTATION = '\\s*[（(]([^（）()]*[\\u4e00-\\u9fff][^（）()]*)[）)]';

// 连字符也算词内字符："self-supervised learning" 里不单独匹配 "supervised learning"
const WORD_BEFORE = '(?<![A-Za-z0-9-])';
const WORD_AFTER = '(?![A-Za-z0-9-])';

function termPattern(term: string): string {
  return term.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
}

export interface RenderedText {
  text: string;
  /** bilingual 术语的括注译名；未找到括注时为 null */
  renderings: Map<string, string | null>;
}

/**
 * 按术语计划修正译文中的括注
 *
 * - bilingual 术语：保留第一次出现的括注，之后的出现去掉括注
 * - monolingual 术语：去掉全部括注
 *
 * 所有术语在同一遍扫描中按长度优先匹配，较长术语覆盖的文字不再计作其中的短术语。
 */
export function applyGlossary(text: string, plan: GlossaryPlan): RenderedText {
  const renderings = new Map<string, string | null>();
  const roles = new Map<string, { term: string; bilingual: boolean }>();
  for (const term of plan.monolingual) {
    const key = normalizeTerm(term);
    if (key) roles.set(key, { term, bilingual: false });
  }
  for (const term of plan.bilingual) {
    const key = normalizeTerm(term);
    if (!key) continue;
    roles.set(key, { term, bilingual: true });
    renderings.set(term, null);
  }
  if (roles.size === 0) return { text, renderings };

  const alternation = [...roles.values()]
    .map(({ term }) => term)
    .sort((a, b) => normalizeTerm(b).length - normalizeTerm(a).length)
    .map(termPattern)
    .join('|');
  const pattern = new RegExp(
    `${WORD_BEFORE}(${alternation})${WORD_AFTER}(?:${ANNOTATION})?`,
    'gi'
  );

  const annotated = new Set<string>();
  const result = text.replace(
    pattern,
    (match: string, english: string, annotation: string | undefined) => {
      const role = roles.get(normalizeTerm(english));
      if (annotation === undefined || !role) return match;
      if (!role.bilingual || annotated.has(role.term)) return english;

      annotated.add(role.term);
      const rendering = annotation.trim();
      renderings.set(role.term, rendering);
      return `${english}（${rendering}）`;
    }
  );

  return { text: result, renderings };
}

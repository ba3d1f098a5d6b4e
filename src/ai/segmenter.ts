import * as fs from 'fs';
import { TermSegmenter } from '../types';
import { ConfigurationError } from '../utils/errors';
import { escapeRegExp, errorMessage, normalizeTerm } from '../utils';

interface Match {
  start: number;
  end: number;
  text: string;
}

/**
 * 基于术语表的切分器
 *
 * 较长的术语优先匹配，被覆盖的短术语（如 "large language model" 中的 "language model"）不再单独计入。
 * 返回的术语按在文中首次出现的位置排序，保留原文写法。
 */
export class VocabularySegmenter implements TermSegmenter {
  private readonly patterns: { term: string; pattern: RegExp }[];

  constructor(vocabulary: string[]) {
    const unique = new Map<string, string>();
    for (const term of vocabulary) {
      const key = normalizeTerm(term);
      if (key && !unique.has(key)) unique.set(key, term.trim());
    }
    this.patterns = [...unique.entries()]
      .sort(([a], [b]) => b.length - a.length)
      .map(([key, term]) => ({
        term: key,
        pattern: new RegExp(
          `(?<![A-Za-z0-9-])${term.split(/\s+/).map(escapeRegExp).join('\\s+')}(?![A-Za-z0-9-])`,
          'gi'
        ),
      }));
  }

  get size(): number {
    return this.patterns.length;
  }

  segment(text: string): string[] {
    const taken: Match[] = [];
    const firstByTerm = new Map<string, Match>();

    for (const { term, pattern } of this.patterns) {
      for (const found of text.matchAll(pattern)) {
        const start = found.index ?? 0;
        const match = { start, end: start + found[0].length, text: found[0] };
        if (taken.some((t) => match.start < t.end && t.start < match.end)) continue;
        taken.push(match);
        const first = firstByTerm.get(term);
        if (!first || match.start < first.start) firstByTerm.set(term, match);
      }
    }

    return [...firstByTerm.values()]
      .sort((a, b) => a.start - b.start)
      .map((match) => match.text.replace(/\s+/g, ' '));
  }
}

/**
 * 读取术语表文件：字符串数组，或 { "terms": [...] }
 */
export function loadVocabulary(filePath: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`无法读取术语表 ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const list =
    typeof parsed === 'object' && parsed !== null && 'terms' in parsed ? parsed.terms : parsed;
  const terms = Array.isArray(list)
    ? list.filter((item: unknown): item is string => typeof item === 'string')
    : [];
  if (!Array.isArray(list) || terms.length !== list.length) {
    throw new ConfigurationError(`术语表格式错误，应为字符串数组: ${filePath}`);
  }
  return terms;
}

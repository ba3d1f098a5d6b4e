import * as crypto from 'crypto';
import * as fs from 'fs';

const debugEnabled = () =>
  (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';

/**
 * 简单的日志记录器
 */
export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (debugEnabled()) console.log(`[DEBUG] ${message}`, ...args);
  },
  info: (message: string, ...args: unknown[]) =>
    console.log(`[INFO] ${message}`, ...args),
  warn: (message: string, ...args: unknown[]) =>
    console.warn(`[WARN] ${message}`, ...args),
  error: (message: string, ...args: unknown[]) =>
    console.error(`[ERROR] ${message}`, ...args),
};

/**
 * 确保目录存在
 */
export function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * 休眠函数
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 清理文本内容
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * 清理可能为空的文本，清理后为空串时返回 null
 */
export function cleanOptional(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null;
  const cleaned = cleanText(text);
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * 验证URL格式（仅接受 http/https）
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * 获取相对URL的绝对URL，并去掉 fragment
 */
export function normalizeUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    url.hash = '';
    return url.href;
  } catch {
    return null;
  }
}

export function sha256Text(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * 术语归一化：小写并合并空白
 */
export function normalizeTerm(term: string): string {
  return cleanText(term).toLowerCase();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

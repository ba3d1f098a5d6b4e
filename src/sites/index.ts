import { SiteAdapter, SiteKind, SiteSelection } from '../types';
import { ConfigurationError } from '../utils/errors';
import { isValidUrl } from '../utils';
import { SearchListingAdapter } from './search-listing';
import { ProceedingsListingAdapter } from './proceedings-listing';

const registry = new Map<SiteKind, () => SiteAdapter>([
  ['search', () => new SearchListingAdapter()],
  ['proceedings', () => new ProceedingsListingAdapter()],
]);

export function getAvailableSites(): SiteKind[] {
  return Array.from(registry.keys());
}

export function isSiteSelection(value: string): value is SiteSelection {
  return value === 'auto' || getAvailableSites().some((kind) => kind === value);
}

/**
 * 根据声明的站点类型（或 auto 按域名匹配）选择适配器
 */
export function resolveSiteAdapter(site: SiteSelection, startUrl: string): SiteAdapter {
  if (!isValidUrl(startUrl)) {
    throw new ConfigurationError(`起始地址无效: ${startUrl}`);
  }

  if (site !== 'auto') {
    const factory = registry.get(site);
    if (!factory) {
      throw new ConfigurationError(`未注册的站点类型: ${site}`);
    }
    return factory();
  }

  const url = new URL(startUrl);
  for (const factory of registry.values()) {
    const adapter = factory();
    if (adapter.matches(url)) return adapter;
  }
  throw new ConfigurationError(
    `没有适配器匹配 ${url.hostname}，请通过 --site 指定 ${getAvailableSites().join('|')}`
  );
}

export { SearchListingAdapter, ProceedingsListingAdapter };

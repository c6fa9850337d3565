import { MarketplaceApi, RemoteOffer } from '../../types/marketplace';
import { collectPages } from '../../utils/batching';
import logger from '../../utils/logger';
import { RetryPolicy, withRetry } from '../../utils/retry';

/**
 * Выгружает весь каталог маркетплейса постранично.
 * Ошибки не глотаются: без каталога синхронизация невозможна.
 */
export async function fetchCatalog(api: MarketplaceApi, policy: RetryPolicy): Promise<RemoteOffer[]> {
  let pages = 0;

  const offers = await collectPages(async (cursor) => {
    const page = await withRetry(() => api.fetchCatalogPage(cursor), policy, `${api.name} catalog page ${pages + 1}`);
    pages++;
    return { items: page.offers, nextCursor: page.nextCursor };
  });

  const unique = new Map<string, RemoteOffer>();
  for (const offer of offers) {
    if (unique.has(offer.offerId)) {
      logger.warn(`${api.name}: duplicate offer ${offer.offerId} in catalog, keeping the first`);
      continue;
    }
    unique.set(offer.offerId, offer);
  }

  logger.info(`📦 ${api.name}: fetched ${unique.size} offers in ${pages} page(s)`);
  return [...unique.values()];
}

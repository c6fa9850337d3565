/**
 * Batching & Pagination Utility
 * Нарезка на пачки по лимитам API и обход курсорной пагинации
 */

export interface CursorPage<T> {
  items: T[];
  nextCursor: string | null;
}

/**
 * Разбивает массив на последовательные пачки не больше size
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Запрашивает страницы, начиная с курсора null, пока API отдаёт следующий курсор
 */
export async function collectPages<T>(fetchPage: (cursor: string | null) => Promise<CursorPage<T>>): Promise<T[]> {
  const collected: T[] = [];
  const seen = new Set<string>();
  let cursor: string | null = null;

  for (;;) {
    const page: CursorPage<T> = await fetchPage(cursor);
    collected.push(...page.items);

    if (!page.nextCursor) {
      return collected;
    }
    if (seen.has(page.nextCursor)) {
      throw new Error(`Pagination cursor repeated: ${page.nextCursor}`);
    }

    seen.add(page.nextCursor);
    cursor = page.nextCursor;
  }
}

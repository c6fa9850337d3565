import { ItemResult } from '../../types/marketplace';

/**
 * Сопоставляет отправленные id с результатами из тела ответа.
 * Позиция, о которой API промолчал, считается неуспешной.
 */
export function matchItemResults(sentIds: string[], reported: ItemResult[]): ItemResult[] {
  const byId = new Map<string, ItemResult>();
  for (const item of reported) {
    if (!byId.has(item.id)) {
      byId.set(item.id, item);
    }
  }

  return sentIds.map(
    (id) => byId.get(id) ?? { id, ok: false, errors: ['no result reported for item'] }
  );
}

export function batchResults(sentIds: string[], ok: boolean, errors: string[] = []): ItemResult[] {
  return sentIds.map((id) => ({ id, ok, errors: [...errors] }));
}

/**
 * Substring search over product names.
 *
 * Ranking: names starting with the query first, then shorter names, counted
 * in code points. The sort is stable, so equal ranks keep catalog order.
 */
export function searchProducts<T extends { name: string }>(
  views: readonly T[],
  query: string,
  limit: number,
): T[] {
  const q = query.trim().toLowerCase();
  if (!q) return views.slice(0, limit);

  const ranked = views
    .map((view) => ({ view, name: view.name.toLowerCase() }))
    .filter(({ name }) => name.includes(q))
    .map(({ view, name }) => ({ view, starts: name.startsWith(q) ? 0 : 1, length: [...name].length }));

  ranked.sort((a, b) => a.starts - b.starts || a.length - b.length);
  return ranked.slice(0, limit).map(({ view }) => view);
}

export function countBy<T>(
  items: readonly T[],
  key: (item: T) => string,
): Record<string, number> {
  return items.reduce(
    (acc, item) => {
      const k = key(item);
      acc[k] = (acc[k] ?? 0) + 1;
      return acc;
    },
    {} as Record<string, number>,
  );
}

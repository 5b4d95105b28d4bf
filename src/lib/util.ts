export function equalsInsensitive(a?: string, b?: string) {
  if (a == null) {
    return b == null;
  } else if (b == null) {
    return a == null;
  }
  return a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
}

export function asLookup<T, K extends string | number>(list: T[], getKey: (item: T) => K): Record<K, T> {
  const lookup: Record<K, T> = {} as Record<K, T>;
  for (const item of list) {
    lookup[getKey(item)] = item;
  }
  return lookup;
}

export function buildInsensitiveCompare<T>(getter?: (item: T) => string) {
  return (a: T, b: T) => {
    const l = getter ? getter(a) : `${a}`;
    const r = getter ? getter(b) : `${b}`;
    return l.localeCompare(r, undefined, { sensitivity: 'accent' });
  }
}

export function describeError(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

export function describeFailure(err: unknown) {
  return err instanceof Error ? err.stack ?? `${err.name}: ${err.message}` : String(err);
}

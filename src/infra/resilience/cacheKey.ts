export type CacheKeyValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly string[];

const normalizeText = (value: string): string =>
  value.trim().replace(/\s+/g, " ").toLowerCase();

const encodeValue = (value: Exclude<CacheKeyValue, undefined>): string => {
  if (value === null) {
    return "null";
  }

  if (typeof value === "string") {
    return encodeURIComponent(normalizeText(value));
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  return value
    .map((item) => encodeURIComponent(normalizeText(item)))
    .sort()
    .join(",");
};

/**
 * Derives a deterministic key from the parameters that change a provider's answer.
 * Parameter order, letter case and whitespace runs do not affect the key; `undefined` values are skipped.
 */
export const buildCacheKey = (
  namespace: string,
  params: Record<string, CacheKeyValue>,
): string => {
  const parts = Object.keys(params)
    .sort()
    .flatMap((name) => {
      const value = params[name];
      return value === undefined ? [] : [`${name}=${encodeValue(value)}`];
    });

  return `${namespace}?${parts.join("&")}`;
};

export const normalizeWhitespace = (value: string) =>
  value.replace(/\s+/g, " ").trim();

export const normalizeName = (value: string) =>
  normalizeWhitespace(value).toLowerCase();

export const compactText = (value: string | null | undefined) =>
  value ? normalizeWhitespace(value) : "";

export const truncate = (value: string, maxLength: number) =>
  value.length > maxLength ? `${value.slice(0, maxLength - 3).trimEnd()}...` : value;

export const uniqueStrings = (values: Iterable<string>) => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
};

export const asStringList = (value: unknown): string[] => {
  if (typeof value === "string") {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string" && item.trim() !== "");
};

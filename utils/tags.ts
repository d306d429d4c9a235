export const normalizeTag = (value: string) => value.trim().replace(/\s+/g, ' ');

export const tagKey = (value: string) => normalizeTag(value).toLowerCase();

/**
 * Tags behave as a set: blanks are dropped and case-insensitive duplicates
 * collapse onto the first spelling.
 */
export const normalizeTags = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const tag = normalizeTag(value);
    if (!tag || seen.has(tagKey(tag))) continue;
    seen.add(tagKey(tag));
    result.push(tag);
  }
  return result;
};

/** Splits comma separated CLI input such as "home, errands". */
export const parseTagList = (input: string): string[] => normalizeTags(input.split(','));

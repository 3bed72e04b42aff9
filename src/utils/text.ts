export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

export function slugToName(slug: string): string {
  return normalizeWhitespace(titleCase(slug.replace(/[-_]+/g, ' ')));
}

export function looksLikeUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim()) || /^www\./i.test(value.trim());
}

export function roundOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

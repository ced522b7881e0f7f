const ACCENT_REGEX = /[\u0300-\u036f]/g;

export function normalizeText(input: string): string {
  return input
    .toUpperCase()
    .normalize('NFD')
    .replace(ACCENT_REGEX, '')
    .replace(/[^A-Z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(text: string): Set<string> {
  const norm = normalizeText(text);
  const tokens = norm.split(' ').filter(token => token.length > 0);
  return new Set(tokens);
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (!a.size || !b.size) return 0;
  let intersection = 0;
  a.forEach(token => {
    if (b.has(token)) intersection += 1;
  });
  const union = a.size + b.size - intersection;
  return union ? intersection / union : 0;
}

/**
 * Similitud (0-100) entre dos descripciones por tokens normalizados.
 * Dos descripciones vacías no se consideran parecidas.
 */
export function descriptionSimilarity(a: string, b: string): number {
  const score = jaccard(tokenize(a), tokenize(b));
  return Math.round(score * 1000) / 10;
}

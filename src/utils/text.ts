export function normalizeTitle(input: string): string {
  if (!input) return input;
  let s = input;
  // Remove common bracketed qualifiers
  const patterns = [
    /\((remaster(ed)?(\s*\d{4})?|\d{4}\s*remaster(ed)?|explicit|clean|radio\s*edit|album\s*version|mono|stereo)\)/ig,
    /\[(remaster(ed)?(\s*\d{4})?|\d{4}\s*remaster(ed)?|explicit|clean|radio\s*edit|album\s*version|mono|stereo)\]/ig,
    /\s+-\s+(\d{4}\s+)?remaster(ed)?(\s+\d{4})?(\s+version)?$/ig,
  ];
  for (const re of patterns) s = s.replace(re, '');

  // Collapse multiple spaces and trim separators
  s = s.replace(/\s{2,}/g, ' ');
  s = s.replace(/\s*[-–—]\s*$/g, '');
  s = s.trim();
  return s;
}

/** Lowercase, strip accents and punctuation, collapse whitespace. */
export function normalizeForMatch(input: string): string {
  return normalizeTitle(input)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function truncateText(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

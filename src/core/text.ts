/** Case and width folding shared by matching and record identity. */
export function foldText(input: string): string {
  return input.normalize("NFKC").toLowerCase();
}

export function normalizeTitle(title: string): string {
  return foldText(title).replace(/\s+/gu, " ").trim();
}

export function recordIdentity(platform: string, title: string): string {
  return `${platform}::${normalizeTitle(title)}`;
}

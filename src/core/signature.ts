import { createHash } from "node:crypto";
import type { ConfigSnapshot } from "../types/pipeline.js";

/**
 * Fingerprint used to scope run history. The report mode is left out so the
 * three modes share one history for the same keywords, filters and platforms.
 */
export function computeRunSignature(snapshot: ConfigSnapshot): string {
  const material = JSON.stringify({
    groups: snapshot.groups.map((group) => ({
      label: group.label,
      terms: group.terms,
      expansions: group.expand ? group.expansions : [],
    })),
    filters: snapshot.filters,
    platforms: [...snapshot.platforms].sort(),
  });
  return createHash("sha256").update(material).digest("hex").slice(0, 16);
}

/**
 * Participant labels. Names that collide get a stable alias:
 *   "Codex@codex-1a2b3c"  (<name>@<source tag>-<first 6 hex chars of the id>)
 */

export function shortParticipantId(id: string): string {
  return id.replaceAll('-', '').slice(0, 6).toLowerCase();
}

/** Lowercase alphanumerics; everything else collapses to single dashes. */
export function sanitizeSourceTag(raw: string | undefined, fallbackName?: string): string {
  const candidate = (raw && raw.trim() !== '' ? raw : fallbackName ?? '').toLowerCase();
  const compact = candidate
    .replace(/[^\p{L}\p{N}]/gu, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
  return compact === '' ? 'cli' : compact;
}

export interface DisplayNameInput {
  id: string;
  /** Undefined when the participant cannot be resolved anymore */
  baseName?: string;
  sourceTag?: string;
}

export function disambiguateDisplayNames(participants: readonly DisplayNameInput[]): Map<string, string> {
  const counts = new Map<string, number>();
  for (const p of participants) {
    if (p.baseName !== undefined) {
      counts.set(p.baseName, (counts.get(p.baseName) ?? 0) + 1);
    }
  }

  const labels = new Map<string, string>();
  for (const p of participants) {
    const base = p.baseName ?? 'AI';
    if ((counts.get(base) ?? 0) <= 1) {
      labels.set(p.id, base);
      continue;
    }
    labels.set(p.id, `${base}@${sanitizeSourceTag(p.sourceTag)}-${shortParticipantId(p.id)}`);
  }
  return labels;
}

/**
 * Exact matching of free-text project names on their canonical form.
 * No edit distance: a near miss goes back to the user instead of guessing.
 */

const NO_PROJECT = new Set(['sin proyecto', 'ninguno', 'n/a', 'none', 'na'].map(canonicalProject));

/**
 * Lowercase, then keep letters and digits only
 */
export function canonicalProject(value: string | null | undefined): string {
  if (!value) return '';
  return value.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

export function matchProject(rawProject: string | null | undefined, validOptions: readonly string[]): string | null {
  const candidate = canonicalProject(rawProject);
  if (!candidate || NO_PROJECT.has(candidate)) {
    return null;
  }

  const byCanon = new Map<string, string>();
  for (const option of validOptions) {
    const canon = canonicalProject(option);
    if (canon && !byCanon.has(canon)) {
      byCanon.set(canon, option);
    }
  }

  return byCanon.get(candidate) ?? null;
}

import { Locality } from './ipma.types';

// Records without an idConcelho / globalIdLocal sort after every real id
export const MISSING_ID_SENTINEL = 1_000_000;

export type LocalityCandidate = Partial<
  Pick<Locality, 'local' | 'idDistrito' | 'idConcelho' | 'globalIdLocal'>
>;

export type MatchTier = 'exact' | 'partial';

export type LocalityResolution<T> =
  | { status: 'found'; tier: MatchTier; locality: T }
  | { status: 'not_found'; query: string; districtId?: number };

function sortKey(candidate: LocalityCandidate): [number, number] {
  return [
    candidate.idConcelho ?? MISSING_ID_SENTINEL,
    candidate.globalIdLocal ?? MISSING_ID_SENTINEL,
  ];
}

/**
 * Candidate with the smallest (idConcelho, globalIdLocal) pair
 */
function pickStable<T extends LocalityCandidate>(candidates: T[]): T | undefined {
  let best: T | undefined;
  for (const candidate of candidates) {
    if (!best) {
      best = candidate;
      continue;
    }
    const [concelho, id] = sortKey(candidate);
    const [bestConcelho, bestId] = sortKey(best);
    if (concelho < bestConcelho || (concelho === bestConcelho && id < bestId)) {
      best = candidate;
    }
  }
  return best;
}

function inDistrict(candidate: LocalityCandidate, districtId?: number): boolean {
  return (
    districtId === undefined || Number(candidate.idDistrito ?? -1) === districtId
  );
}

/**
 * Resolve a locality name against the reference table.
 *
 * An exact case-insensitive match on `local` wins over a substring match, so
 * "Porto" is never shadowed by "Porto Santo". Within a tier ties are broken
 * by the lowest (idConcelho, globalIdLocal), which keeps repeated lookups of
 * an ambiguous name stable across cache refreshes.
 */
export function resolveLocality<T extends LocalityCandidate>(
  localities: readonly T[],
  name: string,
  districtId?: number,
): LocalityResolution<T> {
  const query = name.trim().toLowerCase();

  const exact = localities.filter(
    (l) => (l.local ?? '').toLowerCase() === query && inDistrict(l, districtId),
  );
  const exactMatch = pickStable(exact);
  if (exactMatch) {
    return { status: 'found', tier: 'exact', locality: exactMatch };
  }

  const partial = localities.filter(
    (l) =>
      (l.local ?? '').toLowerCase().includes(query) && inDistrict(l, districtId),
  );
  const partialMatch = pickStable(partial);
  if (partialMatch) {
    return { status: 'found', tier: 'partial', locality: partialMatch };
  }

  return districtId === undefined
    ? { status: 'not_found', query }
    : { status: 'not_found', query, districtId };
}

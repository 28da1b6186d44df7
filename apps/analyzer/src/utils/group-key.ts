import { GroupKey } from '../interfaces/seasonal-stat.interface';

/**
 * Encode a (city, season) pair as a map key. JSON keeps the two parts apart
 * whatever characters the labels contain.
 */
export function encodeGroupKey(key: GroupKey): string {
  return JSON.stringify([key.city, key.season]);
}

/**
 * Compare two keys by city, then season
 */
export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  if (a.city !== b.city) {
    return a.city < b.city ? -1 : 1;
  }
  if (a.season !== b.season) {
    return a.season < b.season ? -1 : 1;
  }
  return 0;
}

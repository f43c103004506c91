/**
 * Race distance bands used to group context insights
 */

export const UNKNOWN_DISTANCE_BAND = 'unknown';

const BANDS: readonly { upTo: number; label: string }[] = [
  { upTo: 1200, label: '<=1200' },
  { upTo: 1600, label: '1201-1600' },
  { upTo: 2000, label: '1601-2000' },
  { upTo: 2400, label: '2001-2400' },
  { upTo: 10000, label: '2400+' },
];

/**
 * Band for a distance in metres. Bands are right-closed: 1200 is `<=1200`,
 * 1201 is `1201-1600`. Non-positive distances and distances beyond 10000 have no band.
 */
export function distanceBand(distance: number | null): string | null {
  if (distance === null || !(distance > 0)) return null;
  return BANDS.find((band) => distance <= band.upTo)?.label ?? null;
}

/**
 * Slack message timestamps look like "1712345678.000200": seconds, a dot,
 * then a fixed-width counter. Compare them without going through floats.
 */
export function compareSlackTs(a: string, b: string): number {
  const [aSec = '0', aFrac = ''] = a.split('.');
  const [bSec = '0', bFrac = ''] = b.split('.');

  const secDiff = Number(aSec) - Number(bSec);
  if (secDiff !== 0) return secDiff < 0 ? -1 : 1;

  const width = Math.max(aFrac.length, bFrac.length);
  const aPadded = aFrac.padEnd(width, '0');
  const bPadded = bFrac.padEnd(width, '0');
  if (aPadded === bPadded) return 0;
  return aPadded < bPadded ? -1 : 1;
}

/**
 * Progress recorded once step `index` of `total` has finished. Only the
 * final step reaches 100.
 */
export function progressAfterStep(index: number, total: number): number {
  if (index >= total - 1) {
    return 100;
  }
  return Math.min(99, Math.round(((index + 1) / total) * 100));
}

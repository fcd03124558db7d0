/**
 * Reading-time estimation mode:
 * - ACCURATE: scans every page (text, images, tables, code, slides)
 * - FAST: samples the first page and extrapolates by page count
 */
export enum ReadingTimeMode {
  ACCURATE = 'accurate',
  FAST = 'fast',
}

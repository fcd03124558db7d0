export enum PageClass {
  TEXT = 'text', // >= 200 words
  MIXED = 'mixed', // >= 80 words
  SLIDE = 'slide', // images with little text
  EMPTY = 'empty',
}

export interface IClock {
  now(): Date;
  /** Local calendar date, YYYY-MM-DD. */
  today(): string;
}

export interface TimePort {
  /** Wall-clock milliseconds since the Unix epoch. */
  now(): number;
}

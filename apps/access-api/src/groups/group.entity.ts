export interface Group {
  readonly id: string;
  /** Unique; listings are sorted by it. */
  readonly name: string;
}

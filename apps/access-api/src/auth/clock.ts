export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** JWT NumericDate: whole seconds since the epoch. */
export function toNumericDate(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Generator module types
 */

export interface SampleDataOptions {
  count: number;
  seed: string | number;
  referenceNow: Date; // Publication dates fall within the year before this
  nullRate: number; // Share of descriptions left null, 0.0 to 1.0
}

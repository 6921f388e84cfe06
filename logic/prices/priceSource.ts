import type { PriceLevel, PriceRating } from '../periods/types';

/**
 * Common interface for price data sources.
 * All price sources must return data in this format for consistency.
 */

export interface PriceDataEntry {
  /** ISO 8601 date string (e.g., "2025-12-28T00:00:00+01:00") */
  date: string;
  /** Price in €/kWh */
  price: number;
  /** Level classification delivered by the provider */
  level?: PriceLevel;
  rating?: PriceRating;
}

export interface PriceDataSource {
  /**
   * Fetch price data from the source.
   * @returns Array of price entries with fixed-duration intervals, in chronological order
   */
  fetch(): Promise<Array<PriceDataEntry>>;
}

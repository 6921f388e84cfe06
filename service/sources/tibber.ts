import type { PriceDataEntry, PriceDataSource } from '../../logic/prices/priceSource';
import type { PriceLevel } from '../../logic/periods/types';
import { PRICE_LEVELS } from '../../logic/periods/constants';

/**
 * Tibber API price data source.
 * Fetches quarter-hourly prices together with Tibber's level classification
 * from the Tibber GraphQL API.
 */

const TIBBER_QUERY = `
  {
    viewer {
      homes {
        currentSubscription {
          priceInfo(resolution: QUARTER_HOURLY) {
            today {
              total
              startsAt
              level
            }
            tomorrow {
              total
              startsAt
              level
            }
          }
        }
      }
    }
  }
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPriceLevel(value: unknown): PriceLevel | undefined {
  return PRICE_LEVELS.find((level) => level === value);
}

function parseDay(day: unknown, label: string): Array<PriceDataEntry> {
  if (day === undefined || day === null) {
    return [];
  }
  if (!Array.isArray(day)) {
    throw new Error(`Tibber API: ${label} is not a list`);
  }

  return day.map((item: unknown, index) => {
    const startsAt = isRecord(item) ? item.startsAt : undefined;
    const total = isRecord(item) ? item.total : undefined;
    if (typeof startsAt !== 'string' || typeof total !== 'number') {
      throw new Error(`Tibber API: invalid ${label} entry at position ${index}`);
    }
    const entry: PriceDataEntry = {
      date: startsAt,
      price: total, // Already in €/kWh from Tibber
    };
    const level = toPriceLevel(isRecord(item) ? item.level : undefined);
    if (level) {
      entry.level = level;
    }
    return entry;
  });
}

/**
 * Parse a Tibber GraphQL response into price entries
 * @param json - Parsed response body
 * @returns Today's and tomorrow's entries, in that order
 * @throws Error when the response reports errors or has an unexpected shape
 */
export function parseTibberPriceInfo(json: unknown): Array<PriceDataEntry> {
  if (!isRecord(json)) {
    throw new Error('Tibber API: Invalid response structure');
  }

  const errors = json.errors;
  if (Array.isArray(errors) && errors.length > 0) {
    const errorMessages = errors
      .map((error: unknown) => (isRecord(error) && typeof error.message === 'string' ? error.message : String(error)))
      .join(', ');
    throw new Error(`Tibber API errors: ${errorMessages}`);
  }

  const data = json.data;
  const viewer = isRecord(data) ? data.viewer : undefined;
  const homes = isRecord(viewer) ? viewer.homes : undefined;
  const home: unknown = Array.isArray(homes) ? homes[0] : undefined;
  const subscription = isRecord(home) ? home.currentSubscription : undefined;
  const priceInfo = isRecord(subscription) ? subscription.priceInfo : undefined;

  if (!isRecord(priceInfo)) {
    throw new Error('Tibber API: Invalid response structure');
  }

  return [...parseDay(priceInfo.today, 'today'), ...parseDay(priceInfo.tomorrow, 'tomorrow')];
}

export class TibberPriceSource implements PriceDataSource {
  private readonly url: string;
  private readonly token: string;

  constructor(token: string, url: string = 'https://api.tibber.com/v1-beta/gql') {
    if (!token) {
      throw new Error('Tibber API: an access token is required');
    }
    this.token = token;
    this.url = url;
  }

  async fetch(): Promise<Array<PriceDataEntry>> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.token}`,
      },
      body: JSON.stringify({ query: TIBBER_QUERY }),
    });

    if (!response.ok) {
      throw new Error(`Tibber API failed: ${response.status} ${response.statusText}`);
    }

    const json: unknown = await response.json();
    return parseTibberPriceInfo(json);
  }
}

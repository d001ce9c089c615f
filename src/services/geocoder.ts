/**
 * Forward geocoding against a Nominatim (OpenStreetMap) search endpoint.
 *
 * Nominatim's usage policy allows one request per second and requires an
 * identifying User-Agent; this client enforces both.
 */

import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Geocoder {
  /** null on no match; never throws */
  geocode(text: string): Promise<Coordinates | null>;
}

export interface NominatimConfig {
  baseUrl: string;
  userAgent: string;
  /** Appended to queries that don't already name the region, e.g. "New York City, NY" */
  regionHint?: string;
  timeoutMs: number;
  minIntervalMs: number;
}

interface NominatimResult {
  lat?: unknown;
  lon?: unknown;
  display_name?: unknown;
}

const REGION_TOKENS = ["new york", "nyc"];

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const withRegionHint = (text: string, regionHint?: string): string => {
  if (!regionHint) return text;
  const lowered = text.toLowerCase();
  if (REGION_TOKENS.some((token) => lowered.includes(token))) return text;
  if (lowered.includes(regionHint.toLowerCase())) return text;
  return `${text}, ${regionHint}`;
};

const parseCoordinate = (value: unknown): number | null => {
  const parsed = typeof value === "string" ? Number.parseFloat(value) : typeof value === "number" ? value : NaN;
  return Number.isFinite(parsed) ? parsed : null;
};

export class NominatimGeocoder implements Geocoder {
  private readonly client: AxiosInstance;
  private nextSlot = 0;

  constructor(
    private readonly config: NominatimConfig,
    private readonly logger: Logger,
    client?: AxiosInstance,
    private readonly clock: () => number = () => Date.now()
  ) {
    this.client =
      client ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: { "User-Agent": config.userAgent, Accept: "application/json" },
      });
  }

  async geocode(text: string): Promise<Coordinates | null> {
    const trimmed = text.trim();
    if (!trimmed) return null;

    const query = withRegionHint(trimmed, this.config.regionHint);
    await this.throttle();

    try {
      const { data } = await this.client.get<unknown>("/search", {
        params: { q: query, format: "json", limit: 1 },
      });

      const first: NominatimResult | undefined = Array.isArray(data) ? data[0] : undefined;
      if (!first) {
        this.logger.info({ query }, "geocode.no_match");
        return null;
      }

      const latitude = parseCoordinate(first.lat);
      const longitude = parseCoordinate(first.lon);
      if (latitude === null || longitude === null) {
        this.logger.warn({ query }, "geocode.malformed_result");
        return null;
      }

      this.logger.info({ query, latitude, longitude }, "geocode.match");
      return { latitude, longitude };
    } catch (err) {
      this.logger.warn({ err, query }, "geocode.failed");
      return null;
    }
  }

  // Reserve the next free slot before awaiting so concurrent callers queue up.
  private async throttle(): Promise<void> {
    const current = this.clock();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.config.minIntervalMs;
    const wait = slot - current;
    if (wait > 0) {
      await sleep(wait);
    }
  }
}

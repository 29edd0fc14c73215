/**
 * Geocoding Service
 *
 * Address ↔ coordinates via the Google Geocoding API. "Not found" is a null
 * result; transport and quota errors throw.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { Location } from "../shared/types";
import { TtlCache } from "../shared/utils";

// ============ Types ============

export interface GeocodeResult {
  location: Location;
  formattedAddress: string;
  components: Record<string, string>;
}

export interface Geocoder {
  geocode(address: string): Promise<GeocodeResult | null>;
  reverseGeocode(location: Location): Promise<string | null>;
}

// ============ Google Adapter ============

const GeocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string(),
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() }),
        }),
        address_components: z
          .array(
            z.object({
              long_name: z.string(),
              types: z.array(z.string()),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

type GeocodeResponse = z.infer<typeof GeocodeResponseSchema>;

/** Day-long cache; addresses rarely move */
const CACHE_TTL_SECONDS = 86_400;

export class GoogleGeocoder implements Geocoder {
  private readonly http: AxiosInstance;
  private readonly cache = new TtlCache<GeocodeResult | null>(CACHE_TTL_SECONDS);

  constructor(
    private readonly apiKey: string,
    timeoutMs = 10_000,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: "https://maps.googleapis.com/maps/api",
        timeout: timeoutMs,
      });
  }

  async geocode(address: string): Promise<GeocodeResult | null> {
    const key = `geocode:${address.trim().toLowerCase()}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const body = await this.request({ address });
    const first = body.results[0];
    const result: GeocodeResult | null = first
      ? {
          location: first.geometry.location,
          formattedAddress: first.formatted_address,
          components: Object.fromEntries(
            first.address_components.flatMap((c): [string, string][] =>
              c.types[0] ? [[c.types[0], c.long_name]] : []
            )
          ),
        }
      : null;

    this.cache.set(key, result);
    return result;
  }

  async reverseGeocode(location: Location): Promise<string | null> {
    const body = await this.request({ latlng: `${location.lat},${location.lng}` });
    return body.results[0]?.formatted_address ?? null;
  }

  private async request(params: Record<string, string>): Promise<GeocodeResponse> {
    const response = await this.http.get<unknown>("/geocode/json", {
      params: { ...params, key: this.apiKey },
    });
    const body = GeocodeResponseSchema.parse(response.data);

    if (body.status !== "OK" && body.status !== "ZERO_RESULTS") {
      throw new Error(
        `Geocoding failed with status ${body.status}${body.error_message ? `: ${body.error_message}` : ""}`
      );
    }
    return body;
  }
}

/**
 * Distance Service
 *
 * Travel distance/time between points via the Google Distance Matrix API.
 * Callers fall back to straight-line distance when no provider is configured
 * or an element comes back without status OK.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { Location } from "../shared/types";
import { logger } from "../shared/logger";

// ============ Types ============

export type TravelMode = "driving" | "walking" | "bicycling" | "transit";

export interface MatrixElement {
  status: string;
  distanceMeters: number | null;
  durationSeconds: number | null;
}

export interface DistanceProvider {
  /** rows[i][j] is origins[i] → destinations[j] */
  matrix(
    origins: Location[],
    destinations: Location[],
    mode?: TravelMode
  ): Promise<MatrixElement[][]>;
}

// ============ Google Adapter ============

const MatrixResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  rows: z
    .array(
      z.object({
        elements: z.array(
          z.object({
            status: z.string(),
            distance: z.object({ value: z.number() }).optional(),
            duration: z.object({ value: z.number() }).optional(),
            duration_in_traffic: z.object({ value: z.number() }).optional(),
          })
        ),
      })
    )
    .default([]),
});

const formatPoint = (point: Location) => `${point.lat},${point.lng}`;

export class GoogleDistanceMatrixProvider implements DistanceProvider {
  private readonly http: AxiosInstance;
  private readonly log = logger.child({ module: "distance" });

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

  async matrix(
    origins: Location[],
    destinations: Location[],
    mode: TravelMode = "driving"
  ): Promise<MatrixElement[][]> {
    const response = await this.http.get<unknown>("/distancematrix/json", {
      params: {
        origins: origins.map(formatPoint).join("|"),
        destinations: destinations.map(formatPoint).join("|"),
        mode,
        units: "metric",
        departure_time: mode === "driving" ? "now" : undefined,
        key: this.apiKey,
      },
    });

    const body = MatrixResponseSchema.parse(response.data);
    if (body.status !== "OK") {
      this.log.warn(
        { status: body.status, error: body.error_message },
        "Distance matrix request rejected"
      );
      throw new Error(`Distance matrix status ${body.status}`);
    }

    return body.rows.map((row) =>
      row.elements.map((element) => ({
        status: element.status,
        distanceMeters: element.distance?.value ?? null,
        durationSeconds:
          element.duration_in_traffic?.value ?? element.duration?.value ?? null,
      }))
    );
  }
}

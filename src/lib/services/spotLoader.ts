/**
 * Spot Loader
 *
 * Reads `spots_<city>.json` files produced by the data collection scripts and
 * validates every entry before it reaches the planner.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Spot } from '../types';

const spotSchema = z
  .object({
    name: z.string().trim().min(1, 'Spot name is required'),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180).optional(),
    lng: z.number().min(-180).max(180).optional(),
    category: z.string().trim().min(1, 'Spot category is required'),
    duration_minutes: z.number().positive().nullish(),
    durationMinutes: z.number().positive().nullish(),
    rating: z.number().min(1).max(5).nullish(),
  })
  .refine(s => s.lon !== undefined || s.lng !== undefined, {
    message: 'lon is required',
    path: ['lon'],
  })
  .describe('Point of interest as stored in the city spot files');

const spotListSchema = z.array(spotSchema);

type RawSpot = z.infer<typeof spotSchema>;

function toSpot(raw: RawSpot): Spot {
  const durationMinutes = raw.durationMinutes ?? raw.duration_minutes ?? undefined;
  const rating = raw.rating ?? undefined;
  return {
    name: raw.name,
    lat: raw.lat,
    lon: raw.lon ?? raw.lng ?? 0,
    category: raw.category.toLowerCase(),
    ...(durationMinutes !== undefined ? { durationMinutes } : {}),
    ...(rating !== undefined ? { rating } : {}),
  };
}

/**
 * Validate raw JSON data into spots. Unknown fields are ignored.
 */
export function parseSpots(data: unknown): Spot[] {
  const parsed = spotListSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new Error(`Invalid spot data at ${where}: ${issue.message}`);
  }
  return parsed.data.map(toSpot);
}

export function spotFilePath(city: string, dataDir: string): string {
  return path.join(dataDir, `spots_${city.trim().toLowerCase()}.json`);
}

/**
 * Load and validate the spots of a city.
 */
export async function loadCitySpots(city: string, dataDir: string): Promise<Spot[]> {
  const file = spotFilePath(city, dataDir);

  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new Error(`No spot data found for city: ${city}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Corrupted spot data for city ${city}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return parseSpots(data);
}

import { z } from 'zod';
import { SlotResolutionFailure, ToolFailure } from '../errors';
import { dbg } from '../utils';
import { FetchFn, getJson } from './http';

export const GEOCODING_API_URL = 'https://geocoding-api.open-meteo.com/v1/search';

const COMPONENT = 'Geocoding';

const geocodingResponseSchema = z.object({
    results: z
        .array(
            z.object({
                name: z.string(),
                latitude: z.number(),
                longitude: z.number(),
                country: z.string().optional(),
                admin1: z.string().optional(),
                timezone: z.string().optional(),
            })
        )
        .optional(),
});

export interface ResolvedLocation {
    name: string;
    country?: string;
    region?: string;
    latitude: number;
    longitude: number;
    /** IANA zone name; UTC when the geocoder does not report one. */
    timezone: string;
    /** `name, country`, or just `name` when the country is unknown. */
    displayName: string;
}

/**
 * Resolves free-text place names to coordinates and time zones through the Open-Meteo geocoder.
 * Successful lookups are cached for the lifetime of the instance.
 */
export class GeocodingService {
    private readonly cache = new Map<string, ResolvedLocation>();

    constructor(private readonly fetchFn: FetchFn = fetch, private readonly apiUrl: string = GEOCODING_API_URL) {}

    /**
     * @throws SlotResolutionFailure when the name is empty or matches nothing.
     * @throws ToolFailure when the geocoder cannot be reached or answers with garbage.
     */
    async resolve(place: string): Promise<ResolvedLocation> {
        const query = place.replace(/\s*,\s*/g, ',').trim();
        if (!query) {
            throw new SlotResolutionFailure('Location cannot be empty', COMPONENT, place);
        }

        const cacheKey = query.toLowerCase();
        const cached = this.cache.get(cacheKey);
        if (cached) {
            return cached;
        }

        let resolved = await this.lookup(query);
        // "Paris, France" rarely matches as a whole; retry with the city alone
        if (!resolved && query.includes(',')) {
            const city = query.split(',')[0].trim();
            if (city) {
                dbg(`Geocoding: no match for "${query}", retrying with "${city}"`);
                resolved = await this.lookup(city);
            }
        }

        if (!resolved) {
            throw new SlotResolutionFailure(`Could not find location: ${place}`, COMPONENT, place);
        }

        this.cache.set(cacheKey, resolved);
        return resolved;
    }

    clearCache(): void {
        this.cache.clear();
    }

    private async lookup(name: string): Promise<ResolvedLocation | undefined> {
        const body = await getJson(this.fetchFn, this.apiUrl, { name, count: 1 }, COMPONENT);
        const parsed = geocodingResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ToolFailure('Unexpected geocoding response', COMPONENT, { issues: parsed.error.issues });
        }

        const first = parsed.data.results?.[0];
        if (!first) {
            return undefined;
        }

        return {
            name: first.name,
            country: first.country,
            region: first.admin1,
            latitude: first.latitude,
            longitude: first.longitude,
            timezone: first.timezone ?? 'UTC',
            displayName: first.country ? `${first.name}, ${first.country}` : first.name,
        };
    }
}

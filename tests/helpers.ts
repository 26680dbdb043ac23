import { FetchFn } from '../src/services/http';
import { Oracle } from '../src/agents/Oracle';
import { PromptService } from '../src/services/PromptService';

// 14:30 UTC on a winter day: 02:30 PM in London, 11:30 PM in Tokyo
export const FIXED_NOW = Date.UTC(2024, 0, 15, 14, 30, 0);
export const fixedClock = () => FIXED_NOW;

export const LONDON_RESULT = {
    name: 'London',
    latitude: 51.5085,
    longitude: -0.1257,
    country: 'United Kingdom',
    admin1: 'England',
    timezone: 'Europe/London',
};

export const TOKYO_RESULT = {
    name: 'Tokyo',
    latitude: 35.6895,
    longitude: 139.6917,
    country: 'Japan',
    timezone: 'Asia/Tokyo',
};

export function currentWeather(overrides: Partial<Record<string, number>> = {}, timezone = 'Europe/London') {
    return {
        timezone,
        current: {
            temperature_2m: 12.3,
            relative_humidity_2m: 81,
            apparent_temperature: 10.9,
            precipitation: 0,
            weather_code: 3,
            wind_speed_10m: 14.2,
            ...overrides,
        },
    };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/**
 * In-process stand-in for fetch. Every request URL is recorded; the handler decides the response.
 */
export function fakeFetch(handler: (url: URL) => Response | Promise<Response>): { fetchFn: FetchFn; calls: URL[] } {
    const calls: URL[] = [];
    const fetchFn: FetchFn = async input => {
        const url = new URL(input instanceof Request ? input.url : input.toString());
        calls.push(url);
        return handler(url);
    };
    return { fetchFn, calls };
}

/**
 * Serves the geocoder from a table of place name to result, and the forecast with fixed conditions.
 */
export function openMeteoFetch(
    places: Record<string, object>,
    weather: object = currentWeather()
): { fetchFn: FetchFn; calls: URL[] } {
    return fakeFetch(url => {
        if (url.hostname.startsWith('geocoding-api')) {
            const result = places[url.searchParams.get('name') ?? ''];
            return jsonResponse(result ? { results: [result] } : {});
        }
        return jsonResponse(weather);
    });
}

/** Oracle that replays canned replies in order and records the prompts it was given. */
export class ScriptedOracle implements Oracle {
    readonly prompts: string[] = [];
    private readonly replies: Array<string | Error>;

    constructor(...replies: Array<string | Error>) {
        this.replies = replies;
    }

    async query(prompt: string): Promise<string> {
        this.prompts.push(prompt);
        const reply = this.replies.shift();
        if (reply === undefined) {
            throw new Error('ScriptedOracle has no replies left');
        }
        if (reply instanceof Error) {
            throw reply;
        }
        return reply;
    }
}

export const TEST_DECIDE_TEMPLATE = [
    '{{agentName}}: {{agentDescription}}',
    '{{conversation}}',
    'Context:',
    '{{context}}',
    'Tools:',
    '{{capabilities}}',
    'Direct: {{respondAction}}',
    'Format: {{responseFormat}}',
].join('\n');

/** PromptService whose templates come from memory instead of the prompts directory. */
export function inMemoryPromptService(template: string = TEST_DECIDE_TEMPLATE): PromptService {
    return new PromptService(undefined, {
        readFileFn: async () => template,
        resolvePathFn: (...paths: string[]) => paths.join('/'),
    });
}

import { z } from 'zod';
import { ToolFailure } from '../errors';
import { FetchFn, getJson } from './http';
import { describeWeatherCode } from './weatherCodes';

export const FORECAST_API_URL = 'https://api.open-meteo.com/v1/forecast';

export const FORECAST_COMPONENT = 'Forecast';

const CURRENT_FIELDS = [
    'temperature_2m',
    'relative_humidity_2m',
    'apparent_temperature',
    'precipitation',
    'weather_code',
    'wind_speed_10m',
];

const forecastResponseSchema = z.object({
    timezone: z.string().default('UTC'),
    current: z.object({
        temperature_2m: z.number(),
        relative_humidity_2m: z.number(),
        apparent_temperature: z.number(),
        precipitation: z.number(),
        weather_code: z.number().int(),
        wind_speed_10m: z.number(),
    }),
});

export interface CurrentConditions {
    /** °C */
    temperature: number;
    feelsLike: number;
    /** % */
    humidity: number;
    /** mm */
    precipitation: number;
    /** km/h */
    windSpeed: number;
    weatherCode: number;
    description: string;
    timezone: string;
}

/**
 * Fetches current conditions for a coordinate pair from Open-Meteo.
 */
export class ForecastService {
    constructor(private readonly fetchFn: FetchFn = fetch, private readonly apiUrl: string = FORECAST_API_URL) {}

    async current(latitude: number, longitude: number): Promise<CurrentConditions> {
        const body = await getJson(
            this.fetchFn,
            this.apiUrl,
            { latitude, longitude, current: CURRENT_FIELDS.join(','), timezone: 'auto' },
            FORECAST_COMPONENT
        );

        const parsed = forecastResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ToolFailure('Unexpected forecast response', FORECAST_COMPONENT, { latitude, longitude, issues: parsed.error.issues });
        }

        const { current, timezone } = parsed.data;
        return {
            temperature: current.temperature_2m,
            feelsLike: current.apparent_temperature,
            humidity: current.relative_humidity_2m,
            precipitation: current.precipitation,
            windSpeed: current.wind_speed_10m,
            weatherCode: current.weather_code,
            description: describeWeatherCode(current.weather_code),
            timezone,
        };
    }
}

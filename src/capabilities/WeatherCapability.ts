import { Clock } from '../memory/memory_types';
import { ForecastService } from '../services/ForecastService';
import { GeocodingService } from '../services/GeocodingService';
import { BaseCapability } from './Capability';
import { formatLocalTime } from './localTime';

export const WEATHER_CAPABILITY = 'get_weather';

export class WeatherCapability extends BaseCapability {
    protected readonly topic = 'the weather information';

    constructor(
        private readonly geocoder: GeocodingService,
        private readonly forecast: ForecastService,
        private readonly clock: Clock = Date.now
    ) {
        super();
    }

    name(): string {
        return WEATHER_CAPABILITY;
    }

    description(): string {
        return 'Provides current weather information for a given location. Args: {"location": "<city>"}';
    }

    protected async run(argument: string): Promise<string> {
        const location = await this.geocoder.resolve(argument);
        const weather = await this.forecast.current(location.latitude, location.longitude);
        const localTime = formatLocalTime(this.clock, weather.timezone);

        const lines = [
            `Weather in ${location.displayName} at ${localTime}:`,
            `Temperature: ${weather.temperature}°C (feels like ${weather.feelsLike}°C)`,
            `Conditions: ${weather.description}`,
            `Humidity: ${weather.humidity}%`,
            `Wind Speed: ${weather.windSpeed} km/h`,
        ];
        if (weather.precipitation > 0) {
            lines.push(`Precipitation: ${weather.precipitation} mm`);
        }
        return lines.join('\n');
    }
}

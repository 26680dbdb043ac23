import { Clock } from '../memory/memory_types';
import { GeocodingService } from '../services/GeocodingService';
import { BaseCapability } from './Capability';
import { formatLocalTime } from './localTime';

export const TIME_CAPABILITY = 'get_time';

export class TimeCapability extends BaseCapability {
    protected readonly topic = 'the time information';

    constructor(private readonly geocoder: GeocodingService, private readonly clock: Clock = Date.now) {
        super();
    }

    name(): string {
        return TIME_CAPABILITY;
    }

    description(): string {
        return 'Provides the current local time for a given location. Args: {"location": "<city>"}';
    }

    protected async run(argument: string): Promise<string> {
        const location = await this.geocoder.resolve(argument);
        const localTime = formatLocalTime(this.clock, location.timezone);
        return `The current time in ${location.displayName} is ${localTime} (${location.timezone})`;
    }
}

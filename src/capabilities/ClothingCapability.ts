import { CurrentConditions, ForecastService } from '../services/ForecastService';
import { GeocodingService } from '../services/GeocodingService';
import { isRainCode, isSnowCode } from '../services/weatherCodes';
import { BaseCapability } from './Capability';

export const CLOTHING_CAPABILITY = 'recommend_clothing';

export type TemperatureBand = 'very_cold' | 'cold' | 'mild' | 'warm' | 'hot';

const CATEGORIES = ['base', 'mid', 'outer', 'bottom', 'accessories'] as const;
type Category = typeof CATEGORIES[number];

export type Outfit = Record<Category, string[]>;

const CATEGORY_LABELS: Record<Category, string> = {
    base: 'Base',
    mid: 'Mid',
    outer: 'Outer',
    bottom: 'Bottom',
    accessories: 'Accessories',
};

const STRONG_WIND_KMH = 20;

const OUTFITS: Readonly<Record<TemperatureBand, Readonly<Partial<Outfit>>>> = {
    very_cold: {
        base: ['Thermal underwear', 'Warm long-sleeve shirt'],
        mid: ['Wool sweater', 'Fleece jacket'],
        outer: ['Heavy winter coat'],
        bottom: ['Insulated pants', 'Thermal leggings'],
        accessories: ['Warm hat', 'Scarf', 'Gloves', 'Warm socks', 'Winter boots'],
    },
    cold: {
        base: ['Long-sleeve thermal shirt'],
        mid: ['Sweater'],
        outer: ['Winter jacket'],
        bottom: ['Warm pants'],
        accessories: ['Light hat', 'Scarf', 'Gloves'],
    },
    mild: {
        base: ['Long-sleeve shirt'],
        mid: ['Light jacket'],
        bottom: ['Regular pants', 'Jeans'],
        accessories: ['Light scarf'],
    },
    warm: {
        base: ['T-shirt', 'Short-sleeve shirt'],
        bottom: ['Light pants', 'Shorts'],
        accessories: ['Sunglasses'],
    },
    hot: {
        base: ['Light t-shirt', 'Tank top'],
        bottom: ['Shorts', 'Light skirt'],
        accessories: ['Sunglasses', 'Sun hat'],
    },
};

export function temperatureBand(temperature: number): TemperatureBand {
    if (temperature < 0) return 'very_cold';
    if (temperature < 10) return 'cold';
    if (temperature < 20) return 'mild';
    if (temperature < 25) return 'warm';
    return 'hot';
}

/**
 * Builds the outfit for the temperature band, then layers on rain, snow and wind gear.
 */
export function recommendOutfit(conditions: Pick<CurrentConditions, 'temperature' | 'weatherCode' | 'windSpeed'>): Outfit {
    const template = OUTFITS[temperatureBand(conditions.temperature)];
    const outfit: Outfit = {
        base: [...(template.base ?? [])],
        mid: [...(template.mid ?? [])],
        outer: [...(template.outer ?? [])],
        bottom: [...(template.bottom ?? [])],
        accessories: [...(template.accessories ?? [])],
    };

    if (isRainCode(conditions.weatherCode)) {
        outfit.outer.push('Rain jacket');
        outfit.accessories.push('Umbrella');
    } else if (isSnowCode(conditions.weatherCode)) {
        outfit.outer.push('Snow-proof jacket');
        outfit.accessories.push('Snow boots', 'Waterproof gloves');
    }

    if (conditions.windSpeed > STRONG_WIND_KMH) {
        outfit.outer.push('Windbreaker');
    }

    return outfit;
}

export class ClothingCapability extends BaseCapability {
    protected readonly topic = 'clothing recommendations';

    constructor(private readonly geocoder: GeocodingService, private readonly forecast: ForecastService) {
        super();
    }

    name(): string {
        return CLOTHING_CAPABILITY;
    }

    description(): string {
        return 'Recommends what to wear based on the current weather at a given location. Args: {"location": "<city>"}';
    }

    protected async run(argument: string): Promise<string> {
        const location = await this.geocoder.resolve(argument);
        const conditions = await this.forecast.current(location.latitude, location.longitude);
        const outfit = recommendOutfit(conditions);

        const lines = [
            `Based on the current temperature of ${conditions.temperature}°C in ${location.displayName}, here's what you should wear:`,
        ];
        for (const category of CATEGORIES) {
            if (outfit[category].length > 0) {
                lines.push(`${CATEGORY_LABELS[category]}: ${outfit[category].join(', ')}`);
            }
        }
        return lines.join('\n');
    }
}

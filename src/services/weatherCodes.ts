// WMO weather interpretation codes as reported by Open-Meteo
const WEATHER_CODE_DESCRIPTIONS: Readonly<Record<number, string>> = {
    0: 'clear sky',
    1: 'mainly clear',
    2: 'partly cloudy',
    3: 'overcast',
    45: 'foggy',
    48: 'depositing rime fog',
    51: 'light drizzle',
    53: 'moderate drizzle',
    55: 'dense drizzle',
    56: 'light freezing drizzle',
    57: 'dense freezing drizzle',
    61: 'slight rain',
    63: 'moderate rain',
    65: 'heavy rain',
    66: 'light freezing rain',
    67: 'heavy freezing rain',
    71: 'slight snow',
    73: 'moderate snow',
    75: 'heavy snow',
    77: 'snow grains',
    80: 'slight rain showers',
    81: 'moderate rain showers',
    82: 'violent rain showers',
    85: 'slight snow showers',
    86: 'heavy snow showers',
    95: 'thunderstorm',
    96: 'thunderstorm with slight hail',
    99: 'thunderstorm with heavy hail',
};

export function describeWeatherCode(code: number): string {
    return WEATHER_CODE_DESCRIPTIONS[code] ?? 'unknown';
}

export function isRainCode(code: number): boolean {
    return (code >= 51 && code <= 67) || (code >= 80 && code <= 82);
}

export function isSnowCode(code: number): boolean {
    return (code >= 71 && code <= 77) || (code >= 85 && code <= 86);
}

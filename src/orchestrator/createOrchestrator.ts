import { AppSettings } from '../config';
import { Agent } from '../agents/Agent';
import { LLMOracle, Oracle } from '../agents/Oracle';
import { ClothingCapability } from '../capabilities/ClothingCapability';
import { TimeCapability } from '../capabilities/TimeCapability';
import { WeatherCapability } from '../capabilities/WeatherCapability';
import { SharedContext } from '../memory/SharedContext';
import { Clock } from '../memory/memory_types';
import { ForecastService } from '../services/ForecastService';
import { GeocodingService } from '../services/GeocodingService';
import { FetchFn } from '../services/http';
import { PromptService } from '../services/PromptService';
import { Orchestrator } from './Orchestrator';

export const WEATHER_AGENT = 'Weather Agent';
export const TIME_AGENT = 'Time Agent';
export const CLOTHING_AGENT = 'Clothing Agent';

export interface OrchestratorDependencies {
    oracle?: Oracle;
    fetchFn?: FetchFn;
    clock?: Clock;
    promptService?: PromptService;
}

/**
 * Builds the production object graph: one geocoder and one forecast client shared by three
 * agents, each owning a single capability, and one shared context for the session.
 */
export function createOrchestrator(settings: AppSettings, deps: OrchestratorDependencies = {}): Orchestrator {
    const clock = deps.clock ?? Date.now;
    const fetchFn = deps.fetchFn ?? fetch;
    const oracle = deps.oracle ?? new LLMOracle(settings.modelName);
    const promptService = deps.promptService ?? new PromptService(settings.promptsConfigPath);

    const geocoder = new GeocodingService(fetchFn);
    const forecast = new ForecastService(fetchFn);

    const agent = (name: string, description: string, capability: WeatherCapability | TimeCapability | ClothingCapability) =>
        new Agent({ name, description, capabilities: [capability], oracle, promptService, maxMemory: settings.maxMemory });

    return new Orchestrator({
        agents: {
            weather: agent(WEATHER_AGENT, 'You report current weather conditions for a location.', new WeatherCapability(geocoder, forecast, clock)),
            time: agent(TIME_AGENT, 'You tell the current local time at a location.', new TimeCapability(geocoder, clock)),
            clothing: agent(CLOTHING_AGENT, 'You recommend what to wear for the current weather at a location.', new ClothingCapability(geocoder, forecast)),
        },
        context: new SharedContext({ expiryMs: settings.contextExpiryMs, clock }),
        parallelFanOut: settings.parallelFanOut,
    });
}

import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { Orchestrator } from '../../src/orchestrator/Orchestrator';
import { createOrchestrator } from '../../src/orchestrator/createOrchestrator';
import { NO_REPLY_RESPONSE } from '../../src/orchestrator/MergeNode';
import { CallContext, ConversationalAgent } from '../../src/agents/Agent';
import { SharedContext } from '../../src/memory/SharedContext';
import { AppSettings, DEFAULT_CONTEXT_EXPIRY_MS } from '../../src/config';
import { ToolFailure, UNEXPECTED_FAILURE_REPLY } from '../../src/errors';
import { LONDON_RESULT, ScriptedOracle, fixedClock, openMeteoFetch } from '../helpers';

/** Agent stand-in that answers with a fixed reply and records what it was asked. */
class StubAgent implements ConversationalAgent {
    readonly calls: Array<{ utterance: string; context?: CallContext }> = [];

    constructor(readonly name: string, private readonly reply: string | Error, private readonly delayMs = 0) {}

    async process(utterance: string, context?: CallContext): Promise<string> {
        this.calls.push({ utterance, context });
        if (this.delayMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.delayMs));
        }
        if (this.reply instanceof Error) {
            throw this.reply;
        }
        return this.reply;
    }
}

const SETTINGS: AppSettings = {
    modelName: 'test-model',
    maxMemory: 10,
    contextExpiryMs: DEFAULT_CONTEXT_EXPIRY_MS,
    verbose: false,
    parallelFanOut: false,
};

describe('Orchestrator', () => {
    let errorStub: sinon.SinonStub;

    beforeEach(() => {
        errorStub = sinon.stub(console, 'error');
        sinon.stub(console, 'debug');
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('with the production agents', () => {
        it('should answer a weather question for London with the weather text unchanged', async () => {
            const oracle = new ScriptedOracle("{'action': 'get_weather', 'args': {'location': 'London'}}");
            const { fetchFn } = openMeteoFetch({ London: LONDON_RESULT });
            const orchestrator = createOrchestrator(SETTINGS, { oracle, fetchFn, clock: fixedClock });

            const reply = await orchestrator.process("What's the weather like in London?");

            expect(reply).to.equal([
                'Weather in London, United Kingdom at 02:30 PM:',
                'Temperature: 12.3°C (feels like 10.9°C)',
                'Conditions: overcast',
                'Humidity: 81%',
                'Wind Speed: 14.2 km/h',
            ].join('\n'));
            expect(oracle.prompts).to.have.length(1);
            expect(oracle.prompts[0]).to.contain('You are the Weather Agent.');
            expect(oracle.prompts[0]).to.contain('- location: London');
            expect(orchestrator.context.get('location')).to.equal('London');
        });

        it('should turn a bare "weather" on a fresh session into the could-not-find-location text', async () => {
            const oracle = new ScriptedOracle("{'action': 'get_weather', 'args': {'location': 'weather'}}");
            const { fetchFn } = openMeteoFetch({});
            const orchestrator = createOrchestrator(SETTINGS, { oracle, fetchFn, clock: fixedClock });

            expect(await orchestrator.process('weather')).to.equal("Sorry, I couldn't find the location: weather");
            expect(orchestrator.context.get('location')).to.equal('weather');
        });
    });

    describe('routing and merging', () => {
        it('should merge weather before clothing, separated by a blank line', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const clothing = new StubAgent('Clothing Agent', 'Clothing text');
            const orchestrator = new Orchestrator({ agents: { weather, clothing } });

            const reply = await orchestrator.process('What should I wear for this weather in Oslo?');

            expect(reply).to.equal('Weather text\n\nClothing text');
            expect(weather.calls).to.deep.equal([{ utterance: 'What should I wear for this weather in Oslo?', context: { location: 'Oslo' } }]);
            expect(clothing.calls).to.deep.equal(weather.calls);
        });

        it('should send an utterance without keywords to the default intents', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const time = new StubAgent('Time Agent', 'Time text');
            const orchestrator = new Orchestrator({ agents: { weather, time } });

            expect(await orchestrator.process('Hello from Madrid')).to.equal('Weather text');
            expect(time.calls).to.have.length(0);
        });

        it('should skip an intent that has no agent', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const orchestrator = new Orchestrator({ agents: { weather } });

            expect(await orchestrator.process('Time and weather in Rome')).to.equal('Weather text');
        });

        it('should drop blank replies and apologise when none remain', async () => {
            const weather = new StubAgent('Weather Agent', '  ');
            const orchestrator = new Orchestrator({ agents: { weather } });

            expect(await orchestrator.process('Weather in Rome')).to.equal(NO_REPLY_RESPONSE);
        });

        it('should keep intent order when fanning out concurrently', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text', 20);
            const time = new StubAgent('Time Agent', 'Time text', 5);
            const clothing = new StubAgent('Clothing Agent', 'Clothing text');
            const orchestrator = new Orchestrator({ agents: { weather, time, clothing }, parallelFanOut: true });

            expect(await orchestrator.process('Give me the rundown for Lima')).to.equal('Weather text\n\nTime text\n\nClothing text');
        });
    });

    describe('shared location', () => {
        it('should keep the first location for later turns', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const time = new StubAgent('Time Agent', 'Time text');
            const orchestrator = new Orchestrator({ agents: { weather, time } });

            await orchestrator.process('Weather in Paris');
            await orchestrator.process('What time is it in Tokyo?');

            expect(time.calls[0].context).to.deep.equal({ location: 'Paris' });
        });

        it('should forget the location after a reset', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const orchestrator = new Orchestrator({ agents: { weather } });

            await orchestrator.process('Weather in Paris');
            orchestrator.resetContext();
            await orchestrator.process('Weather in Tokyo');

            expect(weather.calls[1].context).to.deep.equal({ location: 'Tokyo' });
        });

        it('should extract a new location once the context has expired', async () => {
            let now = 0;
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const orchestrator = new Orchestrator({ agents: { weather }, context: new SharedContext({ clock: () => now }) });

            await orchestrator.process('Weather in Paris');
            now = 31 * 60 * 1000;
            await orchestrator.process('Weather in Tokyo');

            expect(weather.calls[1].context).to.deep.equal({ location: 'Tokyo' });
        });
    });

    describe('failures', () => {
        it('should convert a structured failure into a sentence carrying its summary', async () => {
            const weather = new StubAgent('Weather Agent', new ToolFailure('Forecast quota exhausted', 'get_weather'));
            const orchestrator = new Orchestrator({ agents: { weather }, sessionId: 'session-1' });

            const reply = await orchestrator.process('Weather in Rome');

            expect(reply).to.equal("Sorry, I couldn't complete that request: Forecast quota exhausted");
            expect(errorStub.calledOnce).to.be.true;
            expect(errorStub.firstCall.args[0]).to.equal('Orchestrator: [ToolFailure] Forecast quota exhausted');
            expect(errorStub.firstCall.args[1]).to.deep.equal({ sessionId: 'session-1', utterance: 'Weather in Rome' });
        });

        it('should convert an unexpected failure into the generic sentence', async () => {
            const weather = new StubAgent('Weather Agent', new RangeError('boom'));
            const orchestrator = new Orchestrator({ agents: { weather } });

            expect(await orchestrator.process('Weather in Rome')).to.equal(UNEXPECTED_FAILURE_REPLY);
        });

        it('should report an utterance with no usable location', async () => {
            const weather = new StubAgent('Weather Agent', 'Weather text');
            const orchestrator = new Orchestrator({ agents: { weather } });

            expect(await orchestrator.process('   ')).to.equal("Sorry, I couldn't complete that request: Could not determine a location from the request.");
            expect(weather.calls).to.have.length(0);
        });
    });

    it('should give every orchestrator its own session id', () => {
        const agents = { weather: new StubAgent('Weather Agent', 'x') };
        const first = new Orchestrator({ agents });
        const second = new Orchestrator({ agents });
        expect(first.sessionId).to.match(/^[0-9a-f-]{36}$/);
        expect(first.sessionId).to.not.equal(second.sessionId);
    });
});

import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { BaseCapability, CapabilityArgs, describeCapability, normalizeArgs } from '../../src/capabilities/Capability';
import { SlotResolutionFailure, ToolFailure } from '../../src/errors';

/** Records the argument it was run with; fails when told to. */
class RecordingCapability extends BaseCapability {
    protected readonly topic = 'the test data';
    readonly received: string[] = [];

    constructor(private readonly failure?: Error) {
        super();
    }

    name(): string {
        return 'record';
    }

    description(): string {
        return 'Records its argument.';
    }

    protected async run(argument: string): Promise<string> {
        this.received.push(argument);
        if (this.failure) {
            throw this.failure;
        }
        return `ran with ${argument}`;
    }
}

describe('Capability', () => {

    describe('normalizeArgs', () => {
        it('should pass a string through unchanged', () => {
            expect(normalizeArgs('Paris')).to.equal('Paris');
        });

        it('should prefer the location key of a mapping', () => {
            expect(normalizeArgs({ city: 'Lyon', location: 'Paris' })).to.equal('Paris');
        });

        it('should coerce the first value when there is no location key', () => {
            expect(normalizeArgs({ city: 'Paris' })).to.equal('Paris');
            expect(normalizeArgs({ days: 3, city: 'Paris' })).to.equal('3');
        });

        it('should render nested and missing values', () => {
            expect(normalizeArgs({ place: { name: 'Paris' } })).to.equal('{"name":"Paris"}');
            expect(normalizeArgs({ location: null })).to.equal('');
            expect(normalizeArgs({})).to.equal('');
        });
    });

    describe('BaseCapability.invoke', () => {
        let errorStub: sinon.SinonStub;

        beforeEach(() => {
            errorStub = sinon.stub(console, 'error');
        });

        afterEach(() => {
            sinon.restore();
        });

        it('should run with the same argument for {"location": "Paris"}, {"city": "Paris"} and "Paris"', async () => {
            const capability = new RecordingCapability();
            const inputs: CapabilityArgs[] = [{ location: 'Paris' }, { city: 'Paris' }, 'Paris'];
            for (const args of inputs) {
                expect(await capability.invoke(args)).to.equal('ran with Paris');
            }
            expect(capability.received).to.deep.equal(['Paris', 'Paris', 'Paris']);
        });

        it('should trim the normalised argument', async () => {
            const capability = new RecordingCapability();
            await capability.invoke({ location: '  Oslo ' });
            expect(capability.received).to.deep.equal(['Oslo']);
        });

        it('should turn an unresolvable location into a sentence', async () => {
            const capability = new RecordingCapability(new SlotResolutionFailure('Could not find location: Nowhere', 'Geocoding', 'Nowhere'));
            const reply = await capability.invoke('Nowhere');
            expect(reply).to.equal("Sorry, I couldn't find the location: Nowhere");
        });

        it('should name the location when the forecast is unavailable', async () => {
            const capability = new RecordingCapability(new ToolFailure('Request to api.open-meteo.com returned HTTP 503', 'Forecast'));
            expect(await capability.invoke('Paris')).to.equal("Sorry, I couldn't get weather data for Paris");
        });

        it('should turn any other failure into a sentence and log it as a ToolFailure', async () => {
            const capability = new RecordingCapability(new Error('socket hang up'));

            const reply = await capability.invoke('Paris');

            expect(reply).to.equal('Sorry, I encountered an error getting the test data.');
            expect(errorStub.calledOnce).to.be.true;
            expect(errorStub.firstCall.args[0]).to.equal('Capability[record]: [ToolFailure] record failed: socket hang up');
            expect(errorStub.firstCall.args[1]).to.deep.equal({ argument: 'Paris', cause: 'socket hang up' });
        });
    });

    it('should describe a capability by name and description', () => {
        expect(describeCapability(new RecordingCapability())).to.deep.equal({ name: 'record', description: 'Records its argument.' });
    });
});

import { expect } from 'chai';
import { describe, it } from 'mocha';
import { formatCallContext, formatCapabilities } from '../../src/agents/agentUtils';
import { Capability } from '../../src/capabilities/Capability';

function capability(name: string, description: string): Capability {
    return {
        name: () => name,
        description: () => description,
        invoke: async () => '',
    };
}

describe('agentUtils', () => {
    describe('formatCapabilities', () => {
        it('should render one line per capability', () => {
            const text = formatCapabilities([
                capability('get_weather', 'Current weather for a location.'),
                capability('get_time', 'Local time at a location.'),
            ]);
            expect(text).to.equal('- get_weather: Current weather for a location.\n- get_time: Local time at a location.');
        });

        it('should say (none) for an agent without capabilities', () => {
            expect(formatCapabilities([])).to.equal('(none)');
        });
    });

    describe('formatCallContext', () => {
        it('should render the context as key/value lines, skipping blank values', () => {
            expect(formatCallContext({ location: 'Oslo', unit: ' ' })).to.equal('- location: Oslo');
        });

        it('should say (none) for an empty context', () => {
            expect(formatCallContext({})).to.equal('(none)');
        });
    });
});

import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { SharedContext } from '../../src/memory/SharedContext';

const MINUTE = 60 * 1000;
const T0 = Date.UTC(2024, 0, 15, 9, 0, 0);

describe('SharedContext', () => {
    let now: number;
    let context: SharedContext;

    beforeEach(() => {
        sinon.stub(console, 'debug');
        now = T0;
        context = new SharedContext({ clock: () => now });
    });

    afterEach(() => {
        sinon.restore();
    });

    it('should return a stored value', () => {
        context.update('location', 'Paris');
        expect(context.get('location')).to.equal('Paris');
        expect(context.has('location')).to.be.true;
    });

    it('should return undefined for a key that was never written', () => {
        expect(context.get('location')).to.be.undefined;
    });

    it('should keep a value written 29 minutes ago', () => {
        context.update('location', 'Paris');
        now = T0 + 29 * MINUTE;
        expect(context.get('location')).to.equal('Paris');
    });

    it('should expire a value written 31 minutes ago and clear every other key with it', () => {
        context.update('location', 'Paris');
        context.update('units', 'metric');
        now = T0 + 31 * MINUTE;
        expect(context.get('location')).to.be.undefined;
        expect(context.size).to.equal(0);
        expect(context.get('units')).to.be.undefined;
    });

    it('should still see the data at exactly the expiry boundary', () => {
        context.update('location', 'Paris');
        now = T0 + 30 * MINUTE;
        expect(context.get('location')).to.equal('Paris');
    });

    it('should restart the clock for the whole store on any update', () => {
        context.update('location', 'Paris');
        now = T0 + 20 * MINUTE;
        context.update('units', 'metric');
        now = T0 + 45 * MINUTE;
        expect(context.get('location')).to.equal('Paris');
    });

    it('should not expire without a read', () => {
        context.update('location', 'Paris');
        now = T0 + 60 * MINUTE;
        expect(context.size).to.equal(1);
    });

    it('should record the write time on each entry', () => {
        context.update('location', 'Paris');
        expect(context.entry('location')).to.deep.equal({ key: 'location', value: 'Paris', lastWriteTime: T0 });
    });

    it('should honour a custom expiry', () => {
        const short = new SharedContext({ expiryMs: MINUTE, clock: () => now });
        short.update('location', 'Oslo');
        now = T0 + 2 * MINUTE;
        expect(short.snapshot()).to.deep.equal({});
    });

    it('should empty the store on clear', () => {
        context.update('location', 'Paris');
        context.clear();
        expect(context.snapshot()).to.deep.equal({});
    });
});

import { Throttle } from '../../src/http/throttle';
import { FakeClock } from '../helpers';

describe('Throttle', () => {
    it('lets the first call through without waiting', async () => {
        const clock = new FakeClock(10_000);
        const throttle = new Throttle(1000, clock);

        expect(await throttle.waitForSlot()).toBe(0);
        expect(clock.sleeps).toEqual([]);
    });

    it('measures the gap from the end of the previous call', async () => {
        const clock = new FakeClock(0);
        const throttle = new Throttle(1000, clock);

        await throttle.execute(async () => {
            clock.advance(300); // the request itself takes 300ms
        });
        expect(clock.now()).toBe(300);

        clock.advance(400);
        expect(await throttle.waitForSlot()).toBe(600);
        expect(clock.sleeps).toEqual([600]);
    });

    it('does not wait when the interval has already passed', async () => {
        const clock = new FakeClock(0);
        const throttle = new Throttle(500, clock);

        await throttle.execute(async () => 'first');
        clock.advance(2000);

        expect(await throttle.execute(async () => 'second')).toBe('second');
        expect(clock.sleeps).toEqual([]);
    });

    it('releases the slot when the call throws', async () => {
        const clock = new FakeClock(0);
        const throttle = new Throttle(1000, clock);

        await expect(throttle.execute(async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await throttle.waitForSlot();
        expect(clock.sleeps).toEqual([1000]);
    });
});

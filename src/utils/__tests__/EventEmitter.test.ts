/**
 * @fileoverview Unit tests for the EventEmitter class.
 * @module utils/__tests__/EventEmitter.test
 */

import { EventEmitter } from '../EventEmitter';

type TestEvents = {
    changed: { value: number };
    cleared: undefined;
};

describe('EventEmitter', () => {
    it('delivers payloads to every handler', () => {
        const emitter = new EventEmitter<TestEvents>();
        const first = jest.fn();
        const second = jest.fn();

        emitter.on('changed', first);
        emitter.on('changed', second);
        emitter.emit('changed', { value: 3 });

        expect(first).toHaveBeenCalledWith({ value: 3 });
        expect(second).toHaveBeenCalledWith({ value: 3 });
    });

    it('removes a handler through the returned disposable', () => {
        const emitter = new EventEmitter<TestEvents>();
        const handler = jest.fn();

        const subscription = emitter.on('cleared', handler);
        subscription.dispose();
        emitter.emit('cleared', undefined);

        expect(handler).not.toHaveBeenCalled();
        expect(emitter.listenerCount('cleared')).toBe(0);
    });

    it('isolates handler errors', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => {});
        const emitter = new EventEmitter<TestEvents>();
        const after = jest.fn();

        emitter.on('changed', () => {
            throw new Error('boom');
        });
        emitter.on('changed', after);
        emitter.emit('changed', { value: 1 });

        expect(after).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledWith(
            "[EventEmitter] Handler for 'changed' threw:",
            expect.any(Error)
        );
        error.mockRestore();
    });

    it('does not deliver to handlers added during an emit', () => {
        const emitter = new EventEmitter<TestEvents>();
        const late = jest.fn();

        emitter.on('changed', () => {
            emitter.on('changed', late);
        });
        emitter.emit('changed', { value: 1 });

        expect(late).not.toHaveBeenCalled();
        expect(emitter.listenerCount('changed')).toBe(2);
    });

    it('removes listeners for one event or all events', () => {
        const emitter = new EventEmitter<TestEvents>();
        emitter.on('changed', jest.fn());
        emitter.on('cleared', jest.fn());

        emitter.removeAllListeners('changed');
        expect(emitter.listenerCount('changed')).toBe(0);
        expect(emitter.listenerCount('cleared')).toBe(1);

        emitter.removeAllListeners();
        expect(emitter.listenerCount('cleared')).toBe(0);
    });
});

import { describe, expect, it, vi } from 'vitest';
import { TypedEmitter } from './TypedEmitter.js';

type Events = { count: number; label: string };

describe('TypedEmitter', () => {
	it('delivers payloads to listeners of the named event only', () => {
		const emitter = new TypedEmitter<Events>();
		const counts = vi.fn();
		const labels = vi.fn();
		emitter.on('count', counts);
		emitter.on('label', labels);

		emitter.emit('count', 3);

		expect(counts).toHaveBeenCalledWith(3);
		expect(labels).not.toHaveBeenCalled();
	});

	it('stops delivering after the returned unsubscribe runs', () => {
		const emitter = new TypedEmitter<Events>();
		const counts = vi.fn();
		const off = emitter.on('count', counts);
		expect(emitter.listenerCount('count')).toBe(1);

		off();
		emitter.emit('count', 1);

		expect(counts).not.toHaveBeenCalled();
		expect(emitter.listenerCount('count')).toBe(0);
	});
});

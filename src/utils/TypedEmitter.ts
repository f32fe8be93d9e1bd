import { EventEmitter } from 'node:events';

type Listener<T> = (payload: T) => void;

/**
 * `EventEmitter` narrowed to an event map. Listeners run synchronously in subscription order.
 */
export class TypedEmitter<Events extends Record<string, unknown>> {
	private emitter = new EventEmitter({ captureRejections: true });

	on<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): () => void {
		this.emitter.on(event, listener as (...args: unknown[]) => void);
		return () => this.off(event, listener);
	}

	off<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): void {
		this.emitter.off(event, listener as (...args: unknown[]) => void);
	}

	emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
		this.emitter.emit(event, payload);
	}

	listenerCount<K extends keyof Events & string>(event: K): number {
		return this.emitter.listenerCount(event);
	}
}

import { EventEmitter } from "eventemitter3";

/**
 * Type-safe event emitter over eventemitter3.
 *
 * `TEvents` maps each event name to the single payload its listeners receive.
 *
 * @example
 * ```ts
 * type Events = { connect: { target: string } };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("connect", ({ target }) => console.log(target));
 * emitter.emit("connect", { target: "agg:50051" });
 * ```
 */
export class TypedEmitter<TEvents extends object> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): this {
		this.ee.off(event, handler);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): this {
		this.ee.once(event, handler);
		return this;
	}

	/** Invokes every listener of `event`; returns false when nobody listens. */
	emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
		return this.ee.emit(event, payload);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	removeAllListeners(): this {
		this.ee.removeAllListeners();
		return this;
	}
}

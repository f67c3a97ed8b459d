import EventEmitter from "eventemitter3";

/** Event name → handler signature. Declare maps with `type`, not `interface`. */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe event emitter over eventemitter3. Dispatch is synchronous, in
 * registration order.
 *
 * @example
 * ```ts
 * type Events = { trade: (block: number) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("trade", (block) => console.log(block));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	/** @returns whether any handler was registered for the event */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}
}

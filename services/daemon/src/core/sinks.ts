// services/daemon/src/core/sinks.ts

export interface EventSink<E> {
    publish(evt: E): void
}

/**
 * Delivers each event to every sink in order. A failing sink is reported
 * through `onError` and never stops delivery to the rest.
 */
export class FanoutEventSink<E> implements EventSink<E> {
    private readonly sinks: EventSink<E>[]
    private readonly onError: (err: unknown, evt: E) => void

    constructor(onError: (err: unknown, evt: E) => void, ...sinks: EventSink<E>[]) {
        this.onError = onError
        this.sinks = sinks
    }

    publish(evt: E): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                this.onError(err, evt)
            }
        }
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

type EventCallback<T> = (payload: T) => void;

/**
 * Small typed pub/sub. `Events` maps each event name to its payload type.
 */
export class EventBus<Events extends Record<string, unknown>> {
    private listeners = new Map<keyof Events, Set<EventCallback<never>>>();

    on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
        let callbacks = this.listeners.get(event);
        if (!callbacks) {
            callbacks = new Set();
            this.listeners.set(event, callbacks);
        }
        callbacks.add(callback);

        return () => this.off(event, callback);
    }

    off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
        this.listeners.get(event)?.delete(callback);
    }

    emit<K extends keyof Events>(event: K, payload: Events[K]): void {
        const callbacks = this.listeners.get(event);
        if (!callbacks) return;
        for (const callback of callbacks) {
            (callback as EventCallback<Events[K]>)(payload);
        }
    }

    clear(): void {
        this.listeners.clear();
    }
}

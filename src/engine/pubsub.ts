import type { EventEmitter } from './combat/types.js';

export type Subscriber = (payload: unknown) => void;

/**
 * In-process topic bus. Combat publishes on the 'combat' topic.
 */
export class PubSub implements EventEmitter {
    private topics: Map<string, Set<Subscriber>> = new Map();

    subscribe(topic: string, callback: Subscriber): () => void {
        const subscribers = this.topics.get(topic) ?? new Set<Subscriber>();
        this.topics.set(topic, subscribers);
        subscribers.add(callback);

        return () => {
            subscribers.delete(callback);
            if (subscribers.size === 0 && this.topics.get(topic) === subscribers) {
                this.topics.delete(topic);
            }
        };
    }

    publish(topic: string, payload: unknown): void {
        const subscribers = this.topics.get(topic);
        if (!subscribers) return;

        for (const callback of Array.from(subscribers)) {
            try {
                callback(payload);
            } catch (e) {
                console.error(`[PubSub] Subscriber on '${topic}' failed:`, e instanceof Error ? e.message : String(e));
            }
        }
    }
}

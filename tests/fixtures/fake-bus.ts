import type { MessageBus, MessageHandler } from '../../src/nats/connection.js';

export interface Published {
    subject: string;
    data: unknown;
    stream?: string;
}

/**
 * In-process stand-in for the NATS connection.
 */
export class FakeBus implements MessageBus {
    connected = true;
    failDurable = false;
    readonly published: Published[] = [];
    private handlers = new Map<string, Set<MessageHandler>>();

    isConnected(): boolean {
        return this.connected;
    }

    subscribe(subject: string, handler: MessageHandler): () => void {
        const handlers = this.handlers.get(subject) ?? new Set<MessageHandler>();
        handlers.add(handler);
        this.handlers.set(subject, handlers);
        return () => {
            handlers.delete(handler);
        };
    }

    publish(subject: string, data: unknown): void {
        this.published.push({ subject, data });
    }

    async publishDurable(subject: string, data: unknown, stream: string): Promise<void> {
        if (this.failDurable) {
            throw new Error('no responders');
        }
        this.published.push({ subject, data, stream });
    }

    deliver(subject: string, data: unknown): void {
        for (const handler of this.handlers.get(subject) ?? []) {
            handler(data, subject);
        }
    }

    subscriberCount(subject: string): number {
        return this.handlers.get(subject)?.size ?? 0;
    }
}

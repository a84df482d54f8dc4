import { connect, JSONCodec, type ConnectionOptions, type NatsConnection } from 'nats';
import { logger } from '../config/logger.js';

export type MessageHandler = (data: unknown, subject: string) => void;

/**
 * The slice of the NATS client the adapters depend on.
 */
export interface MessageBus {
    isConnected(): boolean;
    /** Returns a function that unsubscribes. Undecodable messages are logged and skipped. */
    subscribe(subject: string, handler: MessageHandler): () => void;
    publish(subject: string, data: unknown): void;
    /** Resolves once the stream has acknowledged the message. */
    publishDurable(subject: string, data: unknown, stream: string): Promise<void>;
}

const codec = JSONCodec<unknown>();

export class NatsClient implements MessageBus {
    private nc: NatsConnection | null = null;
    private connecting: Promise<void> | null = null;

    constructor(private options: ConnectionOptions) { }

    async connect(): Promise<void> {
        if (this.nc) return;
        if (!this.connecting) {
            this.connecting = this.open().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    private async open(): Promise<void> {
        try {
            logger.info({ servers: this.options.servers }, 'Connecting to NATS');

            const nc = await connect(this.options);
            this.nc = nc;

            logger.info('Connected to NATS successfully');

            this.watchStatus(nc).catch((err: unknown) => {
                logger.warn({ error: err }, 'NATS status stream ended');
            });
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to NATS');
            throw err;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            logger.info({ type: status.type, data: status.data }, 'NATS status update');
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed();
    }

    subscribe(subject: string, handler: MessageHandler): () => void {
        const sub = this.getConnection().subscribe(subject, {
            callback: (err, msg) => {
                if (err) {
                    logger.error({ error: err, subject }, 'Subscription error');
                    return;
                }

                let data: unknown;
                try {
                    data = codec.decode(msg.data);
                } catch (parseErr) {
                    logger.warn({ error: parseErr, subject: msg.subject }, 'JSON parse error, message skipped');
                    return;
                }
                handler(data, msg.subject);
            },
        });

        logger.info({ subject }, 'Subscribed');
        return () => sub.unsubscribe();
    }

    publish(subject: string, data: unknown): void {
        this.getConnection().publish(subject, codec.encode(data));
    }

    async publishDurable(subject: string, data: unknown, stream: string): Promise<void> {
        const js = this.getConnection().jetstream();
        await js.publish(subject, codec.encode(data), { expect: { streamName: stream } });
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }
}

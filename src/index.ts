import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { loadRules } from './rules/loader.js';
import { NatsClient } from './nats/connection.js';
import { NatsSensorSource } from './nats/sensor-source.js';
import { AssessmentPublisher, NotificationPublisher } from './nats/publisher.js';
import { Metrics } from './metrics/counter.js';
import { OfflineCache } from './cache/offline-cache.js';
import { InMemoryAssessmentRepository } from './persistence/repository.js';
import { MonitoringSession } from './monitor/session.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting heart-rate monitoring service');

    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    const rules = loadRules(config.rules.path, validator);
    const metrics = new Metrics();

    const natsClient = new NatsClient({
        servers: config.nats.url,
        name: 'cardio-monitor',
    });

    await natsClient.connect();

    const sensor = new NatsSensorSource(natsClient, validator);
    const notifier = new NotificationPublisher(natsClient, validator);
    const assessmentPublisher = new AssessmentPublisher(natsClient, validator, config.nats.stream);
    const repository = new InMemoryAssessmentRepository();
    const cache = new OfflineCache(config.cache.path, validator, config.cache.ttlMs);

    const session = new MonitoringSession(
        {
            rules,
            profile: { age: config.monitor.age },
            ringCapacity: config.monitor.ringCapacity,
            windowCapacity: config.monitor.windowCapacity,
            channelCapacity: config.monitor.channelCapacity,
            analysisIntervalMs: config.monitor.analysisIntervalMs,
            cooldownMs: config.monitor.cooldownMs,
            estimatedMaxHr: config.monitor.estimatedMaxHr,
        },
        { sensor, notifier, repository, cache, metrics },
    );

    session.on((event) => {
        if (event.type !== 'assessment') return;
        assessmentPublisher.publishAssessment(event.record).then(
            (published) => {
                if (!published) {
                    logger.warn({ assessmentId: event.record.assessment.id }, 'Assessment event not published');
                }
            },
            (err: unknown) => {
                logger.error({ error: err }, 'Assessment publish failed');
            },
        );
    });

    const apiServer = new ApiServer(config.http.port, {
        bus: natsClient,
        metrics,
        session,
        repository,
    });

    await apiServer.start();
    await session.start();

    logger.info('Heart-rate monitoring service running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await session.stop();
        sensor.close();
        await apiServer.stop();
        await natsClient.close();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err: unknown) => {
            logger.error({ error: err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});

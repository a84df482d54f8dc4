import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import type { Notifier } from '../monitor/collaborators.js';
import type { Notification } from '../rules/types.js';
import type { AssessmentRecord } from '../scoring/types.js';
import type { MessageBus } from './connection.js';

export const NOTIFICATION_SUBJECT = 'monitor.notification.dispatched';
export const ASSESSMENT_SUBJECT = 'monitor.assessment.recorded';

export interface EventEnvelope<N extends string, P> {
    event_name: N;
    event_id: string;
    timestamp: string;
    payload: P;
}

export type NotificationDispatchedEvent = EventEnvelope<typeof NOTIFICATION_SUBJECT, Notification>;
export type AssessmentRecordedEvent = EventEnvelope<typeof ASSESSMENT_SUBJECT, AssessmentRecord>;

function envelope<N extends string, P>(eventName: N, payload: P, now: () => Date): EventEnvelope<N, P> {
    return {
        event_name: eventName,
        event_id: uuidv4(),
        timestamp: now().toISOString(),
        payload,
    };
}

/**
 * Delivers user-facing notifications as NATS events. Rejects when the event
 * fails validation or the bus refuses it, so the caller can count the failure.
 */
export class NotificationPublisher implements Notifier {
    constructor(
        private bus: MessageBus,
        private validator: SchemaValidator,
        private now: () => Date = () => new Date(),
    ) { }

    async dispatch(notification: Notification): Promise<void> {
        const event = envelope(NOTIFICATION_SUBJECT, notification, this.now);

        const validationResult = this.validator.validateNotificationDispatched(event);
        if (!validationResult.valid) {
            logger.error({ errors: validationResult.errors, event }, 'Notification validation failed');
            throw new Error(`Invalid notification event: ${validationResult.errors}`);
        }

        this.bus.publish(NOTIFICATION_SUBJECT, event);
        logger.info(
            { event_id: event.event_id, title: notification.title, urgency: notification.urgency },
            'Notification dispatched',
        );
    }
}

export class AssessmentPublisher {
    constructor(
        private bus: MessageBus,
        private validator: SchemaValidator,
        private streamName: string,
        private now: () => Date = () => new Date(),
    ) { }

    /**
     * Returns false instead of throwing; a lost assessment event never stops monitoring.
     */
    async publishAssessment(record: AssessmentRecord): Promise<boolean> {
        const event = envelope(ASSESSMENT_SUBJECT, record, this.now);

        const validationResult = this.validator.validateAssessmentRecorded(event);
        if (!validationResult.valid) {
            logger.error(
                { errors: validationResult.errors, assessmentId: record.assessment.id },
                'Assessment event validation failed',
            );
            return false;
        }

        try {
            await this.bus.publishDurable(ASSESSMENT_SUBJECT, event, this.streamName);

            logger.info(
                { event_id: event.event_id, assessmentId: record.assessment.id, overall: record.assessment.overallStatus },
                'Assessment published successfully',
            );
            return true;
        } catch (err) {
            logger.error({ error: err, assessmentId: record.assessment.id }, 'Failed to publish assessment to NATS');
            return false;
        }
    }
}

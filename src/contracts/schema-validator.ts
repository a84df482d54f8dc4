import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { SchemaObject } from 'ajv';
import { existsSync, readdirSync, readFileSync } from 'fs';
import { extname, join } from 'path';
import { logger } from '../config/logger.js';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;

const SCHEMA_BASE = 'https://cardio-monitor.example.com/schemas';

export const SchemaIds = {
    heartRateSampled: `${SCHEMA_BASE}/events/heart-rate-sampled.json`,
    ancillaryReported: `${SCHEMA_BASE}/events/ancillary-reported.json`,
    assessmentRecorded: `${SCHEMA_BASE}/events/assessment-recorded.json`,
    notificationDispatched: `${SCHEMA_BASE}/events/notification-dispatched.json`,
    alertRules: `${SCHEMA_BASE}/rules/alert-rules.json`,
    cachedAssessment: `${SCHEMA_BASE}/cache/cached-assessment.json`,
    replayQueue: `${SCHEMA_BASE}/cache/replay-queue.json`,
} as const;

export type SchemaId = (typeof SchemaIds)[keyof typeof SchemaIds];

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

function isIdentifiedSchema(value: unknown): value is SchemaObject & { $id: string } {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && '$id' in value && typeof value.$id === 'string';
}

/**
 * Every JSON schema under the contracts directory, compiled with the 2020-12
 * dialect. Schemas reference each other by `$id`, so all are registered before
 * any is compiled.
 */
export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private loaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    /**
     * Register the schemas found below the contracts directory. Files that are
     * not JSON or carry no `$id` are logged and skipped. Returns how many were registered.
     */
    loadSchemas(): number {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return 0;
        }

        const files = readdirSync(this.contractsPath, { recursive: true, encoding: 'utf-8' })
            .filter((name) => extname(name) === '.json')
            .map((name) => join(this.contractsPath, name))
            .sort();

        let registered = 0;
        for (const file of files) {
            if (this.register(file)) registered++;
        }

        this.loaded = true;
        logger.info({ path: this.contractsPath, registered, skipped: files.length - registered }, 'Schemas loaded');
        return registered;
    }

    validate(schemaId: string, data: unknown): ValidationResult {
        if (!this.loaded) {
            logger.warn({ schemaId }, 'Validation requested before schemas were loaded');
            return { valid: false, errors: 'Schemas not loaded' };
        }

        const check = this.ajv.getSchema(schemaId);
        if (!check) {
            logger.error({ schemaId }, 'Schema not found');
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        return check(data) ? { valid: true } : { valid: false, errors: this.ajv.errorsText(check.errors) };
    }

    /**
     * Type guard over a loaded schema. The caller names the type the schema describes.
     */
    is<T>(schemaId: SchemaId, data: unknown): data is T {
        return this.validate(schemaId, data).valid;
    }

    validateHeartRateSampled(data: unknown): ValidationResult {
        return this.validate(SchemaIds.heartRateSampled, data);
    }

    validateAncillaryReported(data: unknown): ValidationResult {
        return this.validate(SchemaIds.ancillaryReported, data);
    }

    validateAssessmentRecorded(data: unknown): ValidationResult {
        return this.validate(SchemaIds.assessmentRecorded, data);
    }

    validateNotificationDispatched(data: unknown): ValidationResult {
        return this.validate(SchemaIds.notificationDispatched, data);
    }

    private register(file: string): boolean {
        let schema: unknown;
        try {
            schema = JSON.parse(readFileSync(file, 'utf-8'));
        } catch (err) {
            logger.error({ file, error: err }, 'Failed to read schema');
            return false;
        }

        if (!isIdentifiedSchema(schema)) {
            logger.warn({ file }, 'Schema missing $id, skipped');
            return false;
        }

        this.ajv.addSchema(schema);
        logger.debug({ $id: schema.$id, file }, 'Schema registered');
        return true;
    }
}

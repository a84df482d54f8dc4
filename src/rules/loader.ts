import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import { SchemaIds, SchemaValidator } from '../contracts/schema-validator.js';
import type { AlertRules } from './types.js';

export function loadRules(rulesPath: string, validator: SchemaValidator): AlertRules {
    let rules: unknown;

    try {
        rules = JSON.parse(readFileSync(rulesPath, 'utf-8'));
    } catch (err) {
        logger.error({ rulesPath, error: err }, 'Failed to load rules');
        throw new Error(`Failed to load rules from ${rulesPath}: ${err}`);
    }

    if (!validator.is<AlertRules>(SchemaIds.alertRules, rules)) {
        const { errors } = validator.validate(SchemaIds.alertRules, rules);
        logger.error({ rulesPath, errors }, 'Rules file failed validation');
        throw new Error(`Invalid rules in ${rulesPath}: ${errors}`);
    }

    if (rules.resting.low_threshold >= rules.resting.high_threshold) {
        throw new Error(`Invalid rules in ${rulesPath}: resting low_threshold must be below high_threshold`);
    }

    logger.info({ rulesPath, rules }, 'Rules loaded successfully');

    return rules;
}

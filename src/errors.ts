/**
 * Raised when a monitoring session cannot start because its sensor source is
 * unavailable or access was refused.
 */
export class MonitorConfigurationError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'MonitorConfigurationError';
    }
}

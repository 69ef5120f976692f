/**
 * Fatal pipeline failure: a required static input (PRN table, corpus) is
 * missing entirely, so no meaningful partial result exists.
 */
export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly input: 'prn-table' | 'corpus' | 'database'
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

/**
 * Invalid configuration value.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly key: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Render an unknown thrown value for log output.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * The single failure type a plugin step surfaces to the host.
 * Thrown from a blocking event handler it rejects the publishing call,
 * which rolls back the surrounding transaction.
 */
export class PluginExecutionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PluginExecutionError';
    }
}

/**
 * Raised by a DataService when the underlying connection fails.
 */
export class DataServiceFault extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DataServiceFault';
    }
}

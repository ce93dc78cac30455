import { Logger } from '@vendure/core';

import { TraceLevel } from '../types';

/**
 * Free-text diagnostic sink supplied by the host.
 */
export interface TracingService {
    trace(message: string): void;
}

/**
 * Writes trace lines to the Vendure Logger under the plugin's class name.
 */
export class LoggerTracingService implements TracingService {
    constructor(
        private readonly loggerCtx: string,
        private readonly level: TraceLevel = 'verbose',
    ) { }

    trace(message: string): void {
        Logger[this.level](message, this.loggerCtx);
    }
}

/**
 * Prefixes every line with the time elapsed since the previous one,
 * e.g. `[+1,204ms] - Exiting PostSubEntityCreate.execute()`.
 *
 * Not shared between invocations: the delta is per execution.
 */
export class LocalTracingService implements TracingService {
    private previousTraceTime: number;

    constructor(
        private readonly tracingService: TracingService,
        operationCreatedOn: Date,
    ) {
        // The host clock may run ahead of ours
        this.previousTraceTime = Math.min(operationCreatedOn.getTime(), Date.now());
    }

    trace(message: string): void {
        const now = Date.now();
        const deltaMs = Math.round(now - this.previousTraceTime).toLocaleString('en-US');
        this.tracingService.trace(`[+${deltaMs}ms] - ${message}`);
        this.previousTraceTime = now;
    }
}

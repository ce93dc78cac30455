/**
 * Level at which plugin trace lines are written to the Vendure Logger.
 */
export type TraceLevel = 'info' | 'verbose' | 'debug';

/**
 * Options passed to `PropertySyncPlugin.init()`.
 */
export interface PropertySyncPluginOptions {
    /**
     * Logger level for the execution trace of each plugin step.
     *
     * @default 'verbose'
     */
    traceLevel?: TraceLevel;
    /**
     * Whether reads that ask for no row locks get the driver's dirty-read
     * hint. Only SQL Server has one; other drivers always issue a plain SELECT.
     *
     * @default true
     */
    noLockReads?: boolean;
}

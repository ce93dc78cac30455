import { Type } from '@vendure/common/lib/shared-types';

import { LocalPluginContext } from './local-plugin-context';
import { DataServiceFault, PluginExecutionError } from './plugin-execution.error';
import { ServiceProvider } from './service-provider';

/**
 * Base class for plugin steps.
 *
 * Instances are created once and reused for every event, possibly for
 * several events at the same time, so subclasses must not keep
 * per-invocation state on `this`. Everything an invocation needs is on
 * the LocalPluginContext.
 */
export abstract class PluginBase {
    protected readonly pluginClassName: string;

    protected constructor(pluginClass: Type<PluginBase>) {
        this.pluginClassName = pluginClass.name;
    }

    /**
     * Entry point called by the host for each event.
     *
     * Every failure reaches the caller as a PluginExecutionError.
     */
    async execute(serviceProvider: ServiceProvider | undefined): Promise<void> {
        if (!serviceProvider) {
            throw new PluginExecutionError('serviceProvider');
        }

        const localContext = new LocalPluginContext(serviceProvider);
        localContext.trace(`Entered ${this.pluginClassName}.execute()`);

        try {
            await this.executePlugin(localContext);
        } catch (e) {
            localContext.trace(`Exception: ${e instanceof Error && e.stack ? e.stack : String(e)}`);
            throw this.toExecutionError(e);
        } finally {
            localContext.trace(`Exiting ${this.pluginClassName}.execute()`);
        }
    }

    protected abstract executePlugin(localContext: LocalPluginContext): Promise<void>;

    private toExecutionError(error: unknown): PluginExecutionError {
        if (error instanceof PluginExecutionError) {
            return error;
        }
        if (error instanceof DataServiceFault) {
            return new PluginExecutionError(`DataServiceFault: ${error.message}`, { cause: error });
        }
        return new PluginExecutionError(`Error on plugin ${this.pluginClassName}.`, { cause: error });
    }
}

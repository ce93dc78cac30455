import { DataService } from './data-service';
import { PluginExecutionContext } from './execution-context';
import { PluginExecutionError } from './plugin-execution.error';
import { ServiceProvider } from './service-provider';
import { LocalTracingService, TracingService } from './tracing';

/**
 * Typed view over the ServiceProvider for a single plugin invocation.
 */
export class LocalPluginContext {
    readonly pluginExecutionContext: PluginExecutionContext;
    readonly currentUserService: DataService;
    readonly tracingService?: TracingService;

    constructor(serviceProvider: ServiceProvider) {
        const executionContext = serviceProvider.getService('executionContext');
        if (!executionContext) {
            throw new PluginExecutionError('executionContext');
        }
        this.pluginExecutionContext = executionContext;

        const tracing = serviceProvider.getService('tracing');
        if (tracing) {
            this.tracingService = new LocalTracingService(tracing, executionContext.operationCreatedOn);
        }

        const currentUserData = serviceProvider.getService('currentUserData');
        if (!currentUserData) {
            throw new PluginExecutionError('currentUserData');
        }
        this.currentUserService = currentUserData;
    }

    /**
     * Writes a line tagged with the correlation id and initiating user.
     * Blank messages are dropped.
     */
    trace(message: string): void {
        if (!message.trim() || !this.tracingService) {
            return;
        }
        const { correlationId, initiatingUserId } = this.pluginExecutionContext;
        this.tracingService.trace(
            `${message}, Correlation Id: ${correlationId}, Initiating User: ${String(initiatingUserId ?? 'none')}`,
        );
    }

    setOutputParameters(success: boolean, message: string): void {
        this.pluginExecutionContext.outputParameters.set('Success', success);
        this.pluginExecutionContext.outputParameters.set('Message', message);
    }
}

import { DataService } from './data-service';
import { PluginExecutionContext } from './execution-context';
import { TracingService } from './tracing';

/**
 * Per-invocation services a plugin step may look up.
 */
export interface PluginServices {
    executionContext: PluginExecutionContext;
    tracing: TracingService;
    /** Data access scoped to the RequestContext that raised the event. */
    currentUserData: DataService;
}

export interface ServiceProvider {
    getService<K extends keyof PluginServices>(key: K): PluginServices[K] | undefined;
}

export class StaticServiceProvider implements ServiceProvider {
    constructor(private readonly services: Partial<PluginServices>) { }

    getService<K extends keyof PluginServices>(key: K): PluginServices[K] | undefined {
        return this.services[key];
    }
}

import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import {
    EventBus,
    Logger,
    TransactionalConnection,
    VendureEntity,
    VendureEntityEvent,
} from '@vendure/core';
import { randomUUID } from 'node:crypto';

import { loggerCtx, PLUGIN_INIT_OPTIONS } from '../constants';
import { SubEntityEvent } from '../events';
import { PostSubEntityCreate } from '../steps/post-sub-entity-create.step';
import type { PropertySyncPluginOptions } from '../types';

import { ConnectionDataService } from './data-service';
import { MessageName, PluginExecutionContext } from './execution-context';
import { PluginBase } from './plugin-base';
import { ServiceProvider, StaticServiceProvider } from './service-provider';
import { LoggerTracingService } from './tracing';

const CORRELATION_ID_HEADER = 'x-correlation-id';

const messageNames: Record<VendureEntityEvent<VendureEntity>['type'], MessageName> = {
    created: 'Create',
    updated: 'Update',
    deleted: 'Delete',
};

/**
 * PluginHostService — runs plugin steps inside the event pipeline.
 *
 * Each step is registered as a blocking event handler, so it runs before
 * `EventBus.publish()` resolves and inside the publisher's transaction.
 * A PluginExecutionError thrown by a step rejects the publish call and
 * the request's transaction is rolled back.
 */
@Injectable()
export class PluginHostService implements OnModuleInit {
    private readonly postSubEntityCreate = new PostSubEntityCreate();

    constructor(
        private eventBus: EventBus,
        private connection: TransactionalConnection,
        @Inject(PLUGIN_INIT_OPTIONS) private options: PropertySyncPluginOptions,
    ) { }

    onModuleInit() {
        this.eventBus.registerBlockingEventHandler({
            event: SubEntityEvent,
            id: 'property-sync-post-sub-entity-create',
            handler: event => this.run(this.postSubEntityCreate, event),
        });
    }

    private async run(step: PluginBase, event: VendureEntityEvent<VendureEntity>): Promise<void> {
        const executionContext = this.createExecutionContext(event);
        await step.execute(this.createServiceProvider(step, event, executionContext));

        const message = executionContext.outputParameters.get('Message');
        if (typeof message === 'string') {
            Logger.verbose(message, loggerCtx);
        }
    }

    private createExecutionContext(event: VendureEntityEvent<VendureEntity>): PluginExecutionContext {
        return {
            messageName: messageNames[event.type],
            primaryEntityName: event.entity.constructor.name,
            target: event.entity,
            correlationId: event.ctx.req?.header(CORRELATION_ID_HEADER) ?? randomUUID(),
            initiatingUserId: event.ctx.activeUserId,
            operationCreatedOn: event.createdAt,
            outputParameters: new Map(),
        };
    }

    private createServiceProvider(
        step: PluginBase,
        event: VendureEntityEvent<VendureEntity>,
        executionContext: PluginExecutionContext,
    ): ServiceProvider {
        return new StaticServiceProvider({
            executionContext,
            tracing: new LoggerTracingService(step.constructor.name, this.options.traceLevel),
            currentUserData: new ConnectionDataService(this.connection, event.ctx, this.options),
        });
    }
}

import { Test, TestingModule } from '@nestjs/testing';
import { EventBus, Logger, RequestContext, TransactionalConnection } from '@vendure/core';
import { IsNull } from 'typeorm';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { PLUGIN_INIT_OPTIONS } from '../src/constants';
import { Property, SubEntity } from '../src/entities';
import { SubEntityEvent } from '../src/events';
import { LoggerTracingService, PluginExecutionError, PluginHostService } from '../src/host';
import { PropertySyncPluginOptions } from '../src/types';

describe('PluginHostService', () => {
    let moduleRef: TestingModule;
    let eventBus: { registerBlockingEventHandler: Mock };
    let repository: { find: Mock; update: Mock };
    let connection: { getRepository: Mock; rawConnection: { options: { type: string } } };

    async function init(options: PropertySyncPluginOptions = {}, driver = 'postgres') {
        eventBus = { registerBlockingEventHandler: vi.fn() };
        repository = {
            find: vi.fn().mockResolvedValue([new Property({ id: 'p1' }), new Property({ id: 'p2' })]),
            update: vi.fn().mockResolvedValue({ affected: 1 }),
        };
        connection = {
            getRepository: vi.fn().mockReturnValue(repository),
            rawConnection: { options: { type: driver } },
        };
        moduleRef = await Test.createTestingModule({
            providers: [
                PluginHostService,
                { provide: EventBus, useValue: eventBus },
                { provide: TransactionalConnection, useValue: connection },
                { provide: PLUGIN_INIT_OPTIONS, useValue: options },
            ],
        }).compile();
        await moduleRef.init();
    }

    function publishCreated(subEntity: SubEntity, ctx = RequestContext.empty()): Promise<void> {
        const [registration] = eventBus.registerBlockingEventHandler.mock.calls[0];
        return registration.handler(new SubEntityEvent(ctx, subEntity, 'created'));
    }

    beforeEach(() => {
        vi.spyOn(Logger, 'verbose').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await moduleRef.close();
    });

    it('registers a blocking handler for sub-entity events', async () => {
        await init();

        expect(eventBus.registerBlockingEventHandler).toHaveBeenCalledOnce();
        expect(eventBus.registerBlockingEventHandler.mock.calls[0][0]).toMatchObject({
            event: SubEntityEvent,
            id: 'property-sync-post-sub-entity-create',
        });
    });

    it('links the master\'s open properties through the request-scoped repository', async () => {
        await init();
        const ctx = RequestContext.empty();

        await publishCreated(new SubEntity({ id: 's1', name: 'Unit 1', masterId: 'm1' }), ctx);

        expect(connection.getRepository).toHaveBeenCalledWith(ctx, Property);
        expect(repository.find).toHaveBeenCalledWith({
            where: { masterId: 'm1', subEntityId: IsNull() },
            select: { id: true },
            lock: undefined,
        });
        expect(repository.update.mock.calls).toEqual([
            ['p1', { subEntityId: 's1' }],
            ['p2', { subEntityId: 's1' }],
        ]);
    });

    it('asks SQL Server for a dirty read', async () => {
        await init({}, 'mssql');

        await publishCreated(new SubEntity({ id: 's1', name: 'Unit 1', masterId: 'm1' }));

        expect(repository.find.mock.calls[0][0]).toMatchObject({ lock: { mode: 'dirty_read' } });
    });

    it('skips the dirty-read hint when noLockReads is off', async () => {
        await init({ noLockReads: false }, 'mssql');

        await publishCreated(new SubEntity({ id: 's1', name: 'Unit 1', masterId: 'm1' }));

        expect(repository.find.mock.calls[0][0].lock).toBeUndefined();
    });

    it('traces the execution under the step name with a generated correlation id', async () => {
        await init();

        await publishCreated(new SubEntity({ id: 's1', name: 'Unit 1', masterId: 'm1' }));

        const verbose = vi.mocked(Logger.verbose);
        const traced = verbose.mock.calls.filter(call => call[1] === 'PostSubEntityCreate').map(call => call[0]);
        expect(traced[0]).toMatch(
            /^\[\+[\d,]+ms\] - Entered PostSubEntityCreate\.execute\(\), Correlation Id: [0-9a-f-]{36}, Initiating User: none$/,
        );
        expect(traced[traced.length - 1]).toMatch(/Exiting PostSubEntityCreate\.execute\(\)/);
        expect(verbose).toHaveBeenLastCalledWith('Linked 2 properties to sub-entity s1', 'PropertySyncPlugin');
    });

    it('rejects with a PluginExecutionError when the query fails', async () => {
        await init();
        repository.find.mockRejectedValue(new Error('connection lost'));

        const error = await publishCreated(new SubEntity({ id: 's1', name: 'Unit 1', masterId: 'm1' })).catch(
            (e: unknown) => e,
        );

        expect(error).toBeInstanceOf(PluginExecutionError);
        expect(error instanceof PluginExecutionError && error.message).toBe(
            'DataServiceFault: Failed to retrieve Property records: Error: connection lost',
        );
        expect(repository.update).not.toHaveBeenCalled();
    });

    it('ignores events for other messages', async () => {
        await init();
        const [registration] = eventBus.registerBlockingEventHandler.mock.calls[0];

        await registration.handler(
            new SubEntityEvent(RequestContext.empty(), new SubEntity({ id: 's1', name: 'Unit 1', masterId: 'm1' }), 'updated'),
        );

        expect(repository.find).not.toHaveBeenCalled();
    });
});

describe('LoggerTracingService', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes at the configured level', () => {
        const debug = vi.spyOn(Logger, 'debug').mockImplementation(() => undefined);

        new LoggerTracingService('PostSubEntityCreate', 'debug').trace('hello');

        expect(debug).toHaveBeenCalledWith('hello', 'PostSubEntityCreate');
    });
});

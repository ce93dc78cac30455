import { Test, TestingModule } from '@nestjs/testing';
import { EventBus, RequestContext, TransactionalConnection, UserInputError } from '@vendure/core';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { Master, Property, SubEntity } from '../src/entities';
import { SubEntityEvent } from '../src/events';
import { MasterService, PropertyService, SubEntityService } from '../src/services';

describe('record services', () => {
    let moduleRef: TestingModule;
    let eventBus: { publish: Mock };
    let masters: { findOne: Mock; save: Mock };
    let properties: { save: Mock; find: Mock };
    let subEntities: { save: Mock };

    beforeEach(async () => {
        eventBus = { publish: vi.fn().mockResolvedValue(undefined) };
        masters = {
            findOne: vi.fn().mockImplementation(async ({ where }: { where: { id: string } }) =>
                where.id === 'm1' ? new Master({ id: 'm1', name: 'Block A' }) : null,
            ),
            save: vi.fn().mockImplementation(async (master: Master) => Object.assign(master, { id: 'm2' })),
        };
        properties = {
            save: vi.fn().mockImplementation(async (property: Property) => Object.assign(property, { id: 'p1' })),
            find: vi.fn().mockResolvedValue([]),
        };
        subEntities = {
            save: vi.fn().mockImplementation(async (subEntity: SubEntity) => Object.assign(subEntity, { id: 's1' })),
        };
        const repositories = new Map<unknown, unknown>([
            [Master, masters],
            [Property, properties],
            [SubEntity, subEntities],
        ]);
        const connection = {
            getRepository: vi.fn().mockImplementation((_ctx: RequestContext, entity: unknown) => repositories.get(entity)),
        };

        moduleRef = await Test.createTestingModule({
            providers: [
                MasterService,
                PropertyService,
                SubEntityService,
                { provide: EventBus, useValue: eventBus },
                { provide: TransactionalConnection, useValue: connection },
            ],
        }).compile();
    });

    afterEach(async () => {
        await moduleRef.close();
    });

    describe('SubEntityService.create', () => {
        it('saves the sub-entity and publishes a created event with it', async () => {
            const ctx = RequestContext.empty();
            const input = { name: 'Unit 1', masterId: 'm1' };

            const subEntity = await moduleRef.get(SubEntityService).create(ctx, input);

            expect(subEntity).toMatchObject({ id: 's1', name: 'Unit 1', masterId: 'm1' });
            expect(eventBus.publish).toHaveBeenCalledOnce();
            const [event] = eventBus.publish.mock.calls[0];
            expect(event).toBeInstanceOf(SubEntityEvent);
            expect(event).toMatchObject({ ctx, entity: subEntity, type: 'created', input });
        });

        it('accepts a sub-entity without a master', async () => {
            const subEntity = await moduleRef.get(SubEntityService).create(RequestContext.empty(), { name: 'Unit 2' });

            expect(subEntity.masterId).toBeNull();
            expect(masters.findOne).not.toHaveBeenCalled();
            expect(eventBus.publish).toHaveBeenCalledOnce();
        });

        it('rejects an unknown master without saving or publishing', async () => {
            await expect(
                moduleRef.get(SubEntityService).create(RequestContext.empty(), { name: 'Unit 3', masterId: 'm9' }),
            ).rejects.toThrow(UserInputError);

            expect(subEntities.save).not.toHaveBeenCalled();
            expect(eventBus.publish).not.toHaveBeenCalled();
        });

        it('fails when a blocking handler rejects the event', async () => {
            eventBus.publish.mockRejectedValue(new Error('handler failed'));

            await expect(
                moduleRef.get(SubEntityService).create(RequestContext.empty(), { name: 'Unit 4', masterId: 'm1' }),
            ).rejects.toThrow('handler failed');
        });
    });

    describe('PropertyService.create', () => {
        it('creates an unlinked property under an existing master', async () => {
            const property = await moduleRef.get(PropertyService).create(RequestContext.empty(), {
                name: 'Parking bay 4',
                masterId: 'm1',
            });

            expect(property).toMatchObject({ id: 'p1', name: 'Parking bay 4', masterId: 'm1', subEntityId: null });
        });

        it('rejects an unknown master', async () => {
            await expect(
                moduleRef.get(PropertyService).create(RequestContext.empty(), { name: 'Storage 1', masterId: 'm9' }),
            ).rejects.toThrow(UserInputError);
            expect(properties.save).not.toHaveBeenCalled();
        });
    });

    it('MasterService.findOne returns undefined for a missing master', async () => {
        await expect(moduleRef.get(MasterService).findOne(RequestContext.empty(), 'm9')).resolves.toBeUndefined();
    });

    it('PropertyService.findByMaster orders by creation time', async () => {
        await moduleRef.get(PropertyService).findByMaster(RequestContext.empty(), 'm1');

        expect(properties.find).toHaveBeenCalledWith({ where: { masterId: 'm1' }, order: { createdAt: 'ASC' } });
    });
});

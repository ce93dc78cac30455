import { Injectable } from '@nestjs/common';
import { EventBus, ID, RequestContext, TransactionalConnection, UserInputError } from '@vendure/core';

import { SubEntity } from '../entities';
import { CreateSubEntityInput, SubEntityEvent } from '../events';

import { MasterService } from './master.service';

/**
 * SubEntityService — creates SubEntity records and announces them.
 *
 * `create()` publishes a SubEntityEvent whose blocking handlers run in the
 * same transaction, so the returned SubEntity already has its master's
 * open properties linked, or the whole call fails.
 */
@Injectable()
export class SubEntityService {
    constructor(
        private connection: TransactionalConnection,
        private masterService: MasterService,
        private eventBus: EventBus,
    ) { }

    async findOne(ctx: RequestContext, id: ID): Promise<SubEntity | undefined> {
        const subEntity = await this.connection.getRepository(ctx, SubEntity).findOne({ where: { id } });
        return subEntity ?? undefined;
    }

    async create(ctx: RequestContext, input: CreateSubEntityInput): Promise<SubEntity> {
        if (input.masterId != null) {
            const master = await this.masterService.findOne(ctx, input.masterId);
            if (!master) {
                throw new UserInputError(`Master with ID "${input.masterId}" not found`);
            }
        }

        const subEntity = await this.connection.getRepository(ctx, SubEntity).save(
            new SubEntity({
                name: input.name,
                masterId: input.masterId ?? null,
            }),
        );

        await this.eventBus.publish(new SubEntityEvent(ctx, subEntity, 'created', input));
        return subEntity;
    }
}

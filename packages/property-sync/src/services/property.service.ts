import { Injectable } from '@nestjs/common';
import { ID, RequestContext, TransactionalConnection, UserInputError } from '@vendure/core';

import { Property } from '../entities';

import { MasterService } from './master.service';

export interface CreatePropertyInput {
    name: string;
    masterId: ID;
}

/**
 * PropertyService — creation and lookup of Property records.
 *
 * Linking a Property to a SubEntity is not done here: it happens when
 * the SubEntity is created (see PostSubEntityCreate).
 */
@Injectable()
export class PropertyService {
    constructor(
        private connection: TransactionalConnection,
        private masterService: MasterService,
    ) { }

    async findOne(ctx: RequestContext, id: ID): Promise<Property | undefined> {
        const property = await this.connection.getRepository(ctx, Property).findOne({ where: { id } });
        return property ?? undefined;
    }

    async findByMaster(ctx: RequestContext, masterId: ID): Promise<Property[]> {
        return this.connection.getRepository(ctx, Property).find({
            where: { masterId },
            order: { createdAt: 'ASC' },
        });
    }

    async create(ctx: RequestContext, input: CreatePropertyInput): Promise<Property> {
        const master = await this.masterService.findOne(ctx, input.masterId);
        if (!master) {
            throw new UserInputError(`Master with ID "${input.masterId}" not found`);
        }

        const property = new Property({
            name: input.name,
            masterId: master.id,
            subEntityId: null,
        });
        return this.connection.getRepository(ctx, Property).save(property);
    }
}

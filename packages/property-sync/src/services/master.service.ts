import { Injectable } from '@nestjs/common';
import { ID, RequestContext, TransactionalConnection } from '@vendure/core';

import { Master } from '../entities';

export interface CreateMasterInput {
    name: string;
}

@Injectable()
export class MasterService {
    constructor(private connection: TransactionalConnection) { }

    async findOne(ctx: RequestContext, id: ID): Promise<Master | undefined> {
        const master = await this.connection.getRepository(ctx, Master).findOne({ where: { id } });
        return master ?? undefined;
    }

    async create(ctx: RequestContext, input: CreateMasterInput): Promise<Master> {
        return this.connection.getRepository(ctx, Master).save(new Master({ name: input.name }));
    }
}

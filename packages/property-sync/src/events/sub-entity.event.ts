import { ID } from '@vendure/common/lib/shared-types';
import { RequestContext, VendureEntityEvent } from '@vendure/core';

import { SubEntity } from '../entities';

/**
 * Input used to create a SubEntity.
 */
export interface CreateSubEntityInput {
    name: string;
    masterId?: ID | null;
}

type SubEntityInputTypes = CreateSubEntityInput | ID;

/**
 * Emitted when a SubEntity is created, updated or deleted.
 *
 * Published from inside the mutation's transaction, so blocking
 * handlers registered for it share that transaction.
 */
export class SubEntityEvent extends VendureEntityEvent<SubEntity, SubEntityInputTypes> {
    constructor(
        ctx: RequestContext,
        entity: SubEntity,
        type: 'created' | 'updated' | 'deleted',
        input?: SubEntityInputTypes,
    ) {
        super(entity, type, ctx, input);
    }
}

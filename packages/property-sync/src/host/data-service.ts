import { ID, Type } from '@vendure/common/lib/shared-types';
import { RequestContext, TransactionalConnection, VendureEntity } from '@vendure/core';
import { FindOptionsSelect, FindOptionsWhere } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import { PropertySyncPluginOptions } from '../types';

import { DataServiceFault } from './plugin-execution.error';

export interface RecordQuery<T extends VendureEntity> {
    where: FindOptionsWhere<T>;
    /** Projection. An empty object still returns the primary key. */
    columns: FindOptionsSelect<T>;
    /** Read without taking row locks; tolerates uncommitted data where the driver allows it. */
    noLock?: boolean;
}

/**
 * Record access handed to plugin steps.
 */
export interface DataService {
    retrieveMultiple<T extends VendureEntity>(entity: Type<T>, query: RecordQuery<T>): Promise<T[]>;
    update<T extends VendureEntity>(entity: Type<T>, id: ID, changes: QueryDeepPartialEntity<T>): Promise<void>;
}

/**
 * DataService backed by the TransactionalConnection. Every call runs in the
 * transaction bound to `ctx`, i.e. the transaction of the request that
 * raised the event.
 */
export class ConnectionDataService implements DataService {
    constructor(
        private readonly connection: TransactionalConnection,
        private readonly ctx: RequestContext,
        private readonly options: PropertySyncPluginOptions,
    ) { }

    async retrieveMultiple<T extends VendureEntity>(entity: Type<T>, query: RecordQuery<T>): Promise<T[]> {
        try {
            return await this.connection.getRepository(this.ctx, entity).find({
                where: query.where,
                select: { ...query.columns, id: true },
                lock: query.noLock && this.supportsDirtyRead() ? { mode: 'dirty_read' } : undefined,
            });
        } catch (e) {
            throw new DataServiceFault(`Failed to retrieve ${entity.name} records: ${String(e)}`, { cause: e });
        }
    }

    async update<T extends VendureEntity>(entity: Type<T>, id: ID, changes: QueryDeepPartialEntity<T>): Promise<void> {
        try {
            await this.connection.getRepository(this.ctx, entity).update(id, changes);
        } catch (e) {
            throw new DataServiceFault(`Failed to update ${entity.name} ${id}: ${String(e)}`, { cause: e });
        }
    }

    private supportsDirtyRead(): boolean {
        return this.options.noLockReads !== false && this.connection.rawConnection.options.type === 'mssql';
    }
}

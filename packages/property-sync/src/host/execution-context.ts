import { ID } from '@vendure/common/lib/shared-types';
import { VendureEntity } from '@vendure/core';

export type MessageName = 'Create' | 'Update' | 'Delete';

/**
 * Describes the event a plugin step is executing for.
 */
export interface PluginExecutionContext {
    messageName: MessageName;
    /** Class name of the target, e.g. `SubEntity`. */
    primaryEntityName: string;
    /** The record the event was raised for. */
    target: VendureEntity;
    correlationId: string;
    initiatingUserId?: ID;
    operationCreatedOn: Date;
    outputParameters: Map<string, unknown>;
}

import type { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';

import { Master } from './master.entity';
import { SubEntity } from './sub-entity.entity';

/**
 * Property — belongs to a Master and, once linked, to a SubEntity.
 *
 * Properties with a null `subEntityId` are picked up by the next
 * SubEntity created for the same master.
 */
@Entity()
@Index(['masterId', 'subEntityId'])
export class Property extends VendureEntity {
    constructor(input?: DeepPartial<Property>) {
        super(input);
    }

    @Column()
    name: string;

    @ManyToOne(() => Master, master => master.properties, { onDelete: 'CASCADE' })
    @JoinColumn()
    master: Master;

    @EntityId()
    masterId: ID;

    @ManyToOne(() => SubEntity, { nullable: true, onDelete: 'SET NULL' })
    @JoinColumn()
    subEntity: SubEntity | null;

    @EntityId({ nullable: true })
    subEntityId: ID | null;
}

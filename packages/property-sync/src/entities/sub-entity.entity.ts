import type { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, JoinColumn, ManyToOne } from 'typeorm';

import { Master } from './master.entity';

/**
 * SubEntity — creating one of these triggers the PostSubEntityCreate step,
 * which links the master's unassigned properties to it.
 */
@Entity()
export class SubEntity extends VendureEntity {
    constructor(input?: DeepPartial<SubEntity>) {
        super(input);
    }

    @Column()
    name: string;

    /**
     * Optional. Without a master the sync step has nothing to link.
     */
    @ManyToOne(() => Master, { nullable: true, onDelete: 'SET NULL' })
    @JoinColumn()
    master: Master | null;

    @EntityId({ nullable: true })
    masterId: ID | null;
}

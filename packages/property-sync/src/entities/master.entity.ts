import type { DeepPartial } from '@vendure/common/lib/shared-types';
import { VendureEntity } from '@vendure/core';
import { Column, Entity, OneToMany } from 'typeorm';

import { Property } from './property.entity';

/**
 * Master — the parent record that both SubEntity and Property point at.
 *
 * The sync step only ever refers to a Master by id.
 */
@Entity()
export class Master extends VendureEntity {
    constructor(input?: DeepPartial<Master>) {
        super(input);
    }

    @Column()
    name: string;

    @OneToMany(() => Property, property => property.master)
    properties: Property[];
}

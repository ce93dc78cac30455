import { ID } from '@vendure/common/lib/shared-types';
import { IsNull } from 'typeorm';

import { Property, SubEntity } from '../entities';
import { DataService } from '../host/data-service';
import { LocalPluginContext } from '../host/local-plugin-context';
import { PluginBase } from '../host/plugin-base';

/**
 * Links a newly created SubEntity to every Property of the same Master
 * that is not linked to a SubEntity yet.
 *
 * Properties are read without row locks, so two SubEntities created for
 * the same Master at the same time may each claim some of the properties.
 */
export class PostSubEntityCreate extends PluginBase {
    constructor() {
        super(PostSubEntityCreate);
    }

    protected async executePlugin(localContext: LocalPluginContext): Promise<void> {
        const context = localContext.pluginExecutionContext;
        const subEntity = context.target;

        if (
            context.primaryEntityName !== SubEntity.name ||
            context.messageName !== 'Create' ||
            !(subEntity instanceof SubEntity) ||
            subEntity.masterId == null
        ) {
            return;
        }

        const dataService = localContext.currentUserService;
        const relatedProperties = await this.getRelatedProperties(dataService, subEntity.masterId);

        for (const property of relatedProperties) {
            await dataService.update(Property, property.id, { subEntityId: subEntity.id });
        }

        const message = `Linked ${relatedProperties.length} properties to sub-entity ${subEntity.id}`;
        localContext.trace(message);
        localContext.setOutputParameters(true, message);
    }

    private getRelatedProperties(dataService: DataService, masterId: ID): Promise<Property[]> {
        return dataService.retrieveMultiple(Property, {
            where: {
                masterId,
                subEntityId: IsNull(),
            },
            columns: {},
            noLock: true,
        });
    }
}

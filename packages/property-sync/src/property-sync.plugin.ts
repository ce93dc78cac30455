import { Type } from '@vendure/common/lib/shared-types';
import { PluginCommonModule, VendurePlugin } from '@vendure/core';

import { adminApiExtensions, PropertySyncAdminResolver } from './api';
import { PLUGIN_INIT_OPTIONS } from './constants';
import { Master, Property, SubEntity } from './entities';
import { PluginHostService } from './host';
import { MasterService, PropertyService, SubEntityService } from './services';
import { PropertySyncPluginOptions } from './types';

/**
 * PropertySyncPlugin — links properties to the sub-entity created for
 * their master.
 *
 * Registers the Master, Property and SubEntity entities, their services
 * and Admin API, and the PluginHostService that runs the
 * PostSubEntityCreate step whenever a SubEntity is created.
 *
 * @example
 * ```ts
 * plugins: [
 *     PropertySyncPlugin.init({ traceLevel: 'debug' }),
 * ]
 * ```
 */
@VendurePlugin({
    imports: [PluginCommonModule],
    entities: [Master, Property, SubEntity],
    adminApiExtensions: {
        schema: adminApiExtensions,
        resolvers: [PropertySyncAdminResolver],
    },
    providers: [
        { provide: PLUGIN_INIT_OPTIONS, useFactory: () => PropertySyncPlugin.options },
        MasterService,
        PropertyService,
        SubEntityService,
        PluginHostService,
    ],
    compatibility: '^3.1.0',
})
export class PropertySyncPlugin {
    static options: PropertySyncPluginOptions = {};

    static init(options: PropertySyncPluginOptions): Type<PropertySyncPlugin> {
        this.options = options;
        return PropertySyncPlugin;
    }
}

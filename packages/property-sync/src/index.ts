export { PropertySyncPlugin } from './property-sync.plugin';
export { Master, Property, SubEntity } from './entities';
export { MasterService, PropertyService, SubEntityService } from './services';
export type { CreateMasterInput, CreatePropertyInput } from './services';
export { adminApiExtensions, PropertySyncAdminResolver } from './api';
export { SubEntityEvent } from './events';
export type { CreateSubEntityInput } from './events';
export * from './host';
export { PostSubEntityCreate } from './steps/post-sub-entity-create.step';
export type { PropertySyncPluginOptions, TraceLevel } from './types';

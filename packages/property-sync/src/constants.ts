export const PLUGIN_INIT_OPTIONS = Symbol('PROPERTY_SYNC_PLUGIN_OPTIONS');
export const loggerCtx = 'PropertySyncPlugin';

export { adminApiExtensions } from './api-extensions';
export { PropertySyncAdminResolver } from './property-sync-admin.resolver';

export { MasterService } from './master.service';
export { PropertyService } from './property.service';
export { SubEntityService } from './sub-entity.service';
export type { CreateMasterInput } from './master.service';
export type { CreatePropertyInput } from './property.service';

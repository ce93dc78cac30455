export { Master } from './master.entity';
export { Property } from './property.entity';
export { SubEntity } from './sub-entity.entity';

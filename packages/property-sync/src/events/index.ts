export { SubEntityEvent } from './sub-entity.event';
export type { CreateSubEntityInput } from './sub-entity.event';

export { groupResults } from './group.js';
export type { GroupedDocuments } from './group.js';

export { archiveGroup, findOwningIdentifier, moveFile } from './archiver.js';
export type { ArchiveReport } from './archiver.js';

export { MergeSessionUseCase } from './MergeSessionUseCase';
export { ResolveEntryUseCase } from './ResolveEntryUseCase';
export { ResolveModifiedFileUseCase } from './ResolveModifiedFileUseCase';
export type { ModifiedFileOptions } from './ResolveModifiedFileUseCase';
export { endsSession } from './EntryOutcome';
export type { EntryOutcome, ResolveOptions } from './EntryOutcome';

/**
 * Component barrel export
 */

export { renderHunk, renderFileHeader, isWhitespaceOnly, visualizeWhitespace } from './hunk/HunkView';

export { renderEntryHeader, renderDifferencesFound } from './entry/EntryView';

export { renderSummary } from './summary/SummaryView';

export {
    HUNK_CHOICES,
    ONE_SIDED_CHOICES,
    MISMATCH_CHOICES,
    renderChoicePrompt,
} from './prompt/ChoicePrompt';
export type { ChoiceOption } from './prompt/ChoicePrompt';

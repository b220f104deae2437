import { HunkDecision, MismatchDecision, OneSidedDecision } from '../../../../../../application/ports/outbound/IDecisionPort';

export interface ChoiceOption<T extends string> {
    key: string;
    label: string;
    value: T;
}

export const HUNK_CHOICES: ReadonlyArray<ChoiceOption<HunkDecision>> = [
    { key: 'l', label: 'left (update right)', value: 'left' },
    { key: 'r', label: 'right (update left)', value: 'right' },
    { key: 's', label: 'skip', value: 'skip' },
    { key: 'f', label: 'skip file', value: 'skipFile' },
    { key: 'q', label: 'quit', value: 'quit' },
];

export const ONE_SIDED_CHOICES: Record<'leftOnly' | 'rightOnly', ReadonlyArray<ChoiceOption<OneSidedDecision>>> = {
    leftOnly: [
        { key: 'c', label: 'copy to right', value: 'copy' },
        { key: 'd', label: 'delete from left', value: 'delete' },
        { key: 's', label: 'skip', value: 'skip' },
        { key: 'q', label: 'quit', value: 'quit' },
    ],
    rightOnly: [
        { key: 'c', label: 'copy to left', value: 'copy' },
        { key: 'd', label: 'delete from right', value: 'delete' },
        { key: 's', label: 'skip', value: 'skip' },
        { key: 'q', label: 'quit', value: 'quit' },
    ],
};

export const MISMATCH_CHOICES: ReadonlyArray<ChoiceOption<MismatchDecision>> = [
    { key: 'l', label: 'left (overwrite right)', value: 'useLeft' },
    { key: 'r', label: 'right (overwrite left)', value: 'useRight' },
    { key: 's', label: 'skip', value: 'skip' },
    { key: 'q', label: 'quit', value: 'quit' },
];

export function renderChoicePrompt(choices: ReadonlyArray<ChoiceOption<string>>): string {
    return `  Choose: ${choices.map(choice => `(${choice.key}) ${choice.label}`).join(' / ')} > `;
}

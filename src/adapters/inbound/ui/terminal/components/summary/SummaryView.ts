/**
 * Summary Component
 */

import { SessionSummary } from '../../../../../../application/ports/inbound/IMergeSessionUseCase';

function headline(summary: SessionSummary): string {
    if (summary.cancelled) return 'Merge cancelled.';
    if (summary.dryRun) return 'Dry run complete. No files were modified.';
    if (summary.failures.length > 0) return `Merge finished with ${summary.failures.length} error(s).`;
    return 'Merge complete!';
}

export function renderSummary(summary: SessionSummary): string {
    const rows: Array<[string, number]> = [
        ['Total hunks processed', summary.hunksDecided],
        ['Left choices (updated right)', summary.leftChoices],
        ['Right choices (updated left)', summary.rightChoices],
        ['Skipped', summary.skipped],
        ['Copied', summary.copied],
        ['Deleted', summary.deleted],
        ['Replaced', summary.replaced],
        ['Excluded', summary.excluded],
        ['Binary files skipped', summary.binarySkipped],
    ];

    const lines = [headline(summary), '', 'Summary:'];
    for (const [label, value] of rows) {
        if (value > 0) {
            lines.push(`  ${label}: ${value}`);
        }
    }
    if (summary.failures.length > 0) {
        lines.push(`  Failures: ${summary.failures.length}`);
        for (const failure of summary.failures) {
            lines.push(`    ${failure.path}: ${failure.message}`);
        }
    }
    return lines.join('\n');
}

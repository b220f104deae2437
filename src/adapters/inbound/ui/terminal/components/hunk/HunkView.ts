/**
 * Hunk Component
 *
 * Renders one hunk as plain text: a position header, then context lines,
 * removed left lines and added right lines.
 */

import { Hunk } from '../../../../../../domain/entities/Hunk';

const WHITESPACE_MARKERS: Record<string, string> = {
    ' ': '·',
    '\t': '→',
    '\n': '↵',
    '\r': '␍',
};

/** True when both sides only differ in whitespace */
export function isWhitespaceOnly(hunk: Hunk): boolean {
    const strip = (lines: readonly string[]) => lines.join('').replace(/\s/g, '');
    return strip(hunk.leftLines) === strip(hunk.rightLines);
}

export function visualizeWhitespace(line: string): string {
    return line.replace(/[ \t\n\r]/g, ch => WHITESPACE_MARKERS[ch] ?? ch);
}

export function renderHunk(hunk: Hunk, index: number, total: number, path: string): string {
    const whitespaceOnly = isWhitespaceOnly(hunk);
    const show = (line: string) => (whitespaceOnly ? visualizeWhitespace(line) : line.trimEnd());

    const output = [
        `[${index + 1}/${total}] Hunk in ${path}${whitespaceOnly ? ' (whitespace only)' : ''}`,
        `  @@ -${hunk.leftStart + 1},${hunk.leftCount} +${hunk.rightStart + 1},${hunk.rightCount} @@`,
    ];
    for (const line of hunk.contextBefore) output.push(`   ${show(line)}`);
    for (const line of hunk.leftLines) output.push(`  -${show(line)}`);
    for (const line of hunk.rightLines) output.push(`  +${show(line)}`);
    for (const line of hunk.contextAfter) output.push(`   ${show(line)}`);

    return output.join('\n');
}

export function renderFileHeader(path: string, hunkCount: number): string {
    return `File: ${path} (${hunkCount} hunk(s))`;
}

/**
 * A text split into lines on `\n`, remembering whether the raw text ended
 * with a newline so it can be rebuilt byte for byte.
 */
export class TextLines {
    private constructor(
        readonly lines: readonly string[],
        readonly endsWithNewline: boolean
    ) {}

    static from(text: string): TextLines {
        const endsWithNewline = text.endsWith('\n');
        if (text.length === 0) {
            return new TextLines([], false);
        }
        const body = endsWithNewline ? text.slice(0, -1) : text;
        return new TextLines(body.split('\n'), endsWithNewline);
    }

    get length(): number {
        return this.lines.length;
    }

    has(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this.lines.length;
    }

    /**
     * Line at `index` with its newline restored. Only the final line of a text
     * without a trailing newline comes back bare.
     */
    rendered(index: number): string {
        const line = this.lines[index];
        const isLast = index === this.lines.length - 1;
        return isLast && !this.endsWithNewline ? line : `${line}\n`;
    }

    /** Rendered lines for indices in `[start, end)`, silently dropping out-of-range ones */
    renderRange(start: number, end: number): string[] {
        const result: string[] = [];
        for (let i = Math.max(0, start); i < end; i++) {
            if (this.has(i)) {
                result.push(this.rendered(i));
            }
        }
        return result;
    }

    renderAll(): string[] {
        return this.renderRange(0, this.lines.length);
    }

    toString(): string {
        return this.renderAll().join('');
    }

    /**
     * Join lines with single newlines, adding a trailing newline only when
     * asked to and when there is at least one line.
     */
    static join(lines: readonly string[], trailingNewline: boolean): string {
        const joined = lines.join('\n');
        return trailingNewline && lines.length > 0 ? `${joined}\n` : joined;
    }
}

import * as readline from 'readline';
import { DiffEntry } from '../../domain/entities/DiffEntry';
import {
    HunkDecision,
    HunkPrompt,
    IDecisionPort,
    MismatchDecision,
    OneSidedDecision,
} from '../../application/ports/outbound/IDecisionPort';
import {
    HUNK_CHOICES,
    MISMATCH_CHOICES,
    ONE_SIDED_CHOICES,
    renderChoicePrompt,
} from '../inbound/ui/terminal/components';

type LineWaiter = (line: string | undefined) => void;

/**
 * Asks on the terminal, one line per answer, repeating until the answer is
 * one of the offered keys. Lines typed or piped ahead are queued and answer
 * the following questions in order. A closed input counts as quit.
 */
export class ReadlineDecisionGateway implements IDecisionPort {
    private readonly rl: readline.Interface;
    private readonly queued: string[] = [];
    private waiter?: LineWaiter;
    private isClosed = false;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, terminal: false });
        this.rl.on('line', line => this.deliver(line));
        this.rl.once('close', () => {
            this.isClosed = true;
            this.deliver(undefined);
        });
    }

    chooseHunk(_prompt: HunkPrompt): Promise<HunkDecision> {
        return this.ask(renderChoicePrompt(HUNK_CHOICES), HUNK_CHOICES, 'quit');
    }

    chooseOneSided(entry: DiffEntry): Promise<OneSidedDecision> {
        const choices = entry.kind === 'rightOnly' ? ONE_SIDED_CHOICES.rightOnly : ONE_SIDED_CHOICES.leftOnly;
        return this.ask(renderChoicePrompt(choices), choices, 'quit');
    }

    chooseMismatch(_entry: DiffEntry): Promise<MismatchDecision> {
        return this.ask(renderChoicePrompt(MISMATCH_CHOICES), MISMATCH_CHOICES, 'quit');
    }

    close(): void {
        if (!this.isClosed) {
            this.rl.close();
        }
    }

    private async ask<T extends string>(
        question: string,
        choices: ReadonlyArray<{ key: string; value: T }>,
        onClose: T
    ): Promise<T> {
        for (;;) {
            this.output.write(question);
            const answer = await this.nextLine();
            if (answer === undefined) {
                return onClose;
            }
            const key = answer.trim().toLowerCase();
            const match = choices.find(choice => choice.key === key);
            if (match) {
                return match.value;
            }
        }
    }

    /** Next queued line, or undefined once the input is closed and drained */
    private nextLine(): Promise<string | undefined> {
        const line = this.queued.shift();
        if (line !== undefined) {
            return Promise.resolve(line);
        }
        if (this.isClosed) {
            return Promise.resolve(undefined);
        }
        return new Promise(resolve => {
            this.waiter = resolve;
        });
    }

    private deliver(line: string | undefined): void {
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = undefined;
            waiter(line);
            return;
        }
        if (line !== undefined) {
            this.queued.push(line);
        }
    }
}

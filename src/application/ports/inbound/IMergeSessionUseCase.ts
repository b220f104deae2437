export interface SessionOptions {
    leftRoot: string;
    rightRoot: string;
    contextLines: number;
    dryRun: boolean;
    skipBinary: boolean;
    exclude: {
        left: string[];
        right: string[];
    };
}

export interface SessionFailure {
    path: string;
    message: string;
}

export interface SessionSummary {
    /** Number of differences reported by the directory comparison */
    differences: number;
    hunksDecided: number;
    leftChoices: number;
    rightChoices: number;
    skipped: number;
    copied: number;
    deleted: number;
    replaced: number;
    excluded: number;
    binarySkipped: number;
    failures: SessionFailure[];
    cancelled: boolean;
    dryRun: boolean;
}

export interface IMergeSessionUseCase {
    execute(options: SessionOptions): Promise<SessionSummary>;
}

export function emptySummary(dryRun: boolean): SessionSummary {
    return {
        differences: 0,
        hunksDecided: 0,
        leftChoices: 0,
        rightChoices: 0,
        skipped: 0,
        copied: 0,
        deleted: 0,
        replaced: 0,
        excluded: 0,
        binarySkipped: 0,
        failures: [],
        cancelled: false,
        dryRun,
    };
}

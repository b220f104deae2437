import { EditOp } from '../entities/EditOp';

/**
 * External line alignment engine.
 *
 * Receives each text's lines with their newlines restored and returns an
 * ordered, contiguous edit script covering both. Must be deterministic: the
 * same input always yields the same operations.
 */
export interface ILineAligner {
    align(leftLines: readonly string[], rightLines: readonly string[]): EditOp[];
}

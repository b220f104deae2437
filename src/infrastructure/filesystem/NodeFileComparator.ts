import * as fs from 'fs';
import { IOError } from '../../domain/errors/IOError';
import {
    BINARY_PROBE_BYTES,
    containsZeroByte,
    IFileComparator,
    TextReadResult,
} from '../../domain/services/IFileComparator';

export class NodeFileComparator implements IFileComparator {
    async identical(leftPath: string, rightPath: string): Promise<boolean> {
        const [left, right] = await Promise.all([readBytes(leftPath), readBytes(rightPath)]);
        return left.equals(right);
    }

    async isBinary(path: string): Promise<boolean> {
        let handle: fs.promises.FileHandle;
        try {
            handle = await fs.promises.open(path, 'r');
        } catch (error) {
            throw IOError.wrap('read', path, error);
        }
        try {
            const buffer = Buffer.alloc(BINARY_PROBE_BYTES);
            const { bytesRead } = await handle.read(buffer, 0, BINARY_PROBE_BYTES, 0);
            return containsZeroByte(buffer.subarray(0, bytesRead));
        } catch (error) {
            throw IOError.wrap('read', path, error);
        } finally {
            await handle.close();
        }
    }

    async readAsText(path: string): Promise<TextReadResult> {
        const content = await readBytes(path);
        if (containsZeroByte(content.subarray(0, BINARY_PROBE_BYTES))) {
            return { kind: 'binary' };
        }
        // Invalid sequences become U+FFFD; a byte order mark is kept as text
        return { kind: 'text', text: content.toString('utf8') };
    }
}

async function readBytes(path: string): Promise<Buffer> {
    try {
        return await fs.promises.readFile(path);
    } catch (error) {
        throw IOError.wrap('read', path, error);
    }
}

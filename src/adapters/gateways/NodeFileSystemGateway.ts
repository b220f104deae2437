import * as fs from 'fs';
import * as path from 'path';
import { IOError } from '../../domain/errors/IOError';
import { IFileSystemPort, PathType } from '../../application/ports/outbound/IFileSystemPort';

export class NodeFileSystemGateway implements IFileSystemPort {
    async pathType(absolutePath: string): Promise<PathType> {
        try {
            const stat = await fs.promises.stat(absolutePath);
            return stat.isDirectory() ? 'directory' : 'file';
        } catch (error) {
            if (isNotFound(error)) {
                return 'missing';
            }
            throw IOError.wrap('stat', absolutePath, error);
        }
    }

    /**
     * Writes to a temp file beside the real target, then renames it over that
     * target so it holds either the old or the new content, never a mix.
     * A symbolic link stays a link; the file it points to is rewritten.
     */
    async writeText(absolutePath: string, content: string): Promise<void> {
        let target: string;
        try {
            target = await this.resolveTarget(absolutePath);
        } catch (error) {
            throw IOError.wrap('write', absolutePath, error);
        }
        const tempPath = path.join(
            path.dirname(target),
            `.${path.basename(target)}.treemerge-${process.pid}-${Date.now()}.tmp`
        );

        try {
            const mode = await this.existingMode(target);
            await fs.promises.writeFile(tempPath, content, { encoding: 'utf8', mode });
            if (mode !== undefined) {
                // the umask applies on creation
                await fs.promises.chmod(tempPath, mode);
            }
            await fs.promises.rename(tempPath, target);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw IOError.wrap('write', absolutePath, error);
        }
    }

    async copy(source: string, destination: string): Promise<void> {
        try {
            await fs.promises.mkdir(path.dirname(destination), { recursive: true });
            await fs.promises.cp(source, destination, { recursive: true, force: true });
        } catch (error) {
            throw IOError.wrap('copy', source, error);
        }
    }

    async remove(absolutePath: string): Promise<void> {
        try {
            await fs.promises.rm(absolutePath, { recursive: true });
        } catch (error) {
            throw IOError.wrap('remove', absolutePath, error);
        }
    }

    /** Path with every symbolic link resolved; a new file resolves to itself */
    private async resolveTarget(absolutePath: string): Promise<string> {
        try {
            return await fs.promises.realpath(absolutePath);
        } catch (error) {
            if (isNotFound(error)) {
                return absolutePath;
            }
            throw error;
        }
    }

    private async existingMode(absolutePath: string): Promise<number | undefined> {
        try {
            const stat = await fs.promises.stat(absolutePath);
            return stat.mode & 0o7777;
        } catch (error) {
            if (isNotFound(error)) {
                return undefined;
            }
            throw error;
        }
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

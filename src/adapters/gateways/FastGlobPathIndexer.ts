import * as fs from 'fs';
import fg from 'fast-glob';
import { IOError } from '../../domain/errors/IOError';
import { IPathIndexer, PathIndex } from '../../domain/services/IPathIndexer';

/**
 * Walks a root with fast-glob, collecting files, directories and any other
 * entry. Symbolic links are recorded but never followed.
 */
export class FastGlobPathIndexer implements IPathIndexer {
    async index(root: string): Promise<PathIndex> {
        await this.assertDirectory(root);

        let entries: fg.Entry[];
        try {
            entries = await fg('**', {
                cwd: root,
                dot: true,
                onlyFiles: false,
                objectMode: true,
                followSymbolicLinks: false,
                suppressErrors: false,
            });
        } catch (error) {
            throw IOError.wrap('walk', root, error);
        }

        const index = new Map<string, boolean>();
        for (const entry of entries) {
            index.set(entry.path, entry.dirent.isDirectory());
        }
        return index;
    }

    private async assertDirectory(root: string): Promise<void> {
        let stat: fs.Stats;
        try {
            stat = await fs.promises.stat(root);
        } catch (error) {
            throw IOError.wrap('walk', root, error);
        }
        if (!stat.isDirectory()) {
            throw new IOError('walk', root, 'not a directory');
        }
    }
}

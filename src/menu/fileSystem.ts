import { readdirSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export type DirEntry = {
    name: string;
    isDirectory: boolean;
};

export interface FileSystem {
    /** Entries directly under `path`, in no particular order. */
    list(path: string): DirEntry[];
    /** Parent directory, or null at a filesystem root. */
    parent(path: string): string | null;
    join(path: string, name: string): string;
    /** Absolute, normalised form of `path`. */
    normalize(path: string): string;
}

function isDirectoryTarget(path: string): boolean {
    try {
        return statSync(path).isDirectory();
    } catch {
        // dangling symlink
        return false;
    }
}

export const nodeFileSystem: FileSystem = {
    list(path) {
        return readdirSync(path, { withFileTypes: true }).map((dirent) => ({
            name: dirent.name,
            isDirectory: dirent.isDirectory() || (dirent.isSymbolicLink() && isDirectoryTarget(join(path, dirent.name))),
        }));
    },
    parent(path) {
        const absolute = resolve(path);
        const parent = dirname(absolute);
        return parent === absolute ? null : parent;
    },
    join(path, name) {
        return join(path, name);
    },
    normalize(path) {
        return resolve(path);
    },
};

export function segmentCount(fs: FileSystem, path: string): number {
    return fs.normalize(path).split(/[\\/]+/).filter((segment) => segment.length > 0).length;
}

import * as fs from 'fs';
import * as path from 'path';

/**
 * A directory entry, classified without following symbolic links.
 */
export interface Entry {
    name: string;
    isFile: boolean;
    isDirectory: boolean;
    isSymbolicLink: boolean;
}

/**
 * Thin wrapper over the filesystem calls stratarender makes.
 * Created per call site with the caller's debug log.
 */
export interface Utility {
    isDirectory: (targetPath: string) => Promise<boolean>;
    isDirectoryReadable: (targetPath: string) => Promise<boolean>;
    isFileReadable: (targetPath: string) => Promise<boolean>;
    /** Entries of a directory, sorted by name in code-unit order */
    listEntries: (directory: string) => Promise<Entry[]>;
    /**
     * Every regular file below a directory, as sorted `/`-separated relative paths.
     * Symbolic links are not followed; each one is passed to `onSymbolicLink`.
     */
    listFilesRecursive: (directory: string, onSymbolicLink?: (relativePath: string) => void) => Promise<string[]>;
    readBuffer: (filePath: string) => Promise<Buffer>;
    readFile: (filePath: string, encoding: string) => Promise<string>;
    writeFile: (filePath: string, content: string, encoding: string) => Promise<void>;
    createDirectory: (directory: string) => Promise<void>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => { });

    const isDirectory = async (targetPath: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(targetPath);
            if (!stats.isDirectory()) {
                log(`${targetPath} is not a directory`);
                return false;
            }
            return true;
        } catch {
            return false;
        }
    }

    const isReadable = async (targetPath: string): Promise<boolean> => {
        try {
            await fs.promises.access(targetPath, fs.constants.R_OK);
            return true;
        } catch (error) {
            log(`${targetPath} is not readable: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    const isDirectoryReadable = async (targetPath: string): Promise<boolean> => {
        return await isDirectory(targetPath) && await isReadable(targetPath);
    }

    const isFileReadable = async (targetPath: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(targetPath);
            return stats.isFile() && await isReadable(targetPath);
        } catch {
            return false;
        }
    }

    const listEntries = async (directory: string): Promise<Entry[]> => {
        const dirents = await fs.promises.readdir(directory, { withFileTypes: true });
        return dirents
            .map(dirent => ({
                name: dirent.name,
                isFile: dirent.isFile(),
                isDirectory: dirent.isDirectory(),
                isSymbolicLink: dirent.isSymbolicLink(),
            }))
            .sort((a, b) => compareNames(a.name, b.name));
    }

    const listFilesRecursive = async (
        directory: string,
        onSymbolicLink: (relativePath: string) => void = () => { }
    ): Promise<string[]> => {
        const files: string[] = [];
        const pending: string[][] = [[]];
        for (let index = 0; index < pending.length; index++) {
            const segments = pending[index];
            for (const entry of await listEntries(path.join(directory, ...segments))) {
                if (entry.isDirectory) {
                    pending.push([...segments, entry.name]);
                } else if (entry.isFile) {
                    files.push([...segments, entry.name].join('/'));
                } else if (entry.isSymbolicLink) {
                    onSymbolicLink([...segments, entry.name].join('/'));
                }
            }
        }
        return files.sort(compareNames);
    }

    const readBuffer = async (filePath: string): Promise<Buffer> => {
        return await fs.promises.readFile(filePath);
    }

    const readFile = async (filePath: string, encoding: string): Promise<string> => {
        return new TextDecoder(encoding, { fatal: true }).decode(await readBuffer(filePath));
    }

    const writeFile = async (filePath: string, content: string, encoding: string): Promise<void> => {
        await fs.promises.writeFile(filePath, content, { encoding: toBufferEncoding(encoding) });
    }

    const createDirectory = async (directory: string): Promise<void> => {
        await fs.promises.mkdir(directory, { recursive: true });
    }

    return {
        isDirectory,
        isDirectoryReadable,
        isFileReadable,
        listEntries,
        listFilesRecursive,
        readBuffer,
        readFile,
        writeFile,
        createDirectory,
    };
}

/**
 * Code-unit ordering, independent of locale.
 */
export function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function toBufferEncoding(encoding: string): BufferEncoding {
    const normalized = encoding.toLowerCase();
    return Buffer.isEncoding(normalized) ? normalized : 'utf8';
}

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { readDataFile, readLevelTable, LevelStoreOptions } from '../../src/discovery/level-store';
import { ParseError } from '../../src/error/ParseError';
import { StructuralMismatchError } from '../../src/error/StructuralMismatchError';
import { Logger } from '../../src/types';

describe('discovery/level-store', () => {
    let tempDir: string;
    let logCalls: { level: string; message: string }[];
    let mockLogger: Logger;

    beforeEach(async () => {
        tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'stratarender-levels-'));
        logCalls = [];
        mockLogger = {
            debug: (msg: string) => logCalls.push({ level: 'debug', message: msg }),
            info: (msg: string) => logCalls.push({ level: 'info', message: msg }),
            warn: (msg: string) => logCalls.push({ level: 'warn', message: msg }),
            error: (msg: string) => logCalls.push({ level: 'error', message: msg }),
            verbose: (msg: string) => logCalls.push({ level: 'verbose', message: msg }),
            silly: (msg: string) => logCalls.push({ level: 'silly', message: msg }),
        };
    });

    afterEach(async () => {
        await fs.promises.rm(tempDir, { recursive: true, force: true });
    });

    async function createFile(relativePath: string, content: string | Buffer): Promise<string> {
        const fullPath = path.join(tempDir, relativePath);
        await fs.promises.mkdir(path.dirname(fullPath), { recursive: true });
        await fs.promises.writeFile(fullPath, content);
        return fullPath;
    }

    function options(overrides: Partial<LevelStoreOptions> = {}): LevelStoreOptions {
        return {
            dataExtensions: ['.yaml', '.yml', '.json'],
            encoding: 'utf8',
            nonMappingFiles: 'ignore',
            logger: mockLogger,
            ...overrides,
        };
    }

    describe('readLevelTable', () => {
        it('should record one level per directory, including the root and empty directories', async () => {
            await createFile('prod/app/main.yaml', 'name: x\n');
            await createFile('prod/main.yaml', 'env: p\n');
            await fs.promises.mkdir(path.join(tempDir, 'staging', 'app'), { recursive: true });

            const table = await readLevelTable(tempDir, options());

            expect(table.maxDepth).toBe(2);
            expect(Array.from(table.levels.keys()).sort()).toEqual([
                '',
                'prod',
                'prod/app',
                'staging',
                'staging/app',
            ]);
            expect(table.levels.get('')?.mapping).toEqual({});
            expect(table.levels.get('prod')?.mapping).toEqual({ env: 'p' });
            expect(table.levels.get('prod/app')?.mapping).toEqual({ name: 'x' });
            expect(table.levels.get('staging/app')?.mapping).toEqual({});
            expect(table.levels.get('prod/app')?.key).toEqual(['prod', 'app']);
        });

        it('should keep the key set closed under prefixes', async () => {
            await createFile('a/b/c/d/leaf.yaml', 'deep: true\n');

            const table = await readLevelTable(tempDir, options());

            expect(table.maxDepth).toBe(4);
            for (const level of table.levels.values()) {
                for (let length = 0; length < level.key.length; length++) {
                    expect(table.levels.has(level.key.slice(0, length).join('/'))).toBe(true);
                }
            }
        });

        it('should merge files of one directory in sorted order, later files winning', async () => {
            await createFile('b.yaml', 'shared: from-b\nonlyB: 1\nnested:\n  b: 2\n');
            await createFile('a.yaml', 'shared: from-a\nonlyA: 1\nnested:\n  a: 1\n');

            const table = await readLevelTable(tempDir, options());

            expect(table.levels.get('')?.mapping).toEqual({
                shared: 'from-b',
                onlyA: 1,
                onlyB: 1,
                nested: { a: 1, b: 2 },
            });
            expect(table.levels.get('')?.files).toEqual([
                path.join(tempDir, 'a.yaml'),
                path.join(tempDir, 'b.yaml'),
            ]);
        });

        it('should not merge subdirectory files into the parent level', async () => {
            await createFile('root.yaml', 'level: root\n');
            await createFile('child/child.yaml', 'level: child\n');

            const table = await readLevelTable(tempDir, options());

            expect(table.levels.get('')?.mapping).toEqual({ level: 'root' });
            expect(table.levels.get('child')?.mapping).toEqual({ level: 'child' });
        });

        it('should read JSON files and skip files with other extensions', async () => {
            await createFile('values.json', '{"fromJson": true}');
            await createFile('README.md', '# not data: really\n');
            await createFile('.gitkeep', '');

            const table = await readLevelTable(tempDir, options());

            expect(table.levels.get('')?.mapping).toEqual({ fromJson: true });
            expect(logCalls).toContainEqual({
                level: 'debug',
                message: `Skipping non-data entry: ${path.join(tempDir, 'README.md')}`,
            });
        });

        it('should ignore non-mapping files with a warning by default', async () => {
            const listFile = await createFile('list.yaml', '- a\n- b\n');
            await createFile('map.yaml', 'kept: true\n');

            const table = await readLevelTable(tempDir, options());

            expect(table.levels.get('')?.mapping).toEqual({ kept: true });
            expect(table.levels.get('')?.files).toEqual([path.join(tempDir, 'map.yaml')]);
            expect(logCalls).toContainEqual({
                level: 'warn',
                message: `Ignoring ${listFile}: expected a mapping, found a list`,
            });
        });

        it('should fail on non-mapping files under the error policy', async () => {
            const scalarFile = await createFile('scalar.yaml', 'just text\n');

            await expect(readLevelTable(tempDir, options({ nonMappingFiles: 'error' })))
                .rejects.toThrow(`Expected a mapping in ${scalarFile}, found a string`);
        });

        it('should treat empty files as contributing nothing', async () => {
            await createFile('empty.yaml', '');
            await createFile('comment.yaml', '# nothing here\n');

            const table = await readLevelTable(tempDir, options({ nonMappingFiles: 'error' }));

            expect(table.levels.get('')?.mapping).toEqual({});
            expect(table.levels.get('')?.files).toEqual([]);
        });

        it('should fail with a ParseError on invalid YAML', async () => {
            await createFile('broken.yaml', 'key: [unclosed\n');

            const promise = readLevelTable(tempDir, options());
            await expect(promise).rejects.toBeInstanceOf(ParseError);
            await expect(promise).rejects.toMatchObject({
                reason: 'syntax',
                filePath: path.join(tempDir, 'broken.yaml'),
                message: `Unable to parse ${path.join(tempDir, 'broken.yaml')}: ` +
                    'unexpected end of the stream within a flow collection (2:1)',
            });
        });

        it('should skip symbolic links with a warning', async () => {
            const target = await createFile('elsewhere/shared.yaml', 'a: 1\n');
            await fs.promises.mkdir(path.join(tempDir, 'vars'));
            const link = path.join(tempDir, 'vars', 'shared.yaml');
            await fs.promises.symlink(target, link);

            const table = await readLevelTable(path.join(tempDir, 'vars'), options());

            expect(table.levels.get('')?.mapping).toEqual({});
            expect(logCalls).toContainEqual({ level: 'warn', message: `Skipping symbolic link: ${link}` });
        });

        it('should fail with a ParseError on bytes that do not decode', async () => {
            await createFile('latin.yaml', Buffer.from([0x6b, 0x3a, 0x20, 0xff, 0xfe, 0x0a]));

            await expect(readLevelTable(tempDir, options())).rejects.toMatchObject({
                name: 'ParseError',
                reason: 'decode',
                filePath: path.join(tempDir, 'latin.yaml'),
            });
        });

        it('should name the file when sibling files disagree on structure', async () => {
            await createFile('a.yaml', 'db:\n  port: 1\n');
            const second = await createFile('b.yaml', 'db: none\n');

            const promise = readLevelTable(tempDir, options());
            await expect(promise).rejects.toBeInstanceOf(StructuralMismatchError);
            await expect(promise).rejects.toMatchObject({ location: second, keyPath: ['db'] });
        });

        it('should report a table of only the root for a flat directory', async () => {
            await createFile('only.yaml', 'a: 1\n');

            const table = await readLevelTable(tempDir, options());

            expect(table.maxDepth).toBe(0);
            expect(table.levels.size).toBe(1);
        });
    });

    describe('readDataFile', () => {
        it('should return the parsed mapping', async () => {
            const file = await createFile('x.yaml', 'a:\n  b: [1, 2]\n');
            expect(await readDataFile(file, options())).toEqual({ a: { b: [1, 2] } });
        });

        it('should keep unquoted dates as written', async () => {
            const file = await createFile('x.yaml', 'd: 2020-01-01\nt: 2020-01-01T10:00:00Z\n');
            expect(await readDataFile(file, options())).toEqual({ d: '2020-01-01', t: '2020-01-01T10:00:00Z' });
        });

        it('should resolve anchors and merge keys', async () => {
            const file = await createFile('x.yaml', 'base: &base\n  x: 1\nderived:\n  <<: *base\n  y: 2\n');
            expect(await readDataFile(file, options())).toEqual({ base: { x: 1 }, derived: { x: 1, y: 2 } });
        });

        it('should return null for a non-mapping document under the ignore policy', async () => {
            const file = await createFile('x.yaml', '42\n');
            expect(await readDataFile(file, options())).toBeNull();
            expect(logCalls).toContainEqual({
                level: 'warn',
                message: `Ignoring ${file}: expected a mapping, found a number`,
            });
        });

        it('should fail when the file cannot be read', async () => {
            await expect(readDataFile(path.join(tempDir, 'missing.yaml'), options())).rejects.toMatchObject({
                name: 'FileSystemError',
                errorType: 'operation_failed',
                operation: 'read variables file',
            });
        });
    });
});

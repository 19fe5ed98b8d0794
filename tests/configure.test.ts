import { beforeEach, describe, expect, test } from 'vitest';
import { Command } from 'commander';
import { configure } from '../src/configure';
import { ArgumentError } from '../src/error/ArgumentError';

describe('configure', () => {
    let command: Command;

    beforeEach(() => {
        command = new Command().exitOverride();
    });

    test('should return the same command', async () => {
        expect(await configure(command)).toBe(command);
    });

    test('should register every option', async () => {
        await configure(command);

        expect(command.options.map(option => option.long)).toEqual([
            '--base',
            '--variables',
            '--templates',
            '--output',
            '--extension',
            '--partials',
            '--strict-mapping',
            '--config',
            '--check-config',
            '--verbose',
            '--debug',
        ]);
    });

    test('should leave unset options undefined', async () => {
        await configure(command);
        command.parse([], { from: 'user' });

        expect(command.opts()).toEqual({});
    });

    test('should parse short and long options', async () => {
        await configure(command);
        command.parse([
            '-b', '/work',
            '-v', 'layers',
            '-p', 'tpl',
            '-o', 'out',
            '-e', '.j2',
            '--partials', '_include',
            '--strict-mapping',
            '-c', 'options.yaml',
            '--check-config',
            '--verbose',
            '--debug',
        ], { from: 'user' });

        expect(command.opts()).toEqual({
            base: '/work',
            variables: 'layers',
            templates: 'tpl',
            output: 'out',
            extension: '.j2',
            partials: '_include',
            strictMapping: true,
            config: 'options.yaml',
            checkConfig: true,
            verbose: true,
            debug: true,
        });
    });

    test('should trim directory options', async () => {
        await configure(command);
        command.parse(['--output', '  out  '], { from: 'user' });

        expect(command.opts()).toEqual({ output: 'out' });
    });

    test('should name the flag when a directory is invalid', async () => {
        const variables = await configure(new Command().exitOverride());
        const templates = await configure(new Command().exitOverride());

        expect(() => variables.parse(['--variables', '   '], { from: 'user' })).toThrow(ArgumentError);
        expect(() => templates.parse(['--templates', ''], { from: 'user' }))
            .toThrow('Invalid --templates: templates cannot be empty or whitespace only');
    });
});

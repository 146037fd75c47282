import {
    suite,
    test,
} from '@testdeck/mocha';
import type {
    FileWrapper,
} from './fileio';
import {
    newBuilder,
    selectTargets,
    TargetNotFoundError,
    TargetTree,
} from './index';
import stream = require('stream');
import assert = require('assert');

class MemoryConsole {
    readonly chunks: string[] = [];
    readonly stream = new stream.Writable({
        write: (chunk: Buffer, _encoding, callback) => {
            this.chunks.push(chunk.toString());
            callback();
        },
    });
}

function memoryFiles(files: Record<string, string>): FileWrapper {
    return {
        exists: async filename => filename in files,
        readAllText: async filename => files[filename],
    };
}

/**
 * Tests for running a build
 */
@suite('Builder')
export class BuilderTest {
    @test
    async 'run() runs the requested targets'(): Promise<void> {
        const out = new MemoryConsole();
        const calls: string[] = [];
        const builder = newBuilder();
        builder.addTarget('clean').do(() => { calls.push('clean'); });
        builder.addTarget('build').do(() => { calls.push('build'); });

        const code = await builder.run({ files: memoryFiles({}), stream: out.stream, targets: ['clean', 'build'] });

        assert.strictEqual(code, 0);
        assert.deepStrictEqual(calls, ['clean', 'build']);
        assert.strictEqual(out.chunks[out.chunks.length - 1], 'BUILD SUCCESSFUL\n');
    }

    @test
    async 'run() skips requested targets that already ran'(): Promise<void> {
        const calls: string[] = [];
        const builder = newBuilder();
        builder.addTarget('compile').do(() => { calls.push('compile'); });
        builder.addTarget('test').dependsOn('compile').do(() => { calls.push('test'); });

        const code = await builder.run({ files: memoryFiles({}), stream: new MemoryConsole().stream, targets: ['test', 'compile'] });

        assert.strictEqual(code, 0);
        assert.deepStrictEqual(calls, ['compile', 'test']);
    }

    @test
    async 'run() defaults to the default target'(): Promise<void> {
        const calls: string[] = [];
        const builder = newBuilder();
        builder.addTarget('build').do(() => { calls.push('build'); }).setAsDefault();
        builder.addTarget('clean').do(() => { calls.push('clean'); });

        assert.strictEqual(await builder.run({ files: memoryFiles({}), stream: new MemoryConsole().stream }), 0);
        assert.deepStrictEqual(calls, ['build']);
    }

    @test
    async 'run() without targets or default shows help'(): Promise<void> {
        const out = new MemoryConsole();
        const builder = newBuilder();
        builder.addTarget('build').setDescription('Builds it');

        assert.strictEqual(await builder.run({ files: memoryFiles({}), stream: out.stream }), 0);
        assert.deepStrictEqual(out.chunks.slice(0, 4), [
            'Executing help\n',
            '  Available targets:\n',
            '    help   Displays the available targets in the build script.\n',
            '    build  Builds it\n',
        ]);
    }

    @test
    async 'run() with an unknown target runs nothing'(): Promise<void> {
        const out = new MemoryConsole();
        const calls: string[] = [];
        const builder = newBuilder();
        builder.addTarget('build').do(() => { calls.push('build'); });

        const code = await builder.run({ files: memoryFiles({}), stream: out.stream, targets: ['build', 'deploy'] });

        assert.strictEqual(code, 1);
        assert.deepStrictEqual(calls, []);
        assert.strictEqual(out.chunks.length, 2);
        assert(out.chunks[0].includes('The target \'deploy\' does not exist'));
        assert.strictEqual(out.chunks[1], 'BUILD FAILED\n');
    }

    @test
    async 'run() reports a failing target'(): Promise<void> {
        const out = new MemoryConsole();
        const builder = newBuilder();
        builder.addTarget('build').do(() => { throw new Error('compiler crashed'); });

        const code = await builder.run({ files: memoryFiles({}), stream: out.stream, targets: ['build'] });

        assert.strictEqual(code, 1);
        const n = out.chunks.length;
        assert.match(out.chunks[n - 3], /^error: build failed/);
        assert(out.chunks[n - 2].includes('compiler crashed'));
        assert.strictEqual(out.chunks[n - 1], 'BUILD FAILED\n');
    }

    @test
    async 'run() merges config file and option properties'(): Promise<void> {
        const seen: Array<string | undefined> = [];
        const builder = newBuilder();
        builder.addTarget('build').do(ctx => {
            seen.push(ctx.getProperty('mode'), ctx.getProperty('out'));
        });
        const files = memoryFiles({ 'ci.json': '{"properties": {"mode": "debug", "out": "dist"}}' });

        const code = await builder.run({
            configFile: 'ci.json',
            files,
            properties: { mode: 'release' },
            stream: new MemoryConsole().stream,
            targets: ['build'],
        });

        assert.strictEqual(code, 0);
        assert.deepStrictEqual(seen, ['release', 'dist']);
    }

    @test
    async 'run() fails on an invalid config file'(): Promise<void> {
        const out = new MemoryConsole();
        const builder = newBuilder();
        const files = memoryFiles({ '.buildtree.json': '[1]' });

        assert.strictEqual(await builder.run({ files, stream: out.stream }), 1);
        assert(out.chunks[0].includes('.buildtree.json: expected an object'));
    }

    @test
    async 'run() a second time fails without running targets'(): Promise<void> {
        const out = new MemoryConsole();
        const calls: string[] = [];
        const builder = newBuilder();
        builder.addTarget('build').do(() => { calls.push('build'); });
        assert.strictEqual(await builder.run({ files: memoryFiles({}), stream: new MemoryConsole().stream, targets: ['build'] }), 0);

        const code = await builder.run({ files: memoryFiles({}), stream: out.stream, targets: ['build'] });

        assert.strictEqual(code, 1);
        assert.deepStrictEqual(calls, ['build']);
        assert.strictEqual(out.chunks.length, 2);
        assert(out.chunks[0].includes('A builder can only run once'));
        assert.strictEqual(out.chunks[1], 'BUILD FAILED\n');
    }

    @test
    'selectTargets()'(): void {
        const tree = new TargetTree();
        tree.createTarget('build');
        assert.deepStrictEqual(selectTargets(tree), ['help']);
        assert.deepStrictEqual(selectTargets(tree, []), ['help']);
        assert.deepStrictEqual(selectTargets(tree, ['build', 'help']), ['build', 'help']);
        tree.getTarget('build').setAsDefault();
        assert.deepStrictEqual(selectTargets(tree), ['build']);
        assert.throws(() => selectTargets(tree, ['nope']), TargetNotFoundError);
    }
}

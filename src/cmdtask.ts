/**
 * @module
 * Implements Tasks that run commands.
 */
import type {
    TaskContext,
} from './context';
import {
    CommandFailedError,
    ConfigurationError,
} from './errors';
import {
    TaskBase,
} from './task';
import childProcess = require('child_process');

/**
 * Options for {@link CommandTask}.
 */
export interface CommandTaskOptions {
    /** Program and its arguments. Not run through a shell. */
    command: string[];
    /** Default: the quoted command line. */
    description?: string;
    /** Working directory. Default: the current directory. */
    cwd?: string;
    /**
     * If true, a non-zero exit code becomes the task result instead of failing the task.
     * Default: `false`.
     */
    doNotFail?: boolean;
}

/**
 * Represents a task that runs a command.
 */
export class CommandTask extends TaskBase {
    readonly description: string;
    readonly command: string[];
    private readonly cwd?: string;
    private readonly doNotFail: boolean;

    constructor(options: CommandTaskOptions) {
        super();
        if (!options.command.length)
            throw new ConfigurationError('Command must not be empty');
        this.command = options.command;
        this.description = options.description || options.command.map(quote).join(' ');
        this.cwd = options.cwd;
        this.doNotFail = !!options.doNotFail;
    }

    protected get logDuration(): boolean {
        return true;
    }

    protected async doExecute(ctx: TaskContext): Promise<number> {
        const code = await runCommand(this.command, ctx, this.cwd);
        if (code !== 0 && !this.doNotFail)
            throw new CommandFailedError(this.command, code);
        return code;
    }
}

/**
 * Shorthand for a {@link CommandTask} without options.
 */
export function commandTask(...command: string[]): CommandTask {
    return new CommandTask({ command });
}

function runCommand(command: string[], ctx: TaskContext, cwd?: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
        const cmdFile = command[0];
        const cmdArgs = command.slice(1);
        const cp = childProcess.spawn(cmdFile, cmdArgs, {
            cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        cp.on('error', e => {
            reject(e);
        });
        cp.on('close', (code, signal) => {
            if (code !== null)
                return resolve(code);
            reject(new Error(`Command terminated by signal ${signal}: ${command.join(' ')}`));
        });
        const chunkCallback = (chunk: string | Buffer) => {
            ctx.writeOutput(chunk);
        };
        cp.stdout.on('data', chunkCallback);
        cp.stderr.on('data', chunkCallback);
    });
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}

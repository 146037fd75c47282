/**
 * @module
 * Build console: log output, the running target and the build summary.
 */
import readline = require('readline');
import tty = require('tty');
import util = require('util');

/**
 * Console output of a build.
 */
export interface Progress {
    /** Write chunk to console. */
    write(chunk: Buffer | string): void;
    /** Shows the target being run as the status line of a terminal. */
    targetStarted(name: string, index: number, total: number): void;
    /** Prints the build result: the fault, if any, then the summary line. */
    buildFinished(error?: unknown): void;
}

/** Summary line of a build that completed. */
export const BUILD_SUCCESSFUL = 'BUILD SUCCESSFUL';
/** Summary line of a build that was aborted by a fault. */
export const BUILD_FAILED = 'BUILD FAILED';

class ConsoleProgress implements Progress {
    private readonly stream: NodeJS.WritableStream;
    /** Status line currently on screen, if any. */
    private statusShown: boolean;

    constructor(stream: NodeJS.WritableStream) {
        this.stream = stream;
        this.statusShown = false;
    }

    write(chunk: Buffer | string): void {
        this.clearStatus();
        this.stream.write(chunk);
    }

    targetStarted(name: string, index: number, total: number): void {
        if (!isTTY(this.stream))
            return;
        // the status line is rewritten in place until some output pushes it up
        if (this.statusShown) {
            readline.cursorTo(this.stream, 0);
            readline.clearLine(this.stream, 0);
        }
        this.stream.write(truncateString(formatStatus(name, index, total), this.stream.columns));
        this.statusShown = true;
    }

    buildFinished(error?: unknown): void {
        if (error === undefined) {
            this.write(`${BUILD_SUCCESSFUL}\n`);
            return;
        }
        this.write(`${util.inspect(error)}\n`);
        this.write(`${BUILD_FAILED}\n`);
    }

    private clearStatus(): void {
        if (this.statusShown) {
            this.stream.write('\n');
            this.statusShown = false;
        }
    }
}

/**
 * Create the console of a build, writing to `stream` (default: stdout).
 */
export function createProgress(stream?: NodeJS.WritableStream): Progress {
    return new ConsoleProgress(stream || process.stdout);
}

/**
 * Status line of the `index`-th (1-based) of `total` requested targets.
 */
export function formatStatus(name: string, index: number, total: number): string {
    return `[${index}/${total}] ${name}`;
}

function isTTY(stream: NodeJS.WritableStream): stream is tty.WriteStream {
    return stream instanceof tty.WriteStream && stream.isTTY;
}

export function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}

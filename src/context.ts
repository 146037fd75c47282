/**
 * @module
 * Execution context shared by every target and task of a run.
 */
import {
    ConfigurationError,
} from './errors';
import type {
    Progress,
} from './progress';

/**
 * Context that will be passed to target actions and tasks during execution.
 */
export interface TaskContext {
    /** Returns a build property, or `undefined` if it is not set. */
    getProperty(name: string): string | undefined;
    /** Returns a build property, failing if it is not set. */
    requireProperty(name: string): string;
    setProperty(name: string, value: string): void;
    logInfo(message: string): void;
    logError(message: string): void;
    /** Raw output, eg. from a spawned command. Written as is. */
    writeOutput(chunk: Buffer | string): void;
    /** Indent subsequent log lines one more level. */
    increaseDepth(): void;
    decreaseDepth(): void;
}

/**
 * {@link TaskContext} writing to a console {@link Progress}.
 */
export class BuildContext implements TaskContext {
    private readonly progress: Progress;
    private readonly properties: Map<string, string>;
    private depth: number;

    constructor(progress: Progress, properties?: Record<string, string>) {
        this.progress = progress;
        this.properties = new Map(Object.entries(properties || {}));
        this.depth = 0;
    }

    getProperty(name: string): string | undefined {
        return this.properties.get(name);
    }

    requireProperty(name: string): string {
        const value = this.properties.get(name);
        if (value === undefined)
            throw new ConfigurationError(`Build property '${name}' is not set`);
        return value;
    }

    setProperty(name: string, value: string): void {
        this.properties.set(name, value);
    }

    logInfo(message: string): void {
        this.writeLine(message);
    }

    logError(message: string): void {
        this.writeLine(`error: ${message}`);
    }

    writeOutput(chunk: Buffer | string): void {
        this.progress.write(chunk);
    }

    increaseDepth(): void {
        this.depth++;
    }

    decreaseDepth(): void {
        if (this.depth > 0)
            this.depth--;
    }

    private writeLine(message: string): void {
        const indent = '  '.repeat(this.depth);
        for (const line of message.split('\n'))
            this.progress.write(`${indent}${line}\n`);
    }
}

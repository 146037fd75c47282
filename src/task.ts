import type {
    TaskContext,
} from './context';

/**
 * Function that performs a target action.
 */
export type TaskAction = (ctx: TaskContext) => (Promise<void> | void);

/**
 * Function that runs a task. Returning nothing means result code `0`.
 */
export type TaskFunction = (ctx: TaskContext) => (Promise<number | void> | number | void);

/**
 * Represents an executable task.
 */
export interface Task {
    /** Task description. */
    readonly description?: string;
    /** Runs the task, resolving to its result code. */
    execute(ctx: TaskContext): Promise<number>;
}

/**
 * Base class for tasks.
 *
 * Subclasses implement {@link TaskBase#doExecute}. When {@link TaskBase#logDuration}
 * is set, the start of the task and its duration are logged, and a failed
 * task is reported before its error propagates.
 */
export abstract class TaskBase implements Task {
    abstract readonly description?: string;

    protected get logDuration(): boolean {
        return false;
    }

    protected get descriptionForLog(): string {
        return this.description || this.constructor.name;
    }

    async execute(ctx: TaskContext): Promise<number> {
        const start = Date.now();
        if (this.logDuration)
            ctx.logInfo(`Executing ${this.descriptionForLog}`);
        ctx.increaseDepth();
        let succeeded = false;
        try {
            const result = await this.doExecute(ctx);
            succeeded = true;
            return result;
        } finally {
            ctx.decreaseDepth();
            if (this.logDuration) {
                const took = formatDuration(Date.now() - start);
                if (succeeded)
                    ctx.logInfo(`${this.descriptionForLog} finished (took ${took})`);
                else
                    ctx.logError(`${this.descriptionForLog} failed (took ${took})`);
            }
        }
    }

    protected abstract doExecute(ctx: TaskContext): Promise<number>;
}

class FunctionTask extends TaskBase {
    readonly description: string;
    private readonly fn: TaskFunction;

    constructor(description: string, fn: TaskFunction) {
        super();
        this.description = description;
        this.fn = fn;
    }

    protected async doExecute(ctx: TaskContext): Promise<number> {
        const ret = await this.fn(ctx);
        return ret === undefined ? 0 : ret;
    }
}

/**
 * Converts a function into a task.
 */
export function createTask(description: string, fn: TaskFunction): Task {
    return new FunctionTask(description, fn);
}

/**
 * Formats milliseconds as seconds, eg. `1.25s`.
 */
export function formatDuration(ms: number): string {
    return `${(ms / 1000).toFixed(2)}s`;
}

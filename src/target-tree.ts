/**
 * @module
 * Target registry and dependency resolution.
 */
import type {
    TaskContext,
} from './context';
import {
    ConfigurationError,
    TargetNotFoundError,
} from './errors';
import {
    Target,
} from './target';

/** Name of the built-in target listing the available targets. */
export const HELP_TARGET = 'help';

/**
 * Owns the targets of a build, keyed by name, and the set of targets already
 * executed in the current run.
 */
export class TargetTree {
    private readonly targets: Map<string, Target>;
    /** Names of executed targets. Only grows. */
    private readonly executedTargets: Set<string>;
    private defaultTargetRef?: Target;

    constructor() {
        this.targets = new Map();
        this.executedTargets = new Set();
        this.createTarget(HELP_TARGET)
            .setDescription('Displays the available targets in the build script.')
            .do(ctx => {
                for (const line of this.describeTargets())
                    ctx.logInfo(line);
            });
    }

    get defaultTarget(): Target | undefined {
        return this.defaultTargetRef;
    }

    /**
     * Creates a target and adds it to the tree.
     */
    createTarget(name: string): Target {
        const target = new Target(name);
        target.addToTargetTree(this);
        return target;
    }

    /**
     * Registers `target` by name. Fails if the name is taken.
     *
     * Use {@link Target#addToTargetTree} so the target knows its tree.
     */
    addTarget(target: Target): void {
        if (this.targets.has(target.name))
            throw new ConfigurationError(`Target with the name '${target.name}' already exists`);
        this.targets.set(target.name, target);
    }

    hasTarget(name: string): boolean {
        return this.targets.has(name);
    }

    getTarget(name: string): Target {
        const target = this.targets.get(name);
        if (!target)
            throw new TargetNotFoundError(name);
        return target;
    }

    /**
     * Returns all targets in registration order.
     */
    listTargets(): Target[] {
        return Array.from(this.targets.values());
    }

    setDefaultTarget(target: Target): void {
        this.defaultTargetRef = target;
    }

    markTargetAsExecuted(target: Target): void {
        this.executedTargets.add(target.name);
    }

    isExecuted(name: string): boolean {
        return this.executedTargets.has(name);
    }

    /**
     * Executes, in declaration order, each dependency of target `name` that
     * has not been executed yet in this run.
     */
    async ensureDependenciesExecuted(ctx: TaskContext, name: string): Promise<void> {
        const target = this.getTarget(name);
        for (const dependency of target.dependencies) {
            const dependencyTarget = this.getTarget(dependency);
            if (!this.executedTargets.has(dependencyTarget.name))
                await dependencyTarget.execute(ctx);
        }
    }

    /**
     * Executes target `name`, whether or not it was executed before.
     */
    runTarget(ctx: TaskContext, name: string): Promise<number> {
        return this.getTarget(name).execute(ctx);
    }

    /**
     * Lists the visible targets, one line each.
     */
    describeTargets(): string[] {
        const visible = this.listTargets().filter(target => !target.isHidden);
        const width = Math.max(0, ...visible.map(target => target.name.length));
        const lines = ['Available targets:'];
        for (const target of visible) {
            let line = `  ${target.name.padEnd(width)}  ${target.description || ''}`.trimEnd();
            if (target === this.defaultTargetRef)
                line += ' (default)';
            lines.push(line);
        }
        return lines;
    }
}

/**
 * @module
 * Named, dependency-aware build targets.
 */
import type {
    TaskContext,
} from './context';
import {
    ConfigurationError,
} from './errors';
import {
    Task,
    TaskAction,
    TaskBase,
} from './task';
import type {
    TargetTree,
} from './target-tree';

/**
 * A target combines an optional action and a list of tasks, run after the
 * targets it depends on.
 *
 * Dependencies are kept as names and only resolved against the owning
 * {@link TargetTree} when the target executes, so a target may depend on
 * one that is registered later. Dependencies and tasks must not be changed
 * once the target started executing.
 */
export class Target extends TaskBase {
    readonly name: string;
    private readonly dependencyNames: string[];
    private readonly taskList: Task[];
    private descriptionText?: string;
    private hidden: boolean;
    private action?: TaskAction;
    private tree?: TargetTree;

    constructor(name: string) {
        super();
        this.name = name;
        this.dependencyNames = [];
        this.taskList = [];
        this.hidden = false;
    }

    get dependencies(): readonly string[] {
        return this.dependencyNames;
    }

    get tasks(): readonly Task[] {
        return this.taskList;
    }

    get description(): string | undefined {
        return this.descriptionText;
    }

    /**
     * Hidden targets are left out of the target listing but can still be run.
     */
    get isHidden(): boolean {
        return this.hidden;
    }

    protected get logDuration(): boolean {
        return true;
    }

    protected get descriptionForLog(): string {
        return this.name;
    }

    /**
     * Specifies targets on which this target depends on. Duplicates are kept;
     * a dependency still runs at most once per run.
     */
    dependsOn(...targets: Array<string | Target>): this {
        for (const target of targets)
            this.dependencyNames.push(typeof target === 'string' ? target : target.name);
        return this;
    }

    /**
     * Sets the target action. Fails if an action was already set, by `do()`
     * or by {@link Target#overrideDo}.
     */
    do(action: TaskAction): this {
        if (this.action)
            throw new ConfigurationError(`Target action was already set for target '${this.name}'`);
        this.action = action;
        return this;
    }

    /**
     * Replaces the target action, whether or not one was set before.
     */
    overrideDo(action: TaskAction): this {
        this.action = action;
        return this;
    }

    addTask(...tasks: Task[]): this {
        this.taskList.push(...tasks);
        return this;
    }

    /**
     * Sets the target as the default target of its tree.
     */
    setAsDefault(): this {
        if (!this.tree)
            throw new ConfigurationError(`Target '${this.name}' must be added to a target tree before it can be the default`);
        this.tree.setDefaultTarget(this);
        return this;
    }

    setDescription(description: string): this {
        this.descriptionText = description;
        return this;
    }

    setAsHidden(): this {
        this.hidden = true;
        return this;
    }

    /**
     * Adds this target to `tree`. A target the tree rejects stays detached.
     */
    addToTargetTree(tree: TargetTree): TargetTree {
        tree.addTarget(this);
        this.tree = tree;
        return tree;
    }

    protected async doExecute(ctx: TaskContext): Promise<number> {
        const tree = this.tree;
        if (!tree)
            throw new ConfigurationError(`Target '${this.name}' must be added to a target tree before it is executed`);

        // Marked before resolving dependencies: a dependency cycle leading
        // back here sees this target as done and stops.
        tree.markTargetAsExecuted(this);
        await tree.ensureDependenciesExecuted(ctx, this.name);

        // action-less targets only sequence their dependencies and tasks
        if (this.action)
            await this.action(ctx);

        let result = 0;
        for (const task of this.taskList)
            result = await task.execute(ctx);
        return result;
    }
}

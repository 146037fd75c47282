/**
 * @module
 * buildtree Public API
 */
import {
    BuildContext,
} from './context';
import {
    DEFAULT_CONFIG_FILE,
    readBuildConfig,
} from './config';
import {
    ConfigurationError,
    TargetNotFoundError,
} from './errors';
import type {
    FileWrapper,
} from './fileio';
import {
    nodeFileWrapper,
} from './fileio';
import {
    createProgress,
} from './progress';
import {
    Target,
} from './target';
import {
    HELP_TARGET,
    TargetTree,
} from './target-tree';

/**
 * Options for {@link Builder#run}
 */
export interface RunOptions {
    /**
     * Targets to run, in order.
     * Default: the default target, or `help` if there is none.
     */
    targets?: string[];

    /**
     * Build properties. Override the properties of the config file.
     */
    properties?: Record<string, string>;

    /**
     * Build config filename.
     * Default: `.buildtree.json`.
     */
    configFile?: string;

    /**
     * Console output.
     * Default: `process.stdout`.
     */
    stream?: NodeJS.WritableStream;

    /**
     * File access.
     * Default: the local filesystem.
     */
    files?: FileWrapper;
}

/**
 * Represents a build script.
 */
export interface Builder {
    /** Targets of the build. */
    readonly targets: TargetTree;
    /** Create a target and add it to the build. */
    addTarget(name: string): Target;
    /** Run the build, resolving to the process exit code. A builder runs once. */
    run(options?: RunOptions): Promise<number>;
}

class BuilderImpl implements Builder {
    readonly targets: TargetTree;
    private started: boolean;

    constructor(targets: TargetTree) {
        this.targets = targets;
        this.started = false;
    }

    addTarget(name: string): Target {
        return this.targets.createTarget(name);
    }

    async run(options?: RunOptions): Promise<number> {
        if (!options)
            options = {};
        const progress = createProgress(options.stream);
        const files = options.files || nodeFileWrapper;
        try {
            // the executed-target memo lives as long as the tree
            if (this.started)
                throw new ConfigurationError('A builder can only run once; create a new one with newBuilder()');
            this.started = true;
            const config = await readBuildConfig(options.configFile || DEFAULT_CONFIG_FILE, files);
            const ctx = new BuildContext(progress, { ...config.properties, ...options.properties });
            const names = selectTargets(this.targets, options.targets);
            for (let i = 0; i < names.length; i++) {
                if (this.targets.isExecuted(names[i]))
                    continue; // already ran as a dependency of an earlier target
                progress.targetStarted(names[i], i + 1, names.length);
                await this.targets.runTarget(ctx, names[i]);
            }
        } catch (error) {
            progress.buildFinished(error);
            return 1;
        }
        progress.buildFinished();
        return 0;
    }
}

/**
 * Returns the names of the targets to run. All of them must exist.
 */
export function selectTargets(tree: TargetTree, requested?: string[]): string[] {
    let names: string[];
    if (requested && requested.length)
        names = requested;
    else if (tree.defaultTarget)
        names = [tree.defaultTarget.name];
    else
        names = [HELP_TARGET];
    const missing = names.filter(name => !tree.hasTarget(name));
    if (missing.length)
        throw new TargetNotFoundError(missing[0]);
    return names;
}

/**
 * Construct a new build script with its own target tree.
 */
export function newBuilder(): Builder {
    return new BuilderImpl(new TargetTree());
}

export {
    BuildContext,
} from './context';
export type {
    TaskContext,
} from './context';
export {
    CommandTask,
    commandTask,
} from './cmdtask';
export type {
    CommandTaskOptions,
} from './cmdtask';
export {
    CommandFailedError,
    ConfigurationError,
    TargetNotFoundError,
} from './errors';
export type {
    FileWrapper,
} from './fileio';
export type {
    Progress,
} from './progress';
export {
    Target,
} from './target';
export {
    TargetTree,
} from './target-tree';
export {
    createTask,
    TaskBase,
} from './task';
export type {
    Task,
    TaskAction,
    TaskFunction,
} from './task';

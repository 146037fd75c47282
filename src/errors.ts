/**
 * @module
 * Build errors.
 */

/**
 * Build script authoring mistake. Aborts the run.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A target name could not be resolved.
 */
export class TargetNotFoundError extends ConfigurationError {
    readonly targetName: string;

    constructor(targetName: string) {
        super(`The target '${targetName}' does not exist`);
        this.name = 'TargetNotFoundError';
        this.targetName = targetName;
    }
}

/**
 * A command exited with a non-zero code.
 */
export class CommandFailedError extends Error {
    readonly command: string[];
    readonly exitCode: number;

    constructor(command: string[], exitCode: number) {
        super(`Command returned code ${exitCode}: ${command.join(' ')}`);
        this.name = 'CommandFailedError';
        this.command = command;
        this.exitCode = exitCode;
    }
}

/**
 * @module
 * Build configuration file.
 */
import {
    ConfigurationError,
} from './errors';
import type {
    FileWrapper,
} from './fileio';

/** Default build config filename. */
export const DEFAULT_CONFIG_FILE = '.buildtree.json';

/**
 * Contents of the build config file.
 */
export interface BuildConfig {
    /** Build properties, available to targets through the context. */
    properties: Record<string, string>;
}

/**
 * Read build config from file. A missing file is an empty config.
 */
export async function readBuildConfig(filename: string, files: FileWrapper): Promise<BuildConfig> {
    if (!(await files.exists(filename)))
        return { properties: {} };
    const contents = await files.readAllText(filename);
    let json: unknown;
    try {
        json = JSON.parse(contents);
    } catch (e) {
        throw new ConfigurationError(`${filename}: invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return parseBuildConfig(filename, json);
}

function parseBuildConfig(filename: string, json: unknown): BuildConfig {
    if (!isObject(json))
        throw new ConfigurationError(`${filename}: expected an object`);
    const properties: Record<string, string> = {};
    if (json.properties === undefined)
        return { properties };
    if (!isObject(json.properties))
        throw new ConfigurationError(`${filename}: "properties" must be an object`);
    for (const [name, value] of Object.entries(json.properties)) {
        if (typeof value !== 'string')
            throw new ConfigurationError(`${filename}: property '${name}' must be a string`);
        properties[name] = value;
    }
    return { properties };
}

function isObject(x: unknown): x is Record<string, unknown> {
    return typeof x === 'object' && x !== null && !Array.isArray(x);
}

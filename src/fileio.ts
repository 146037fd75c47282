import fs = require('fs-extra');

/**
 * File access used by the build, replaceable in tests.
 */
export interface FileWrapper {
    exists(filename: string): Promise<boolean>;
    readAllText(filename: string): Promise<string>;
}

/**
 * {@link FileWrapper} over the local filesystem.
 */
export const nodeFileWrapper: FileWrapper = {
    exists: filename => fs.pathExists(filename),
    readAllText: filename => fs.readFile(filename, 'utf-8'),
};

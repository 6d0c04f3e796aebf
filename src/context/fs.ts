/**
 * The filesystem calls the pipeline makes while walking and reading.
 * Pass a different implementation to simulate failing directories or files.
 */

import { readdirSync, readFileSync, type Dirent } from 'fs';

export interface ContextFs {
    readdirSync(path: string, options: { withFileTypes: true }): Dirent[];
    readFileSync(path: string): Buffer;
}

export const nodeFs: ContextFs = { readdirSync, readFileSync };

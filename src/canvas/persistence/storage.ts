/**
 * Where canvas documents are kept between sessions.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface CanvasStorage {
    /** Stored document text, or null when nothing was saved yet. */
    load(): Promise<string | null>;
    save(text: string): Promise<void>;
}

/** Keeps the document in memory. Used by tests and by hosts that persist elsewhere. */
export class MemoryCanvasStorage implements CanvasStorage {
    private text: string | null;
    private _saveCount = 0;

    constructor(initial: string | null = null) {
        this.text = initial;
    }

    get saveCount(): number {
        return this._saveCount;
    }

    async load(): Promise<string | null> {
        return this.text;
    }

    async save(text: string): Promise<void> {
        this.text = text;
        this._saveCount += 1;
    }
}

/**
 * JSON file on disk. Writes go to a sibling temp file that is then renamed
 * into place.
 */
export class FileCanvasStorage implements CanvasStorage {
    constructor(readonly filePath: string) {}

    async load(): Promise<string | null> {
        try {
            return await readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }
    }

    async save(text: string): Promise<void> {
        const tempPath = `${this.filePath}.tmp`;
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(tempPath, text, 'utf8');
        await rename(tempPath, this.filePath);
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

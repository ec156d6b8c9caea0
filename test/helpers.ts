import {
    Progress,
} from '../src/progress';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

/**
 * Progress collecting everything written to it.
 */
export class BufferProgress implements Progress {
    status: string;
    private readonly chunks: string[];

    constructor() {
        this.status = '';
        this.chunks = [];
    }

    get text(): string {
        return this.chunks.join('');
    }

    get lines(): string[] {
        return this.text.split('\n').filter(line => line.length > 0);
    }

    write(chunk: Buffer | string): void {
        this.chunks.push(chunk.toString());
    }

    render(): void {
        // nothing to draw
    }

    unrender(): void {
        // nothing to clear
    }
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'mkflow-'));
}

/**
 * Sets the modification time of `filename`, in seconds since the epoch.
 */
export function setMtime(filename: string, seconds: number): Promise<void> {
    return fs.utimes(filename, seconds, seconds);
}

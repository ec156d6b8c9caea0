/**
 * @module
 * Console output and status line.
 */
import readline = require('readline');
import tty = require('tty');

/**
 * Console output with an optional status line.
 * Everything printed while tasks run goes through it so that output and status do not interleave.
 */
export interface Progress {
    status: string;
    /** Write chunk to console. */
    write(chunk: Buffer | string): void;
    /** Renders status. */
    render(): void;
    /** Un-renders status by printing a newline. */
    unrender(): void;
}

/**
 * Keeps the status on the last line of a terminal, below everything written.
 */
class TerminalProgress implements Progress {
    status: string;
    private readonly stream: tty.WriteStream;
    private rendered: boolean;

    constructor(stream: tty.WriteStream) {
        this.status = '';
        this.stream = stream;
        this.rendered = false;
    }

    write(chunk: Buffer | string): void {
        const redraw = this.rendered;
        this.clear();
        this.stream.write(chunk);
        if (redraw)
            this.render();
    }

    render(): void {
        this.clear();
        this.stream.write(truncateString(this.status, this.stream.columns));
        this.rendered = true;
    }

    unrender(): void {
        if (this.rendered) {
            this.stream.write('\n');
            this.rendered = false;
        }
    }

    private clear(): void {
        if (!this.rendered)
            return;
        readline.cursorTo(this.stream, 0);
        readline.clearLine(this.stream, 0);
        this.rendered = false;
    }
}

/**
 * Progress for streams that are not terminals: the status line is never drawn.
 */
class PlainProgress implements Progress {
    status: string;
    private readonly stream: NodeJS.WritableStream;

    constructor(stream: NodeJS.WritableStream) {
        this.status = '';
        this.stream = stream;
    }

    write(chunk: Buffer | string): void {
        this.stream.write(chunk);
    }

    render(): void {
        // no status line
    }

    unrender(): void {
        // no status line
    }
}

/**
 * Create progress writing to `stream`, standard output by default.
 */
export function createProgress(stream?: NodeJS.WritableStream): Progress {
    if (!stream)
        stream = process.stdout;
    if (stream instanceof tty.WriteStream && stream.isTTY)
        return new TerminalProgress(stream);
    return new PlainProgress(stream);
}

function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.slice(0, len);
    else
        return `${x.slice(0, len - 3)}...`;
}

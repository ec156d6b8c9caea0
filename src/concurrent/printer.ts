/**
 * @module
 * Serializes the output of worker processes into one stream.
 */
import {
    MkflowError,
} from '../errors';
import {
    Progress,
} from '../progress';
import {
    PrintCommand,
} from './messages';
import {
    AsyncQueue,
    TaskQueue,
} from './queue';
import util = require('util');

/**
 * Stops the print server.
 */
export const EXIT_PRINT_COMMAND: PrintCommand = Object.freeze({
    clientName: '',
    message: '',
});

export function isExitPrintCommand(command: PrintCommand): boolean {
    return command.clientName === '';
}

type ConsoleMethod = (...values: unknown[]) => void;

interface ConsoleMethods {
    error: ConsoleMethod;
    info: ConsoleMethod;
    log: ConsoleMethod;
    warn: ConsoleMethod;
}

/**
 * Sends output to the print server instead of writing it.
 *
 * While attached, `console.log`, `console.info`, `console.warn` and
 * `console.error` go through the client.
 */
export class PrintClient {
    readonly name: string;
    private readonly queue: Pick<TaskQueue<PrintCommand>, 'put'>;
    private original?: ConsoleMethods;

    constructor(name: string, queue: Pick<TaskQueue<PrintCommand>, 'put'>) {
        if (!name)
            throw new MkflowError('Print client name must not be empty.');
        this.name = name;
        this.queue = queue;
    }

    /**
     * Sends `values` formatted like `console.log` does.
     */
    print(...values: unknown[]): void {
        this.send(util.format(...values));
    }

    send(message: string): void {
        this.queue.put({
            clientName: this.name,
            message,
        });
    }

    attach(): void {
        if (this.original)
            return;
        this.original = {
            error: console.error,
            info: console.info,
            log: console.log,
            warn: console.warn,
        };
        const print = (...values: unknown[]): void => this.print(...values);
        console.error = print;
        console.info = print;
        console.log = print;
        console.warn = print;
    }

    detach(): void {
        if (!this.original)
            return;
        console.error = this.original.error;
        console.info = this.original.info;
        console.log = this.original.log;
        console.warn = this.original.warn;
        this.original = undefined;
    }
}

/**
 * Writes the commands of its queue as `[client] message` lines, in arrival order.
 */
export class PrintServer {
    private readonly queue: AsyncQueue<PrintCommand>;
    private readonly progress: Progress;
    private serving?: Promise<void>;

    constructor(queue: AsyncQueue<PrintCommand>, progress: Progress) {
        this.queue = queue;
        this.progress = progress;
    }

    start(): void {
        if (this.serving)
            return;
        this.serving = this.serve();
    }

    /**
     * Writes everything queued so far, then stops.
     */
    async stop(): Promise<void> {
        if (!this.serving)
            return;
        this.queue.put(EXIT_PRINT_COMMAND);
        const serving = this.serving;
        this.serving = undefined;
        await serving;
    }

    createClient(clientName: string): PrintClient {
        return new PrintClient(clientName, this.queue);
    }

    private async serve(): Promise<void> {
        while (true) {
            const command = await this.queue.get();
            if (isExitPrintCommand(command))
                return;
            this.progress.write(`[${command.clientName}] ${command.message}\n`);
        }
    }
}

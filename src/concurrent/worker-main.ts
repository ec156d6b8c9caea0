/**
 * @module
 * Entry point of the worker processes forked by {@link TaskWorker}.
 *
 * Lifecycle:
 *   1. Receive `init` → load the build file into a new context → send `ready`
 *   2. Send `pull`, receive `command` → run the target → send `result`
 *   3. On the exit command → `push` it back → exit
 */
import {
    BuildContext,
} from '../context';
import {
    formatErrorChain,
} from '../errors';
import {
    loadBuildfile,
} from '../loader';
import {
    ControllerMessage,
    controllerMessageSchema,
    TaskCommand,
    toErrorInfo,
    toReport,
    WorkerMessage,
} from './messages';
import {
    PrintClient,
} from './printer';
import {
    AsyncQueue,
    TaskQueue,
} from './queue';
import {
    serveRequests,
} from './worker';

type InitMessage = Extract<ControllerMessage, { type: 'init' }>;

let pendingSends = 0;
let onDrained: (() => void) | undefined;
let sendFailed = false;

function send(message: WorkerMessage): void {
    if (!process.send)
        throw new Error('no IPC channel');
    pendingSends++;
    process.send(message, undefined, undefined, (error: Error | null) => {
        if (error)
            sendFailed = true;
        pendingSends--;
        if (pendingSends === 0 && onDrained)
            onDrained();
    });
}

/**
 * Waits until every message has been handed to the dispatcher.
 */
function flush(): Promise<void> {
    return new Promise<void>(resolve => {
        if (pendingSends === 0)
            resolve();
        else
            onDrained = resolve;
    });
}

/**
 * The dispatcher's request queue, seen from the worker.
 */
class RemoteRequestQueue implements TaskQueue<TaskCommand> {
    private readonly commands: AsyncQueue<TaskCommand>;

    constructor() {
        this.commands = new AsyncQueue();
    }

    get(): Promise<TaskCommand> {
        send({ type: 'pull' });
        return this.commands.get();
    }

    put(command: TaskCommand): void {
        send({
            command,
            type: 'push',
        });
    }

    /** Hands over a command received from the dispatcher. */
    deliver(command: TaskCommand): void {
        this.commands.put(command);
    }
}

async function serve(init: InitMessage, requests: RemoteRequestQueue): Promise<number> {
    const context = new BuildContext();
    try {
        await loadBuildfile(context, init.buildfile);
        context.confirm(init.config);
    } catch (error) {
        send({
            error: toErrorInfo(error),
            type: 'failed',
        });
        return 1;
    }

    const client = new PrintClient(init.clientName, {
        put: command => send({ command, type: 'print' }),
    });
    client.attach();
    send({ type: 'ready' });
    try {
        await serveRequests(context.registry, requests, {
            put: result => send({ report: toReport(result), type: 'result' }),
        }, {
            print: (...values) => client.print(...values),
            verbose: init.verbose,
        });
    } finally {
        client.detach();
    }
    return 0;
}

async function exit(code: number): Promise<never> {
    await flush();
    process.exit(sendFailed ? 1 : code);
}

function main(): void {
    const requests = new RemoteRequestQueue();
    let initialized = false;

    process.on('message', (raw: unknown) => {
        const parsed = controllerMessageSchema.safeParse(raw);
        if (!parsed.success) {
            process.stderr.write(`[worker] malformed message: ${parsed.error.message}\n`);
            return;
        }
        const message = parsed.data;
        if (message.type === 'command') {
            requests.deliver(message.command);
            return;
        }
        if (initialized)
            return;
        initialized = true;
        serve(message, requests)
            .catch((error: unknown) => {
                process.stderr.write(`${formatErrorChain(error)}\n`);
                return 1;
            })
            .then(exit);
    });
}

main();

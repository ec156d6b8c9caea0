/**
 * @module
 * Command line interface.
 */
import {
    ConcurrentTaskRunner,
} from './concurrent/runner';
import {
    BuildContext,
} from './context';
import {
    MkflowError,
} from './errors';
import {
    loadBuildfile,
} from './loader';
import {
    createProgress,
    Progress,
} from './progress';
import {
    Runner,
    TaskRunner,
} from './runner';
import {
    filePath,
    formatName,
    hasHelp,
    isPathName,
    Task,
    TaskName,
} from './task';
import {
    Command,
} from 'commander';
import z = require('zod');
import manifest = require('../package.json');

export const VERSION: string = manifest.version;

const optionsSchema = z.object({
    alltasks: z.boolean().optional(),
    file: z.string().optional(),
    jobs: z.coerce.number().int().nonnegative().optional(),
    tasks: z.boolean().optional(),
    verbose: z.boolean().optional(),
});

/**
 * What the command line asks for.
 */
export interface CliSettings {
    /** Build file; searched for from the working directory when omitted. */
    buildfile?: string;
    /** Show configuration items and tasks instead of running anything. */
    showTasks: boolean;
    /** Include tasks without a description when showing tasks. */
    showAll: boolean;
    /** Number of worker processes; tasks run in this process when below 2. */
    jobs?: number;
    verbose: boolean;
    /** Configuration values, `name=value` on the command line. */
    config: Record<string, string>;
    targets: string[];
}

/**
 * Splits positional arguments into configuration values and targets,
 * and validates the options.
 */
export function parseArguments(args: readonly string[], options: unknown): CliSettings {
    const parsed = optionsSchema.parse(options);
    const config: Record<string, string> = {};
    const targets: string[] = [];
    for (const arg of args) {
        const eq = arg.indexOf('=');
        if (eq >= 0)
            config[arg.slice(0, eq)] = arg.slice(eq + 1);
        else
            targets.push(arg);
    }
    return {
        buildfile: parsed.file,
        config,
        jobs: parsed.jobs,
        showAll: parsed.alltasks || false,
        showTasks: parsed.tasks || parsed.alltasks || false,
        targets,
        verbose: parsed.verbose || false,
    };
}

/**
 * Loads the build file and runs what the command line asks for.
 */
export class Cli {
    private readonly context: BuildContext;
    private readonly settings: CliSettings;
    private readonly progress: Progress;

    constructor(context: BuildContext, settings: CliSettings, progress: Progress) {
        this.context = context;
        this.settings = settings;
        this.progress = progress;
    }

    async run(): Promise<void> {
        await loadBuildfile(this.context, this.settings.buildfile);

        if (this.settings.showTasks) {
            this.showConfigItems();
            this.showTasks();
            return;
        }

        this.context.confirm(this.settings.config);
        const targets = this.settings.targets.length > 0 ? this.settings.targets : [this.defaultTarget()];
        const targetsToRun = targets.map(target => this.resolveTarget(target));
        await this.createRunner().run(targetsToRun);
    }

    private defaultTarget(): string {
        const name = this.context.registry.defaultTaskName;
        if (name === undefined)
            throw new MkflowError('No target is specified.');
        return name;
    }

    /**
     * Finds `target` as a task name, or else as a path relative to the working directory.
     */
    private resolveTarget(target: string): TaskName {
        const registry = this.context.registry;
        if (registry.find(target))
            return target;
        const targetPath = filePath(target);
        if (registry.find(targetPath))
            return targetPath;
        throw new MkflowError(`Unknown target '${target}' is specified.`);
    }

    private createRunner(): Runner {
        const jobs = this.settings.jobs;
        if (jobs === undefined || jobs < 2) {
            return new TaskRunner(this.context.registry, {
                progress: this.progress,
                verbose: this.settings.verbose,
            });
        }
        return ConcurrentTaskRunner.create(this.context, {
            jobs,
            progress: this.progress,
            verbose: this.settings.verbose,
        });
    }

    private showConfigItems(): void {
        this.progress.write('Configuration items:\n');
        const items = this.context.configRegistry.getAllItems();
        if (items.length === 0) {
            this.progress.write('  (None)\n');
            return;
        }

        const width = Math.max(...items.map(item => item.name.length)) + 2;
        const sorted = [...items].sort((a, b) => compareStrings(a.name, b.name));
        for (const item of sorted)
            this.progress.write(`  ${item.name.padEnd(width)}# ${item.help} (default: ${String(item.defaultValue)})\n`);
    }

    private showTasks(): void {
        this.progress.write('Tasks:\n');
        const registry = this.context.registry;
        const tasks = this.settings.showAll ? registry.getAll() : registry.getAllWithHelp();

        const width = Math.max(0, ...tasks.filter(hasHelp).map(task => formatName(task.name).length)) + 2;
        const sorted = [...tasks].sort((a, b) =>
            (taskPriority(a) - taskPriority(b)) || compareStrings(formatName(a.name), formatName(b.name)));
        for (const task of sorted) {
            const name = formatName(task.name);
            if (task.help !== undefined)
                this.progress.write(`  ${name.padEnd(width)}# ${task.help}\n`);
            else if (isPathName(task.name))
                this.progress.write(`  (Path) ${name}\n`);
            else
                this.progress.write(`  ${name}\n`);
        }
    }
}

/**
 * Described tasks first, then other symbolic tasks, then file tasks.
 */
function taskPriority(task: Task): number {
    if (hasHelp(task))
        return 0;
    return isPathName(task.name) ? 2 : 1;
}

function compareStrings(a: string, b: string): number {
    if (a < b)
        return -1;
    return a > b ? 1 : 0;
}

/**
 * Creates the `mkflow` command.
 */
export function createProgram(progress: Progress = createProgress()): Command {
    const program = new Command();
    program
        .name('mkflow')
        .description('A make-like task runner.')
        .version(VERSION)
        .option('-f, --file <file>', 'use FILE as the build file')
        .option('-t, --tasks', 'show config items and tasks, and exit')
        .option('-T, --alltasks', 'show config items and all tasks (including no description), and exit')
        .option('-j, --jobs <n>', 'execute tasks concurrently with N workers')
        .option('-v, --verbose', 'show task name at running')
        .argument('[config=value | target...]', 'configuration values and targets to run')
        .action(async (args: string[]) => {
            const settings = parseArguments(args, program.opts());
            await new Cli(new BuildContext(), settings, progress).run();
        });
    return program;
}

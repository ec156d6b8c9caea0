/**
 * @module
 * Catalog of the tasks known to a process.
 */
import {
    DuplicateRegistrationError,
} from './errors';
import {
    hasHelp,
    nameKey,
    Task,
    TaskName,
} from './task';

/**
 * Tasks keyed by name, plus the task run when no target is given.
 */
export class Registry {
    /** Task run when no target is specified. */
    defaultTaskName?: string;
    private readonly tasks: Map<string, Task>;

    constructor() {
        this.tasks = new Map();
    }

    get size(): number {
        return this.tasks.size;
    }

    register(task: Task): void {
        const key = nameKey(task.name);
        if (this.tasks.has(key))
            throw new DuplicateRegistrationError(task.name);
        this.tasks.set(key, task);
    }

    find(name: TaskName): Task | undefined {
        return this.tasks.get(nameKey(name));
    }

    getAll(): Task[] {
        return Array.from(this.tasks.values());
    }

    getAllWithHelp(): Task[] {
        return this.getAll().filter(hasHelp);
    }
}

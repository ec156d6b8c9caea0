/**
 * @module
 * mkflow Public API
 */
export {
    CleanTaskBuilder,
    FileTaskBuilder,
    needsUpdate,
    TaskBuilder,
} from './builder';
export type {
    ProcedureBuilder,
} from './builder';
export {
    Cli,
    createProgram,
    parseArguments,
} from './cli';
export type {
    CliSettings,
} from './cli';
export {
    ConcurrentTaskRunner,
} from './concurrent/runner';
export type {
    ConcurrentRunnerOptions,
} from './concurrent/runner';
export {
    Config,
    ConfigRegistry,
    ConfigValue,
} from './config';
export type {
    ConfigItem,
    Converter,
} from './config';
export {
    BuildContext,
} from './context';
export {
    BuildDefinition,
    TaskDeclaration,
} from './definition';
export type {
    CleanOptions,
} from './definition';
export {
    BuildfileError,
    CircularDependencyError,
    ConfigError,
    DuplicateRegistrationError,
    formatErrorChain,
    MkflowError,
    NotFoundError,
    TaskExecutionError,
    WorkerError,
} from './errors';
export type {
    TargetError,
} from './errors';
export {
    loadBuildfile,
    searchBuildfile,
} from './loader';
export type {
    DefineFunction,
} from './loader';
export {
    createProgress,
} from './progress';
export type {
    Progress,
} from './progress';
export {
    Registry,
} from './registry';
export {
    resolveOrder,
    TaskRunner,
} from './runner';
export type {
    Runner,
    RunnerOptions,
} from './runner';
export {
    filePath,
    formatName,
    isPathName,
    nameKey,
} from './task';
export type {
    PathName,
    Task,
    TaskName,
    TaskProcedure,
} from './task';

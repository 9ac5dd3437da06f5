/**
 * Configuration and deployment types
 */

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigSection;

export interface ConfigSection {
    [key: string]: ConfigValue;
}

/**
 * Schema keys are glob patterns (`?`, `*`, `[abc]`, `[!abc]`) matched against config keys.
 * A string value names the required type of every matching entry; a nested schema
 * requires a mapping and is applied to each match.
 */
export interface ConfigSchema {
    [pattern: string]: SchemaRequirement;
}

export type SchemaRequirement = string | ConfigSchema;

/**
 * Contributes schema fragments and factory defaults; merged by top-level key.
 */
export interface ConfigHandler {
    getConfigSchema(): ConfigSchema;
    getFactoryDefaults(): ConfigSection;
}

export interface ConfigManagerOptions {
    /** Defaults to config.json */
    configFilename?: string;
    /** Write factory defaults when the default config file is missing */
    createMissingFiles?: boolean;
    baseSchema?: ConfigSchema;
    factoryDefaults?: ConfigSection;
}

/**
 * Typed view of the `global` section
 */
export interface GlobalSettings {
    environmentName: string;
    output: string;
    printDebug: boolean;
}

/**
 * Typed view of the `template` section
 */
export interface TemplateSettings {
    description: string;
    templateBucket: string;
    s3TemplatePrefix: string;
    templateUploadAcl: string;
    timeoutInMinutes: number;
    ec2KeyDefault: string;
    utilityBucket?: string;
}

export interface NetworkSettings {
    azCount: number;
    subnetTypes: string[];
}

export type DeploymentAction = 'updated' | 'created' | 'unchanged';

export interface DeploymentOptions {
    /** create-stack timeout, default 60 */
    timeoutInMinutes?: number;
    /** default ['CAPABILITY_IAM'] */
    capabilities?: string[];
}

export interface DeploymentResult {
    stackName: string;
    action: DeploymentAction;
    stackId?: string;
    monitor?: MonitorResult;
    duration: number;
}

export type MonitorState = 'Polling' | 'Draining' | 'Terminated' | 'TimedOut' | 'Aborted';

export type MonitorExitReason = 'stack-terminal' | 'handlers-satisfied' | 'timeout' | 'aborted';

export interface MonitorResult {
    state: MonitorState;
    reason: MonitorExitReason;
    eventsProcessed: number;
    /** Status of the target stack's terminal event, when one was seen */
    finalStatus?: string;
    elapsedMs: number;
}

export interface MonitorOptions {
    /** Give up after this many seconds, default 3600 */
    timeoutSeconds?: number;
    /** Long-poll wait per receive, default 5 */
    waitSeconds?: number;
    /** Messages per receive, default 10 */
    batchSize?: number;
    /** Log every parsed event at info level */
    printEvents?: boolean;
    /** Clock in milliseconds; tests substitute their own */
    now?: () => number;
}

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import factorySchema from '../resources/config-schema.json';
import factoryConfig from '../resources/factory-config.json';
import { ConfigValidator, isConfigSection } from './config-validator';
import {
    ConfigHandler,
    ConfigManagerOptions,
    ConfigSchema,
    ConfigSection,
    ConfigValue,
    GlobalSettings,
    NetworkSettings,
    TemplateSettings
} from './types';
import {
    ConfigLoadError,
    ConfigValidationError,
    HandlerRegistrationError
} from '../components/shared/utils/error-handling';
import { ComponentLogger } from '../components/shared/utils/logging';

export const DEFAULT_CONFIG_FILENAME = 'config.json';

/**
 * Base requirements every config must meet. Always copied before use.
 */
export const CONFIG_REQUIREMENTS: ConfigSchema = factorySchema;

export const FACTORY_DEFAULT_CONFIG: ConfigSection = factoryConfig;

function describeHandler(candidate: unknown): string {
    if (typeof candidate === 'object' && candidate !== null) {
        return candidate.constructor?.name || 'Object';
    }
    return typeof candidate;
}

/**
 * Fail fast when an object registered as a config handler lacks either capability
 */
export function assertConfigHandler(candidate: unknown): asserts candidate is ConfigHandler {
    const name = describeHandler(candidate);
    if (typeof candidate !== 'object' || candidate === null) {
        throw new HandlerRegistrationError('config handler', name, 'getFactoryDefaults');
    }
    if (!('getFactoryDefaults' in candidate) || typeof candidate.getFactoryDefaults !== 'function') {
        throw new HandlerRegistrationError('config handler', name, 'getFactoryDefaults');
    }
    if (!('getConfigSchema' in candidate) || typeof candidate.getConfigSchema !== 'function') {
        throw new HandlerRegistrationError('config handler', name, 'getConfigSchema');
    }
}

function sortKeys(value: ConfigValue): ConfigValue {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (typeof value === 'object' && value !== null) {
        const sorted: ConfigSection = {};
        for (const key of Object.keys(value).sort()) {
            sorted[key] = sortKeys(value[key]);
        }
        return sorted;
    }
    return value;
}

const isYamlFile = (filename: string): boolean => /\.ya?ml$/i.test(filename);

/**
 * Loads, validates and persists the environment configuration
 */
export class ConfigManager {
    public readonly configFilename: string;
    public readonly createMissingFiles: boolean;
    private readonly baseSchema: ConfigSchema;
    private readonly factoryDefaults: ConfigSection;
    private readonly handlers: ConfigHandler[] = [];
    private readonly validator = new ConfigValidator();
    private readonly logger: ComponentLogger;

    constructor(options: ConfigManagerOptions = {}, logger?: ComponentLogger) {
        this.configFilename = options.configFilename ?? DEFAULT_CONFIG_FILENAME;
        this.createMissingFiles = options.createMissingFiles ?? true;
        this.baseSchema = structuredClone(options.baseSchema ?? CONFIG_REQUIREMENTS);
        this.factoryDefaults = structuredClone(options.factoryDefaults ?? FACTORY_DEFAULT_CONFIG);
        this.logger = logger ?? new ComponentLogger('ConfigManager', this.configFilename);
    }

    /**
     * Register a handler that augments the configuration defaults and validation schema
     */
    public addConfigHandler(handler: ConfigHandler): void {
        assertConfigHandler(handler);
        this.handlers.push(handler);
    }

    public getHandlers(): readonly ConfigHandler[] {
        return this.handlers;
    }

    /**
     * Base schema with every handler fragment merged in by top-level key, later handlers winning
     */
    public getSchema(): ConfigSchema {
        const schema = structuredClone(this.baseSchema);
        for (const handler of this.handlers) {
            Object.assign(schema, structuredClone(handler.getConfigSchema()));
        }
        return schema;
    }

    /**
     * Factory defaults with every handler's defaults merged in by top-level key
     */
    public getFactoryDefaults(): ConfigSection {
        const defaults = structuredClone(this.factoryDefaults);
        for (const handler of this.handlers) {
            Object.assign(defaults, structuredClone(handler.getFactoryDefaults()));
        }
        return defaults;
    }

    /**
     * Validate a config tree against the merged schema
     */
    public validate(config: ConfigSection): void {
        this.logger.validationStart('config');
        try {
            this.validator.validate(this.getSchema(), config, '');
        } catch (error) {
            if (error instanceof ConfigValidationError) {
                this.logger.validationFailure('config', error, { path: error.path });
            }
            throw error;
        }
        this.logger.validationSuccess('config');
    }

    /**
     * Use the supplied config, else the config file, else write factory defaults to the
     * default config file (when allowed). The result is always validated.
     */
    public load(override?: ConfigSection): ConfigSection {
        let config: ConfigSection;

        if (override) {
            config = override;
        } else if (fs.existsSync(this.configFilename)) {
            config = this.readConfigFile(this.configFilename);
        } else if (this.createMissingFiles && this.configFilename === DEFAULT_CONFIG_FILENAME) {
            config = this.getFactoryDefaults();
            this.save(config, this.configFilename);
            this.logger.info(`Wrote factory default configuration to ${this.configFilename}`);
        } else {
            throw new ConfigLoadError(this.configFilename, 'could not be found');
        }

        this.validate(config);
        return config;
    }

    /**
     * Save configuration as sorted JSON, or YAML for .yaml/.yml files
     */
    public save(config: ConfigSection, outputPath: string): void {
        try {
            const sorted = sortKeys(config);
            const content = isYamlFile(outputPath)
                ? yaml.dump(sorted, { indent: 2, lineWidth: 120, noRefs: true })
                : `${JSON.stringify(sorted, null, 4)}\n`;

            const dir = path.dirname(outputPath);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }

            fs.writeFileSync(outputPath, content, 'utf8');
        } catch (error) {
            throw new ConfigLoadError(outputPath, 'could not be written', error);
        }
    }

    /**
     * For each subsection of `sectionLabel`, replace `configKey` with the environment variable
     * `<SUBSECTION>_<KEY>` (upper-cased) when it is set. Mutates `config`; returns the variables applied.
     *
     * e.g. db.proddb.password <- PRODDB_PASSWORD
     */
    public updateFromEnvironment(
        config: ConfigSection,
        sectionLabel: string,
        configKey: string,
        env: NodeJS.ProcessEnv = process.env
    ): string[] {
        const section = config[sectionLabel];
        if (!isConfigSection(section)) {
            throw new ConfigValidationError(sectionLabel, `No config section ${sectionLabel} found`);
        }

        const applied: string[] = [];
        for (const [subsectionLabel, subsection] of Object.entries(section)) {
            if (!isConfigSection(subsection)) {
                continue;
            }

            const envName = `${subsectionLabel}_${configKey}`.toUpperCase();
            const envValue = env[envName];

            if (envValue) {
                subsection[configKey] = envValue;
                applied.push(envName);
                this.logger.debug(`${sectionLabel}.${subsectionLabel}.${configKey} updated from ${envName}`);
            } else {
                this.logger.debug(`${sectionLabel}.${subsectionLabel}.${configKey} not updated since '${envName}' not found`);
            }
        }

        return applied;
    }

    public loadDbPasswordsFromEnv(config: ConfigSection, env: NodeJS.ProcessEnv = process.env): string[] {
        return this.updateFromEnvironment(config, 'db', 'password', env);
    }

    public static getGlobals(config: ConfigSection): GlobalSettings {
        const globals = readSection(config, 'global');
        return {
            environmentName: readString(globals, 'environment_name', 'global'),
            output: readString(globals, 'output', 'global'),
            printDebug: readBoolean(globals, 'print_debug', 'global'),
        };
    }

    public static getTemplateSettings(config: ConfigSection): TemplateSettings {
        const template = readSection(config, 'template');
        const utilityBucket = readOptionalString(template, 'utility_bucket', 'template');
        return {
            description: readOptionalString(template, 'description', 'template') ?? 'No Description Specified',
            templateBucket: readString(template, 'template_bucket', 'template'),
            s3TemplatePrefix: readString(template, 's3_template_prefix', 'template'),
            templateUploadAcl: readString(template, 'template_upload_acl', 'template'),
            timeoutInMinutes: readOptionalInteger(template, 'timeout_in_minutes', 'template') ?? 60,
            ec2KeyDefault: readOptionalString(template, 'ec2_key_default', 'template') ?? 'default-key',
            utilityBucket: utilityBucket === '' ? undefined : utilityBucket,
        };
    }

    public static getNetworkSettings(config: ConfigSection): NetworkSettings {
        const network = readSection(config, 'network');
        return {
            azCount: readInteger(network, 'az_count', 'network'),
            subnetTypes: readStringList(network, 'subnet_types', 'network'),
        };
    }

    private readConfigFile(filename: string): ConfigSection {
        const content = fs.readFileSync(filename, 'utf8');
        let parsed: unknown;

        try {
            parsed = this.parseContent(filename, content);
        } catch (error) {
            this.logger.error(`${filename} could not be parsed`, error instanceof Error ? error : undefined);
            throw new ConfigLoadError(filename, 'could not be parsed', error);
        }

        if (!isConfigSection(parsed)) {
            throw new ConfigLoadError(filename, 'must contain a mapping at the top level');
        }
        return parsed;
    }

    private parseContent(filename: string, content: string): unknown {
        if (!isYamlFile(filename)) {
            try {
                return JSON.parse(content);
            } catch (jsonError) {
                // JSON with comments; YAML reads it as a flow mapping
                this.logger.debug(`${filename} is not plain JSON, reading it as YAML: ${String(jsonError)}`);
            }
        }
        return yaml.load(content, { filename });
    }
}

function at(scope: string, key: string): string {
    return scope === '' ? key : `${scope}.${key}`;
}

export function readSection(config: ConfigSection, name: string, scope: string = ''): ConfigSection {
    const value = config[name];
    if (!isConfigSection(value)) {
        throw new ConfigValidationError(at(scope, name), `Config file missing section ${at(scope, name)}`);
    }
    return value;
}

export function readOptionalString(section: ConfigSection, key: string, scope: string): string | undefined {
    const value = section[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new ConfigValidationError(at(scope, key), `Type mismatch in config, ${at(scope, key)} should be of type string`);
    }
    return value;
}

export function readString(section: ConfigSection, key: string, scope: string): string {
    const value = readOptionalString(section, key, scope);
    if (value === undefined) {
        throw new ConfigValidationError(at(scope, key), `Config file missing section ${at(scope, key)}`);
    }
    return value;
}

export function readOptionalInteger(section: ConfigSection, key: string, scope: string): number | undefined {
    const value = section[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new ConfigValidationError(at(scope, key), `Type mismatch in config, ${at(scope, key)} should be of type integer`);
    }
    return value;
}

export function readInteger(section: ConfigSection, key: string, scope: string): number {
    const value = readOptionalInteger(section, key, scope);
    if (value === undefined) {
        throw new ConfigValidationError(at(scope, key), `Config file missing section ${at(scope, key)}`);
    }
    return value;
}

export function readBoolean(section: ConfigSection, key: string, scope: string): boolean {
    const value = section[key];
    if (typeof value !== 'boolean') {
        throw new ConfigValidationError(at(scope, key), `Type mismatch in config, ${at(scope, key)} should be of type boolean`);
    }
    return value;
}

export function readStringList(section: ConfigSection, key: string, scope: string): string[] {
    const value = section[key];
    if (!Array.isArray(value)) {
        throw new ConfigValidationError(at(scope, key), `Type mismatch in config, ${at(scope, key)} should be of type list`);
    }
    return value.map((item, index) => {
        if (typeof item !== 'string') {
            throw new ConfigValidationError(`${at(scope, key)}[${index}]`, `Type mismatch in config, ${at(scope, key)} entries should be strings`);
        }
        return item;
    });
}

import { minimatch } from 'minimatch';
import { ConfigSchema, ConfigSection, ConfigValue, SchemaRequirement } from './types';
import { ConfigValidationError } from '../components/shared/utils/error-handling';

type TypeCheck = (value: ConfigValue) => boolean;

const isMapping = (value: ConfigValue): value is ConfigSection =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const TYPE_CHECKS: Record<string, TypeCheck> = {
    string: value => typeof value === 'string',
    integer: value => typeof value === 'number' && Number.isInteger(value),
    number: value => typeof value === 'number',
    boolean: value => typeof value === 'boolean',
    list: value => Array.isArray(value),
    mapping: isMapping,
};

const TYPE_ALIASES: Record<string, string> = {
    str: 'string',
    basestring: 'string',
    int: 'integer',
    float: 'number',
    bool: 'boolean',
    array: 'list',
    dict: 'mapping',
    object: 'mapping',
};

const GLOB_OPTIONS = {
    dot: true,
    nocomment: true,
    nonegate: true,
    nobrace: true,
    noext: true,
    noglobstar: true,
    platform: 'linux',
} as const;

// minimatch reads `/` as a path separator and `\` as an escape; config keys have neither
const SEPARATOR_STAND_INS: [RegExp, string][] = [
    [/\//g, '\uE000'],
    [/\\/g, '\uE001'],
];

function asSingleSegment(value: string): string {
    return SEPARATOR_STAND_INS.reduce((result, [separator, standIn]) => result.replace(separator, standIn), value);
}

/**
 * Glob match of a schema key against a config key (`?`, `*`, `[abc]`, `[!abc]`)
 */
export function matchesKey(candidate: string, pattern: string): boolean {
    return minimatch(asSingleSegment(candidate), asSingleSegment(pattern), GLOB_OPTIONS);
}

/**
 * Name used in error messages for a config value's runtime type
 */
export function describeType(value: ConfigValue): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'list';
    if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
    if (typeof value === 'object') return 'mapping';
    return typeof value;
}

export function isConfigSection(value: unknown): value is ConfigSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && Object.values(value).every(isConfigValue);
}

export function isConfigValue(value: unknown): value is ConfigValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isConfigValue);
    }
    return isConfigSection(value);
}

function joinPath(path: string, key: string): string {
    return path === '' ? key : `${path}.${key}`;
}

/**
 * Recursive schema matcher. Fails with ConfigValidationError on the first violation.
 */
export class ConfigValidator {
    public validate(schema: ConfigSchema, config: ConfigSection, path: string = ''): void {
        for (const [pattern, requirement] of Object.entries(schema)) {
            // Parametrised keys (e.g. every database under `db`) may match several entries
            const matches = Object.keys(config).filter(key => matchesKey(key, pattern));

            if (matches.length === 0) {
                const missing = joinPath(path, pattern);
                throw new ConfigValidationError(missing, `Config file missing section ${missing}`);
            }

            for (const key of matches) {
                this.validateEntry(requirement, config[key], joinPath(path, key));
            }
        }
    }

    private validateEntry(requirement: SchemaRequirement, value: ConfigValue, path: string): void {
        if (typeof requirement === 'string') {
            const typeName = TYPE_ALIASES[requirement] ?? requirement;
            const check = TYPE_CHECKS[typeName];

            if (!check) {
                throw new ConfigValidationError(path, `Unknown type '${requirement}' required for ${path}`);
            }
            if (!check(value)) {
                throw new ConfigValidationError(
                    path,
                    `Type mismatch in config, ${path} should be of type ${requirement}, not ${describeType(value)}`
                );
            }
            return;
        }

        if (!isMapping(value)) {
            throw new ConfigValidationError(path, `Type mismatch in config, ${path} should be a mapping, not ${describeType(value)}`);
        }

        this.validate(requirement, value, path);
    }
}

import { ComponentLogger, DeploymentLogger } from "./logging";

/**
 * Base error for configuration, composition and deployment failures
 */
export class EnvironmentError extends Error {
    public readonly scope: string;
    public readonly errorCode: string;
    public readonly timestamp: Date;
    public readonly context?: Record<string, unknown>;

    constructor(
        scope: string,
        message: string,
        errorCode: string = 'ENVIRONMENT_ERROR',
        context?: Record<string, unknown>,
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'EnvironmentError';
        this.scope = scope;
        this.errorCode = errorCode;
        this.timestamp = new Date();
        this.context = context;
    }
}

/**
 * A configuration tree does not satisfy its schema
 */
export class ConfigValidationError extends EnvironmentError {
    public readonly path: string;
    public readonly reason: string;

    constructor(path: string, reason: string) {
        super('config', reason, 'CONFIG_VALIDATION_ERROR', { path });
        this.name = 'ConfigValidationError';
        this.path = path;
        this.reason = reason;
    }
}

/**
 * A configuration or data file could not be read or parsed
 */
export class ConfigLoadError extends EnvironmentError {
    public readonly filename: string;

    constructor(filename: string, message: string, cause?: unknown) {
        super('config', `${filename}: ${message}`, 'CONFIG_LOAD_ERROR', {
            filename
        }, cause);
        this.name = 'ConfigLoadError';
        this.filename = filename;
    }
}

export class HandlerRegistrationError extends EnvironmentError {
    public readonly handlerName: string;
    public readonly missingCapability: string;

    constructor(kind: string, handlerName: string, missingCapability: string) {
        super('handlers', `Class ${handlerName} cannot be a ${kind}, missing ${missingCapability}()`, 'HANDLER_REGISTRATION_ERROR', {
            kind,
            handlerName,
            missingCapability
        });
        this.name = 'HandlerRegistrationError';
        this.handlerName = handlerName;
        this.missingCapability = missingCapability;
    }
}

export class BindingResolutionError extends EnvironmentError {
    public readonly templateName: string;
    public readonly parameterName: string;

    constructor(templateName: string, parameterName: string, message: string) {
        super('composition', `Cannot bind parameter '${parameterName}' of template '${templateName}': ${message}`, 'BINDING_RESOLUTION_ERROR', {
            templateName,
            parameterName
        });
        this.name = 'BindingResolutionError';
        this.templateName = templateName;
        this.parameterName = parameterName;
    }
}

/**
 * Duplicate or malformed declarations in a template
 */
export class TemplateError extends EnvironmentError {
    public readonly templateName: string;

    constructor(templateName: string, message: string, context?: Record<string, unknown>) {
        super('template', `[${templateName}] ${message}`, 'TEMPLATE_ERROR', context);
        this.name = 'TemplateError';
        this.templateName = templateName;
    }
}

export type DeploymentPhase = 'update' | 'create' | 'delete' | 'channel' | 'monitor';

/**
 * A call to the orchestration API failed
 */
export class DeploymentApiError extends EnvironmentError {
    public readonly stackName: string;
    public readonly phase: DeploymentPhase;

    constructor(stackName: string, phase: DeploymentPhase, message: string, cause?: unknown) {
        super('deployment', `Stack '${stackName}' ${phase} failed: ${message}`, 'DEPLOYMENT_API_ERROR', {
            stackName,
            phase
        }, cause);
        this.name = 'DeploymentApiError';
        this.stackName = stackName;
        this.phase = phase;
    }
}

/**
 * Raised by a stack API when the named stack does not exist
 */
export class StackNotFoundError extends EnvironmentError {
    public readonly stackName: string;

    constructor(stackName: string, message?: string) {
        super('deployment', message ?? `Stack with id ${stackName} does not exist`, 'STACK_NOT_FOUND', { stackName });
        this.name = 'StackNotFoundError';
        this.stackName = stackName;
    }
}

/**
 * Raised by a stack API when an update would not change anything
 */
export class NoStackUpdatesError extends EnvironmentError {
    public readonly stackName: string;

    constructor(stackName: string) {
        super('deployment', `No updates are to be performed on stack '${stackName}'`, 'NO_STACK_UPDATES', { stackName });
        this.name = 'NoStackUpdatesError';
        this.stackName = stackName;
    }
}

/**
 * Monitoring was interrupted; the remote deployment keeps running
 */
export class MonitorAbortedError extends EnvironmentError {
    public readonly stackName: string;

    constructor(stackName: string) {
        super('monitor', `Monitoring of stack '${stackName}' was interrupted`, 'MONITOR_ABORTED', { stackName });
        this.name = 'MonitorAbortedError';
        this.stackName = stackName;
    }
}

export interface CleanupAction {
    name: string;
    run: () => Promise<void>;
}

export interface CleanupFailure {
    name: string;
    error: Error;
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Error handling helpers
 */
export class ErrorHandler {
    /**
     * Run every cleanup action in order, even when earlier ones fail.
     * Failures are logged as warnings and returned to the caller.
     */
    public static async executeCleanup(
        actions: CleanupAction[],
        logger: ComponentLogger | DeploymentLogger
    ): Promise<CleanupFailure[]> {
        const failures: CleanupFailure[] = [];

        for (const action of actions) {
            try {
                await action.run();
            } catch (cleanupError) {
                const error = toError(cleanupError);
                logger.warn(`Cleanup step '${action.name}' failed: ${error.message}`, {
                    operation: 'cleanup',
                    cleanupStep: action.name
                });
                failures.push({ name: action.name, error });
            }
        }

        return failures;
    }

    /**
     * One-line description for the operator
     */
    public static describe(error: unknown): string {
        if (error instanceof EnvironmentError) {
            return `${error.name} [${error.errorCode}]: ${error.message}`;
        }
        return toError(error).message;
    }
}

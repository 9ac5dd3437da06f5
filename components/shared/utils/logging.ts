import chalk from "chalk";

/**
 * Log levels for structured logging
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4
}

let levelOverride: LogLevel | undefined;

/**
 * Force a minimum log level for every logger, e.g. when `global.print_debug` is set.
 * Pass `undefined` to go back to the environment variable.
 */
export function setMinLogLevel(level: LogLevel | undefined): void {
    levelOverride = level;
}

/**
 * Get the minimum log level from the override or the ENVSTACK_LOG_LEVEL environment variable
 * Default is INFO to reduce verbosity
 */
export function getMinLogLevel(): LogLevel {
    if (levelOverride !== undefined) {
        return levelOverride;
    }

    const level = process.env.ENVSTACK_LOG_LEVEL?.toUpperCase();
    switch (level) {
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        case 'SILENT': return LogLevel.SILENT;
        default: return LogLevel.INFO;
    }
}

/**
 * Log context interface for structured logging
 */
export interface LogContext {
    componentType?: string;
    componentName?: string;
    operation?: string;
    stackName?: string;
    templateName?: string;
    parameterName?: string;
    timestamp?: string;
    duration?: number;
    [key: string]: unknown;
}

/**
 * Destination for formatted log lines
 */
export interface LogSink {
    write(level: LogLevel, line: string): void;
}

/**
 * Writes to the console, coloured by level
 */
export class ConsoleSink implements LogSink {
    public write(level: LogLevel, line: string): void {
        switch (level) {
            case LogLevel.DEBUG:
                console.log(chalk.gray(line));
                break;
            case LogLevel.INFO:
                console.log(line);
                break;
            case LogLevel.WARN:
                console.warn(chalk.yellow(line));
                break;
            case LogLevel.ERROR:
                console.error(chalk.red(line));
                break;
        }
    }
}

/**
 * Keeps every line in memory; handy for tests and for printing a transcript afterwards
 */
export class MemorySink implements LogSink {
    public readonly lines: Array<{ level: LogLevel; line: string }> = [];

    public write(level: LogLevel, line: string): void {
        this.lines.push({ level, line });
    }

    public messages(level?: LogLevel): string[] {
        return this.lines
            .filter(entry => level === undefined || entry.level === level)
            .map(entry => entry.line);
    }
}

let defaultSink: LogSink = new ConsoleSink();

export function setDefaultLogSink(sink: LogSink): void {
    defaultSink = sink;
}

function serializeError(error: Error): LogContext {
    return {
        error: {
            name: error.name,
            message: error.message,
            stack: error.stack
        }
    };
}

function emit(sink: LogSink, level: LogLevel, message: string, baseContext: LogContext, context?: LogContext): void {
    const minLevel = getMinLogLevel();
    if (level < minLevel) {
        return;
    }

    // Only include context in DEBUG mode or for ERROR level
    const includeContext = minLevel === LogLevel.DEBUG || level === LogLevel.ERROR;
    let contextString = '';

    if (includeContext && context) {
        const fullContext = {
            ...baseContext,
            timestamp: new Date().toISOString(),
            ...context
        };
        contextString = ` | Context: ${JSON.stringify(fullContext)}`;
    }

    const prefix = level === LogLevel.DEBUG ? 'DEBUG: ' : '';
    sink.write(level, `${prefix}${message}${contextString}`);
}

/**
 * Structured logger for configuration and template composition
 */
export class ComponentLogger {
    private readonly componentType: string;
    private readonly componentName: string;
    private readonly baseContext: LogContext;
    private readonly sink?: LogSink;

    constructor(componentType: string, componentName: string, additionalContext?: LogContext, sink?: LogSink) {
        this.componentType = componentType;
        this.componentName = componentName;
        this.sink = sink;
        this.baseContext = {
            componentType,
            componentName,
            ...additionalContext
        };
    }

    public debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    public error(message: string, error?: Error, context?: LogContext): void {
        const errorContext = error ? serializeError(error) : {};
        this.log(LogLevel.ERROR, message, { ...errorContext, ...context });
    }

    /**
     * Log validation start
     */
    public validationStart(operation: string, context?: LogContext): void {
        this.debug(`Starting validation: ${operation}`, {
            operation: `validation_${operation}`,
            ...context
        });
    }

    /**
     * Log validation success
     */
    public validationSuccess(operation: string, context?: LogContext): void {
        this.debug(`Validation successful: ${operation}`, {
            operation: `validation_${operation}_success`,
            ...context
        });
    }

    /**
     * Log validation failure
     */
    public validationFailure(operation: string, error: Error, context?: LogContext): void {
        this.warn(`Validation failed: ${operation}`, {
            operation: `validation_${operation}_failure`,
            error: {
                name: error.name,
                message: error.message
            },
            ...context
        });
    }

    /**
     * Log how a child template parameter got its value
     */
    public parameterBinding(templateName: string, parameterName: string, source: string, context?: LogContext): void {
        this.debug(`Bound ${templateName}.${parameterName} from ${source}`, {
            operation: 'parameter_binding',
            templateName,
            parameterName,
            bindingSource: source,
            ...context
        });
    }

    /**
     * Log operation timing
     */
    public operationTiming(operation: string, duration: number, context?: LogContext): void {
        this.info(`Operation completed: ${operation} (${duration}ms)`, {
            operation,
            duration,
            ...context
        });
    }

    /**
     * Create a child logger for a specific operation
     */
    public forOperation(operation: string): ComponentLogger {
        return new ComponentLogger(this.componentType, this.componentName, {
            ...this.baseContext,
            operation
        }, this.sink);
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        emit(this.sink ?? defaultSink, level, `[${this.componentType}:${this.componentName}] ${message}`, this.baseContext, context);
    }
}

/**
 * Deployment logger for stack operations and event monitoring
 */
export class DeploymentLogger {
    public readonly deploymentName: string;
    private readonly baseContext: LogContext;
    private readonly sink?: LogSink;

    constructor(deploymentName: string, additionalContext?: LogContext, sink?: LogSink) {
        this.deploymentName = deploymentName;
        this.sink = sink;
        this.baseContext = {
            deploymentName,
            ...additionalContext
        };
    }

    /**
     * Log stack deployment start
     */
    public stackDeploymentStart(stackName: string, action: 'update' | 'create' | 'delete'): void {
        this.log(LogLevel.INFO, `📦 ${action === 'delete' ? 'Deleting' : action === 'create' ? 'Creating' : 'Updating'} stack '${stackName}' ...`, {
            operation: `stack_${action}_start`,
            stackName
        });
    }

    /**
     * Log stack deployment success
     */
    public stackDeploymentSuccess(stackName: string, action: 'update' | 'create' | 'delete' | 'unchanged'): void {
        this.log(LogLevel.INFO, `✅ Stack ${action === 'unchanged' ? 'already up to date' : `${action} accepted`}: ${stackName}`, {
            operation: `stack_${action}_success`,
            stackName
        });
    }

    /**
     * Log stack deployment failure
     */
    public stackDeploymentFailure(stackName: string, phase: string, error: Error): void {
        this.log(LogLevel.ERROR, `❌ Stack ${phase} failed: ${stackName}`, {
            operation: `stack_${phase}_failure`,
            stackName,
            ...serializeError(error)
        });
    }

    /**
     * Log notification channel creation
     */
    public channelCreated(name: string, topicArn: string, queueUrl: string): void {
        this.log(LogLevel.INFO, `📡 Notification channel ready: ${name}`, {
            operation: 'channel_created',
            channelName: name,
            topicArn,
            queueUrl
        });
    }

    /**
     * Log notification channel teardown
     */
    public channelRemoved(name: string, failures: number): void {
        const level = failures > 0 ? LogLevel.WARN : LogLevel.INFO;
        const emoji = failures > 0 ? '⚠️' : '🧹';
        this.log(level, `${emoji} Notification channel removed: ${name}${failures > 0 ? ` (${failures} cleanup step(s) failed)` : ''}`, {
            operation: 'channel_removed',
            channelName: name,
            failures
        });
    }

    /**
     * Log a parsed stack event
     */
    public stackEvent(status: string | undefined, type: string | undefined, name: string | undefined, reason?: string): void {
        const summary = `${status ?? '?'} ${type ?? '?'} ${name ?? '?'}`;
        this.log(LogLevel.INFO, reason ? `🔔 ${summary} - ${reason}` : `🔔 ${summary}`, {
            operation: 'stack_event',
            resourceStatus: status,
            resourceType: type,
            logicalResourceId: name
        });
    }

    /**
     * Log monitor completion
     */
    public monitorComplete(state: string, reason: string, eventsProcessed: number, duration: number): void {
        const level = state === 'TimedOut' || state === 'Aborted' ? LogLevel.WARN : LogLevel.INFO;
        this.log(level, `🏁 Stack monitor finished (${state}, ${reason}) after ${eventsProcessed} event(s)`, {
            operation: 'monitor_complete',
            state,
            reason,
            eventsProcessed,
            duration
        });
    }

    public debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    public error(message: string, error?: Error, context?: LogContext): void {
        const errorContext = error ? serializeError(error) : {};
        this.log(LogLevel.ERROR, message, { ...errorContext, ...context });
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        emit(this.sink ?? defaultSink, level, message, this.baseContext, context);
    }
}

/**
 * Performance monitoring utilities
 */
export class PerformanceMonitor {
    private readonly startTime: number;
    private readonly operation: string;
    private readonly logger: ComponentLogger | DeploymentLogger;

    constructor(operation: string, logger: ComponentLogger | DeploymentLogger) {
        this.operation = operation;
        this.logger = logger;
        this.startTime = Date.now();
    }

    public static start(operation: string, logger: ComponentLogger | DeploymentLogger): PerformanceMonitor {
        return new PerformanceMonitor(operation, logger);
    }

    /**
     * End timing and log the duration
     */
    public end(context?: LogContext): number {
        const duration = Date.now() - this.startTime;

        if (this.logger instanceof ComponentLogger) {
            this.logger.operationTiming(this.operation, duration, context);
        } else {
            this.logger.debug(`Operation completed: ${this.operation} (${duration}ms)`, {
                operation: this.operation,
                duration,
                ...context
            });
        }

        return duration;
    }

    /**
     * Get current duration without ending the timer
     */
    public getCurrentDuration(): number {
        return Date.now() - this.startTime;
    }
}

import { NotificationChannelProvider, ReceivedMessage } from '../components/shared/interfaces';
import { HandlerRegistrationError, MonitorAbortedError } from '../components/shared/utils/error-handling';
import { DeploymentLogger } from '../components/shared/utils/logging';
import { STACK_RESOURCE_TYPE } from '../components/template';
import { StackEvent, parseStackEvent } from './stack-event-parser';
import { MonitorExitReason, MonitorOptions, MonitorResult, MonitorState } from './types';

/**
 * Processes stack events; returns true once its concern is satisfied
 */
export interface StackEventHandler {
    handleStackEvent(event: StackEvent): boolean | Promise<boolean>;
}

export const TERMINAL_STATUSES: readonly string[] = [
    'CREATE_COMPLETE',
    'CREATE_FAILED',
    'UPDATE_COMPLETE',
    'UPDATE_FAILED',
    'UPDATE_ROLLBACK_COMPLETE',
    'UPDATE_ROLLBACK_FAILED',
    'ROLLBACK_COMPLETE',
    'ROLLBACK_FAILED',
];

const DEFAULT_TIMEOUT_SECONDS = 3600;
const DEFAULT_WAIT_SECONDS = 5;
const DEFAULT_BATCH_SIZE = 10;

/**
 * Reject anything that cannot process stack events
 */
export function assertStackEventHandler(candidate: unknown): asserts candidate is StackEventHandler {
    const name = typeof candidate === 'object' && candidate !== null
        ? candidate.constructor?.name ?? 'Object'
        : typeof candidate;
    if (typeof candidate !== 'object' || candidate === null
        || !('handleStackEvent' in candidate) || typeof candidate.handleStackEvent !== 'function') {
        throw new HandlerRegistrationError('stack event handler', name, 'handleStackEvent');
    }
}

/**
 * The target stack itself reached a status it will not leave without a new operation
 */
export function isStackTerminalEvent(event: StackEvent, stackName: string): boolean {
    return event.type === STACK_RESOURCE_TYPE
        && event.name === stackName
        && event.status !== undefined
        && TERMINAL_STATUSES.includes(event.status);
}

/**
 * Polls a notification queue and dispatches stack events to a handler chain.
 *
 * Satisfied handlers are removed from the chain passed in, after the dispatch round of the
 * event that satisfied them. The loop ends when the target stack reaches a terminal status,
 * when the chain is empty, when the timeout elapses or when the signal aborts.
 */
export class StackEventMonitor {
    private readonly provider: NotificationChannelProvider;
    private readonly handlers: StackEventHandler[];
    private readonly logger: DeploymentLogger;
    private readonly timeoutMs: number;
    private readonly waitSeconds: number;
    private readonly batchSize: number;
    private readonly printEvents: boolean;
    private readonly now: () => number;
    private state: MonitorState = 'Polling';

    constructor(
        provider: NotificationChannelProvider,
        handlers: StackEventHandler[],
        logger: DeploymentLogger,
        options: MonitorOptions = {}
    ) {
        handlers.forEach(handler => assertStackEventHandler(handler));
        this.provider = provider;
        this.handlers = handlers;
        this.logger = logger;
        this.timeoutMs = (options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
        this.waitSeconds = options.waitSeconds ?? DEFAULT_WAIT_SECONDS;
        this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
        this.printEvents = options.printEvents ?? false;
        this.now = options.now ?? Date.now;
    }

    public getState(): MonitorState {
        return this.state;
    }

    public async run(queueUrl: string, stackName: string, signal?: AbortSignal): Promise<MonitorResult> {
        const startedAt = this.now();
        let eventsProcessed = 0;
        let finalStatus: string | undefined;

        const finish = (state: MonitorState, reason: MonitorExitReason): MonitorResult => {
            this.state = state;
            const result: MonitorResult = { state, reason, eventsProcessed, finalStatus, elapsedMs: this.now() - startedAt };
            this.logger.monitorComplete(state, reason, eventsProcessed, result.elapsedMs);
            return result;
        };

        while (true) {
            if (finalStatus !== undefined) {
                return finish('Terminated', 'stack-terminal');
            }
            if (this.handlers.length === 0) {
                return finish('Draining', 'handlers-satisfied');
            }
            if (this.now() - startedAt >= this.timeoutMs) {
                return finish('TimedOut', 'timeout');
            }

            let messages: ReceivedMessage[];
            try {
                messages = await this.receive(queueUrl, stackName, signal);
            } catch (error) {
                if (error instanceof MonitorAbortedError) {
                    finish('Aborted', 'aborted');
                }
                throw error;
            }

            for (const message of messages) {
                const event = parseStackEvent(message.body);
                await this.provider.deleteMessage(queueUrl, message.receiptHandle);
                eventsProcessed++;
                this.logEvent(event);

                await this.dispatch(event);

                if (isStackTerminalEvent(event, stackName)) {
                    finalStatus = event.status;
                }
            }
        }
    }

    private async dispatch(event: StackEvent): Promise<void> {
        const satisfied: StackEventHandler[] = [];
        for (const handler of [...this.handlers]) {
            if (await handler.handleStackEvent(event)) {
                satisfied.push(handler);
            }
        }

        for (const handler of satisfied) {
            const index = this.handlers.indexOf(handler);
            if (index >= 0) {
                this.handlers.splice(index, 1);
            }
        }
        if (satisfied.length > 0 && this.state === 'Polling') {
            this.state = 'Draining';
        }
    }

    private receive(queueUrl: string, stackName: string, signal?: AbortSignal): Promise<ReceivedMessage[]> {
        if (!signal) {
            return this.provider.receiveMessages(queueUrl, this.waitSeconds, this.batchSize);
        }
        if (signal.aborted) {
            return Promise.reject(new MonitorAbortedError(stackName));
        }

        return new Promise<ReceivedMessage[]>((resolve, reject) => {
            const onAbort = (): void => reject(new MonitorAbortedError(stackName));
            signal.addEventListener('abort', onAbort, { once: true });
            void this.provider.receiveMessages(queueUrl, this.waitSeconds, this.batchSize).then(
                messages => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(messages);
                },
                error => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    private logEvent(event: StackEvent): void {
        if (this.printEvents) {
            this.logger.stackEvent(event.status, event.type, event.name, event.reason);
        } else {
            this.logger.debug(`Stack event ${event.status ?? '?'} ${event.type ?? '?'} ${event.name ?? '?'}`, {
                operation: 'stack_event',
                reason: event.reason,
                properties: event.props
            });
        }
    }
}

import { DeploymentLogger } from '../components/shared/utils/logging';
import { StackEvent } from './stack-event-parser';
import { StackEventHandler, isStackTerminalEvent } from './stack-event-monitor';

/**
 * Logs every event; satisfied once the target stack reaches a terminal status
 */
export class StackProgressReporter implements StackEventHandler {
    public readonly events: StackEvent[] = [];
    public finalStatus?: string;
    private readonly stackName: string;
    private readonly logger: DeploymentLogger;

    constructor(stackName: string, logger: DeploymentLogger) {
        this.stackName = stackName;
        this.logger = logger;
    }

    public handleStackEvent(event: StackEvent): boolean {
        this.events.push(event);
        this.logger.stackEvent(event.status, event.type, event.name, event.reason);

        if (isStackTerminalEvent(event, this.stackName)) {
            this.finalStatus = event.status;
            return true;
        }
        return false;
    }
}

/**
 * Waits for one logical resource to reach any of the given statuses
 */
export class ResourceStatusWaiter implements StackEventHandler {
    public matchedEvent?: StackEvent;
    private readonly logicalResourceId: string;
    private readonly statuses: readonly string[];
    private readonly onMatch?: (event: StackEvent) => void | Promise<void>;

    constructor(
        logicalResourceId: string,
        statuses: readonly string[],
        onMatch?: (event: StackEvent) => void | Promise<void>
    ) {
        this.logicalResourceId = logicalResourceId;
        this.statuses = statuses;
        this.onMatch = onMatch;
    }

    public async handleStackEvent(event: StackEvent): Promise<boolean> {
        if (this.matchedEvent) {
            return true;
        }
        if (event.name !== this.logicalResourceId || event.status === undefined || !this.statuses.includes(event.status)) {
            return false;
        }

        this.matchedEvent = event;
        if (this.onMatch) {
            await this.onMatch(event);
        }
        return true;
    }
}

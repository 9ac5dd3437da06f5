import { NotificationChannelProvider, StackApi, StackParameter, StackRequest } from '../components/shared/interfaces';
import {
    DeploymentApiError,
    NoStackUpdatesError,
    StackNotFoundError,
    toError
} from '../components/shared/utils/error-handling';
import { DeploymentLogger, PerformanceMonitor } from '../components/shared/utils/logging';
import { NotificationChannel, NotificationChannelManager } from './notification-channel';
import { StackEventHandler, StackEventMonitor, assertStackEventHandler } from './stack-event-monitor';
import { DeploymentAction, DeploymentOptions, DeploymentResult, MonitorOptions, MonitorResult } from './types';

const DEFAULT_TIMEOUT_IN_MINUTES = 60;
const DEFAULT_CAPABILITIES = ['CAPABILITY_IAM'];

export interface OrchestratorCollaborators {
    stackApi: StackApi;
    /** Required only when handlers are registered */
    notifications?: NotificationChannelProvider;
}

export interface OrchestratorOptions extends DeploymentOptions {
    monitor?: MonitorOptions;
    logger?: DeploymentLogger;
    /** Clock for channel names */
    now?: () => Date;
}

export interface DeployRequest {
    stackName: string;
    templateBody: string;
    parameters?: StackParameter[];
    /** Handler chain; satisfied handlers are removed from this array while monitoring */
    handlers?: StackEventHandler[];
    /** Prefix of the notification channel name, defaults to the stack name */
    channelPrefix?: string;
    /** Aborting stops monitoring; the remote operation keeps running */
    signal?: AbortSignal;
}

export interface EnsureDeployedResult {
    action: DeploymentAction;
    stackId?: string;
}

/**
 * Create-or-update of a single stack, optionally observed through a notification channel
 */
export class DeploymentOrchestrator {
    private readonly stackApi: StackApi;
    private readonly notifications?: NotificationChannelProvider;
    private readonly logger: DeploymentLogger;
    private readonly timeoutInMinutes: number;
    private readonly capabilities: string[];
    private readonly monitorOptions: MonitorOptions;
    private readonly now?: () => Date;

    constructor(collaborators: OrchestratorCollaborators, options: OrchestratorOptions = {}) {
        this.stackApi = collaborators.stackApi;
        this.notifications = collaborators.notifications;
        this.logger = options.logger ?? new DeploymentLogger('deployment');
        this.timeoutInMinutes = options.timeoutInMinutes ?? DEFAULT_TIMEOUT_IN_MINUTES;
        this.capabilities = options.capabilities ?? DEFAULT_CAPABILITIES;
        this.monitorOptions = options.monitor ?? {};
        this.now = options.now;
    }

    /**
     * Update the stack; create it only when the update reports that it does not exist
     */
    public async ensureDeployed(
        stackName: string,
        templateBody: string,
        parameters: StackParameter[] = [],
        channel?: NotificationChannel
    ): Promise<EnsureDeployedResult> {
        const request: StackRequest = {
            stackName,
            templateBody,
            parameters,
            notificationArns: channel ? [channel.topicArn] : [],
            capabilities: [...this.capabilities],
        };

        this.logger.stackDeploymentStart(stackName, 'update');
        try {
            const stackId = await this.stackApi.updateStack(request);
            this.logger.stackDeploymentSuccess(stackName, 'update');
            return { action: 'updated', stackId };
        } catch (error) {
            if (error instanceof NoStackUpdatesError) {
                this.logger.stackDeploymentSuccess(stackName, 'unchanged');
                return { action: 'unchanged' };
            }
            if (!(error instanceof StackNotFoundError)) {
                throw this.failure(stackName, 'update', error);
            }
            this.logger.info(`Stack '${stackName}' does not exist yet, creating it`);
        }

        this.logger.stackDeploymentStart(stackName, 'create');
        try {
            const stackId = await this.stackApi.createStack({
                ...request,
                disableRollback: true,
                timeoutInMinutes: this.timeoutInMinutes,
            });
            this.logger.stackDeploymentSuccess(stackName, 'create');
            return { action: 'created', stackId };
        } catch (error) {
            throw this.failure(stackName, 'create', error);
        }
    }

    /**
     * Deploy and, when handlers are registered, follow the stack events until the monitor exits.
     * The notification channel exists exactly for the duration of this call.
     */
    public async deploy(request: DeployRequest): Promise<DeploymentResult> {
        const timer = PerformanceMonitor.start(`deploy ${request.stackName}`, this.logger);
        const handlers = request.handlers ?? [];
        handlers.forEach(handler => assertStackEventHandler(handler));

        if (handlers.length === 0) {
            const outcome = await this.ensureDeployed(request.stackName, request.templateBody, request.parameters);
            return { stackName: request.stackName, ...outcome, duration: timer.end() };
        }

        if (!this.notifications) {
            throw new DeploymentApiError(request.stackName, 'channel', 'stack event handlers need a notification provider');
        }
        const notifications = this.notifications;
        const channels = new NotificationChannelManager(notifications, this.logger, this.now);

        return channels.withChannel(request.channelPrefix ?? request.stackName, async channel => {
            const outcome = await this.ensureDeployed(request.stackName, request.templateBody, request.parameters, channel);

            let monitor: MonitorResult | undefined;
            if (outcome.action !== 'unchanged') {
                const eventMonitor = new StackEventMonitor(notifications, handlers, this.logger, this.monitorOptions);
                monitor = await eventMonitor.run(channel.queueUrl, request.stackName, request.signal);
            }

            return { stackName: request.stackName, ...outcome, monitor, duration: timer.end() };
        });
    }

    public async destroy(stackName: string): Promise<void> {
        this.logger.stackDeploymentStart(stackName, 'delete');
        try {
            await this.stackApi.deleteStack(stackName);
        } catch (error) {
            throw this.failure(stackName, 'delete', error);
        }
        this.logger.stackDeploymentSuccess(stackName, 'delete');
    }

    private failure(stackName: string, phase: 'update' | 'create' | 'delete', error: unknown): DeploymentApiError {
        const failure = new DeploymentApiError(stackName, phase, toError(error).message, error);
        this.logger.stackDeploymentFailure(stackName, phase, failure);
        return failure;
    }
}

import { randomInt } from 'crypto';
import { NotificationChannelProvider } from '../components/shared/interfaces';
import { CleanupAction, CleanupFailure, DeploymentApiError, ErrorHandler, toError } from '../components/shared/utils/error-handling';
import { DeploymentLogger } from '../components/shared/utils/logging';

/**
 * Topic + queue + subscription receiving the events of one deploy invocation
 */
export interface NotificationChannel {
    name: string;
    topicArn: string;
    queueUrl: string;
    queueArn: string;
}

interface PolicyStatement {
    Sid?: string;
    Condition?: { StringLike?: Record<string, string> };
    [key: string]: unknown;
}

interface QueuePolicy {
    Version?: string;
    Statement?: PolicyStatement[];
    [key: string]: unknown;
}

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

export function randomSuffix(length: number = 5): string {
    let suffix = '';
    for (let index = 0; index < length; index++) {
        suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
    }
    return suffix;
}

/**
 * `<environment>_<yyyyMMdd-HHmmss>_<suffix>`, unique per invocation
 */
export function channelName(environmentName: string, date: Date = new Date(), suffix: string = randomSuffix()): string {
    const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${environmentName}_${stamp}_${suffix}`;
}

/**
 * Queue policy letting the topic publish into the queue
 */
export function topicPublishStatement(queueArn: string, topicArn: string): PolicyStatement {
    return {
        Sid: 'sqs-access',
        Effect: 'Allow',
        Principal: { AWS: '*' },
        Action: 'SQS:SendMessage',
        Resource: queueArn,
        Condition: { StringLike: { 'aws:SourceArn': topicArn } },
    };
}

function parsePolicy(document: string | undefined): QueuePolicy {
    if (!document) {
        return {};
    }
    const parsed: unknown = JSON.parse(document);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        return {};
    }
    const statements: unknown[] = 'Statement' in parsed && Array.isArray(parsed.Statement) ? parsed.Statement : [];
    const version = 'Version' in parsed && typeof parsed.Version === 'string' ? parsed.Version : undefined;
    return { ...parsed, Version: version, Statement: statements.filter(isStatement) };
}

function isStatement(value: unknown): value is PolicyStatement {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Creates and removes notification channels
 */
export class NotificationChannelManager {
    private readonly provider: NotificationChannelProvider;
    private readonly logger: DeploymentLogger;
    private readonly now: () => Date;

    constructor(provider: NotificationChannelProvider, logger: DeploymentLogger, now: () => Date = () => new Date()) {
        this.provider = provider;
        this.logger = logger;
        this.now = now;
    }

    /**
     * Create topic and queue, subscribe the queue and allow the topic to publish into it.
     * Whatever was created before a failure is removed again.
     */
    public async open(environmentName: string): Promise<NotificationChannel> {
        const name = channelName(environmentName, this.now());
        let topicArn: string | undefined;
        let queueUrl: string | undefined;

        try {
            topicArn = await this.provider.createTopic(name);
            const queue = await this.provider.createQueue(name);
            queueUrl = queue.queueUrl;
            await this.provider.subscribe(topicArn, queue.queueArn);
            await this.ensureQueuePolicy(queue.queueUrl, queue.queueArn, topicArn);

            const channel: NotificationChannel = { name, topicArn, queueUrl: queue.queueUrl, queueArn: queue.queueArn };
            this.logger.channelCreated(name, topicArn, queue.queueUrl);
            return channel;
        } catch (error) {
            await this.removeParts(name, topicArn, queueUrl);
            throw new DeploymentApiError(environmentName, 'channel', toError(error).message, error);
        }
    }

    /**
     * Add the publish statement unless the queue policy already carries one for this topic
     */
    public async ensureQueuePolicy(queueUrl: string, queueArn: string, topicArn: string): Promise<boolean> {
        const policy = parsePolicy(await this.provider.getQueuePolicy(queueUrl));
        const statements = policy.Statement ?? [];
        const present = statements.some(statement => statement.Condition?.StringLike?.['aws:SourceArn'] === topicArn);
        if (present) {
            return false;
        }

        const updated: QueuePolicy = {
            ...policy,
            Version: policy.Version ?? '2008-10-17',
            Statement: [...statements, topicPublishStatement(queueArn, topicArn)],
        };
        await this.provider.setQueuePolicy(queueUrl, JSON.stringify(updated));
        return true;
    }

    /**
     * Best-effort teardown: topic, then queue
     */
    public async close(channel: NotificationChannel): Promise<CleanupFailure[]> {
        return this.removeParts(channel.name, channel.topicArn, channel.queueUrl);
    }

    /**
     * Run `body` with a fresh channel that is removed on every exit path
     */
    public async withChannel<T>(environmentName: string, body: (channel: NotificationChannel) => Promise<T>): Promise<T> {
        const channel = await this.open(environmentName);
        try {
            return await body(channel);
        } finally {
            await this.close(channel);
        }
    }

    private async removeParts(name: string, topicArn?: string, queueUrl?: string): Promise<CleanupFailure[]> {
        const actions: CleanupAction[] = [];
        if (topicArn !== undefined) {
            actions.push({ name: `delete topic ${topicArn}`, run: () => this.provider.deleteTopic(topicArn) });
        }
        if (queueUrl !== undefined) {
            actions.push({ name: `delete queue ${queueUrl}`, run: () => this.provider.deleteQueue(queueUrl) });
        }
        if (actions.length === 0) {
            return [];
        }

        const failures = await ErrorHandler.executeCleanup(actions, this.logger);
        this.logger.channelRemoved(name, failures.length);
        return failures;
    }
}

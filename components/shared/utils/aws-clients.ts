import {
    CloudFormationClient,
    CreateStackCommand,
    UpdateStackCommand,
    DeleteStackCommand,
    Capability,
} from '@aws-sdk/client-cloudformation';
import {
    SNSClient,
    CreateTopicCommand,
    DeleteTopicCommand,
    ListSubscriptionsByTopicCommand,
    SubscribeCommand,
} from '@aws-sdk/client-sns';
import {
    SQSClient,
    CreateQueueCommand,
    DeleteQueueCommand,
    DeleteMessageCommand,
    GetQueueAttributesCommand,
    ReceiveMessageCommand,
    SetQueueAttributesCommand,
    QueueAttributeName,
} from '@aws-sdk/client-sqs';
import { S3Client, PutObjectCommand, ObjectCannedACL } from '@aws-sdk/client-s3';
import {
    NotificationChannelProvider,
    ObjectStore,
    QueueHandle,
    ReceivedMessage,
    StackApi,
    StackRequest,
} from '../interfaces';
import { NoStackUpdatesError, StackNotFoundError } from './error-handling';

export interface AwsClientOptions {
    region?: string;
}

function isCapability(value: string): value is Capability {
    return Object.values(Capability).some(candidate => candidate === value);
}

function isCannedAcl(value: string): value is ObjectCannedACL {
    return Object.values(ObjectCannedACL).some(candidate => candidate === value);
}

/**
 * CloudFormation rejects a missing stack and an empty change set with a ValidationError;
 * only the message tells them apart.
 */
function classifyStackError(stackName: string, error: unknown): unknown {
    if (!(error instanceof Error) || error.name !== 'ValidationError') {
        return error;
    }
    if (/does not exist/i.test(error.message)) {
        return new StackNotFoundError(stackName, error.message);
    }
    if (/no updates are to be performed/i.test(error.message)) {
        return new NoStackUpdatesError(stackName);
    }
    return error;
}

/**
 * Stack operations backed by the CloudFormation API
 */
export class CloudFormationStackApi implements StackApi {
    private readonly client: CloudFormationClient;

    constructor(options: AwsClientOptions = {}, client?: CloudFormationClient) {
        this.client = client ?? new CloudFormationClient({ region: options.region });
    }

    public async createStack(request: StackRequest): Promise<string | undefined> {
        const response = await this.client.send(new CreateStackCommand({
            StackName: request.stackName,
            TemplateBody: request.templateBody,
            Parameters: request.parameters,
            NotificationARNs: request.notificationArns,
            Capabilities: request.capabilities.filter(isCapability),
            DisableRollback: request.disableRollback,
            TimeoutInMinutes: request.timeoutInMinutes,
        }));
        return response.StackId;
    }

    public async updateStack(request: StackRequest): Promise<string | undefined> {
        try {
            const response = await this.client.send(new UpdateStackCommand({
                StackName: request.stackName,
                TemplateBody: request.templateBody,
                Parameters: request.parameters,
                NotificationARNs: request.notificationArns,
                Capabilities: request.capabilities.filter(isCapability),
            }));
            return response.StackId;
        } catch (error) {
            throw classifyStackError(request.stackName, error);
        }
    }

    public async deleteStack(stackName: string): Promise<void> {
        await this.client.send(new DeleteStackCommand({ StackName: stackName }));
    }
}

/**
 * SNS topic + SQS queue notification plumbing
 */
export class SnsSqsChannelProvider implements NotificationChannelProvider {
    private readonly sns: SNSClient;
    private readonly sqs: SQSClient;

    constructor(options: AwsClientOptions = {}, clients?: { sns: SNSClient; sqs: SQSClient }) {
        this.sns = clients?.sns ?? new SNSClient({ region: options.region });
        this.sqs = clients?.sqs ?? new SQSClient({ region: options.region });
    }

    public async createTopic(name: string): Promise<string> {
        const response = await this.sns.send(new CreateTopicCommand({ Name: name }));
        if (!response.TopicArn) {
            throw new Error(`CreateTopic returned no ARN for '${name}'`);
        }
        return response.TopicArn;
    }

    public async createQueue(name: string): Promise<QueueHandle> {
        const created = await this.sqs.send(new CreateQueueCommand({ QueueName: name }));
        const queueUrl = created.QueueUrl;
        if (!queueUrl) {
            throw new Error(`CreateQueue returned no URL for '${name}'`);
        }

        const attributes = await this.sqs.send(new GetQueueAttributesCommand({
            QueueUrl: queueUrl,
            AttributeNames: [QueueAttributeName.QueueArn],
        }));
        const queueArn = attributes.Attributes?.QueueArn;
        if (!queueArn) {
            throw new Error(`Queue '${name}' has no QueueArn attribute`);
        }

        return { queueUrl, queueArn };
    }

    public async subscribe(topicArn: string, queueArn: string): Promise<void> {
        let nextToken: string | undefined;
        do {
            const page = await this.sns.send(new ListSubscriptionsByTopicCommand({
                TopicArn: topicArn,
                NextToken: nextToken,
            }));
            if (page.Subscriptions?.some(subscription => subscription.Endpoint === queueArn)) {
                return;
            }
            nextToken = page.NextToken;
        } while (nextToken);

        await this.sns.send(new SubscribeCommand({
            TopicArn: topicArn,
            Protocol: 'sqs',
            Endpoint: queueArn,
        }));
    }

    public async getQueuePolicy(queueUrl: string): Promise<string | undefined> {
        const response = await this.sqs.send(new GetQueueAttributesCommand({
            QueueUrl: queueUrl,
            AttributeNames: [QueueAttributeName.Policy],
        }));
        return response.Attributes?.Policy;
    }

    public async setQueuePolicy(queueUrl: string, policy: string): Promise<void> {
        await this.sqs.send(new SetQueueAttributesCommand({
            QueueUrl: queueUrl,
            Attributes: { Policy: policy },
        }));
    }

    public async receiveMessages(queueUrl: string, waitSeconds: number, maxCount: number): Promise<ReceivedMessage[]> {
        const response = await this.sqs.send(new ReceiveMessageCommand({
            QueueUrl: queueUrl,
            WaitTimeSeconds: waitSeconds,
            MaxNumberOfMessages: maxCount,
        }));

        const messages: ReceivedMessage[] = [];
        for (const message of response.Messages ?? []) {
            if (message.ReceiptHandle && message.Body !== undefined) {
                messages.push({ receiptHandle: message.ReceiptHandle, body: message.Body });
            }
        }
        return messages;
    }

    public async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
        await this.sqs.send(new DeleteMessageCommand({ QueueUrl: queueUrl, ReceiptHandle: receiptHandle }));
    }

    public async deleteTopic(topicArn: string): Promise<void> {
        await this.sns.send(new DeleteTopicCommand({ TopicArn: topicArn }));
    }

    public async deleteQueue(queueUrl: string): Promise<void> {
        await this.sqs.send(new DeleteQueueCommand({ QueueUrl: queueUrl }));
    }
}

/**
 * S3 storage for uploaded child templates
 */
export class S3ObjectStore implements ObjectStore {
    private readonly client: S3Client;

    constructor(options: AwsClientOptions = {}, client?: S3Client) {
        this.client = client ?? new S3Client({ region: options.region });
    }

    public async putObject(bucket: string, key: string, body: string, acl?: string): Promise<string> {
        if (acl !== undefined && !isCannedAcl(acl)) {
            throw new Error(`Unsupported canned ACL '${acl}'`);
        }

        await this.client.send(new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ACL: acl,
        }));

        return `https://${bucket}.s3.amazonaws.com/${key}`;
    }
}

export interface AwsCollaborators {
    stackApi: StackApi;
    notifications: NotificationChannelProvider;
    objectStore: ObjectStore;
}

export function createAwsCollaborators(options: AwsClientOptions = {}): AwsCollaborators {
    return {
        stackApi: new CloudFormationStackApi(options),
        notifications: new SnsSqsChannelProvider(options),
        objectStore: new S3ObjectStore(options),
    };
}

/**
 * Collaborator interfaces shared by the composition and deployment code.
 * AWS-backed implementations live in ./utils/aws-clients; tests use in-process stand-ins.
 */

/**
 * Key/value pair handed to create-stack and update-stack
 */
export interface StackParameter {
    ParameterKey: string;
    ParameterValue: string;
}

export interface StackRequest {
    stackName: string;
    templateBody: string;
    parameters: StackParameter[];
    notificationArns: string[];
    capabilities: string[];
    /** Only honoured by create-stack */
    timeoutInMinutes?: number;
    /** Only honoured by create-stack */
    disableRollback?: boolean;
}

/**
 * Orchestration API.
 * `updateStack` must raise StackNotFoundError when the stack does not exist and
 * NoStackUpdatesError when the template and parameters are unchanged.
 */
export interface StackApi {
    createStack(request: StackRequest): Promise<string | undefined>;
    updateStack(request: StackRequest): Promise<string | undefined>;
    deleteStack(stackName: string): Promise<void>;
}

export interface QueueHandle {
    queueUrl: string;
    queueArn: string;
}

export interface ReceivedMessage {
    receiptHandle: string;
    body: string;
}

/**
 * Topic and queue plumbing for stack notifications
 */
export interface NotificationChannelProvider {
    /** Idempotent: returns the existing topic ARN when the topic already exists */
    createTopic(name: string): Promise<string>;
    /** Idempotent: returns the existing queue when it already exists */
    createQueue(name: string): Promise<QueueHandle>;
    /** Subscribe the queue to the topic unless it already is */
    subscribe(topicArn: string, queueArn: string): Promise<void>;
    getQueuePolicy(queueUrl: string): Promise<string | undefined>;
    setQueuePolicy(queueUrl: string, policy: string): Promise<void>;
    receiveMessages(queueUrl: string, waitSeconds: number, maxCount: number): Promise<ReceivedMessage[]>;
    deleteMessage(queueUrl: string, receiptHandle: string): Promise<void>;
    deleteTopic(topicArn: string): Promise<void>;
    deleteQueue(queueUrl: string): Promise<void>;
}

/**
 * Object storage used for child templates
 */
export interface ObjectStore {
    /** Returns the URL the stored object can be fetched from */
    putObject(bucket: string, key: string, body: string, acl?: string): Promise<string>;
}

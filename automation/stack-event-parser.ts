export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Stack event decoded from a CloudFormation notification
 */
export interface StackEvent {
    /** ResourceStatus, e.g. CREATE_COMPLETE */
    status?: string;
    /** ResourceType, e.g. AWS::EC2::Subnet */
    type?: string;
    /** LogicalResourceId */
    name?: string;
    /** ResourceStatusReason */
    reason?: string;
    /** ResourceProperties, parsed as JSON when possible, otherwise the raw text */
    props?: JsonValue;
    stackName?: string;
    stackId?: string;
    physicalResourceId?: string;
    timestamp?: string;
    /** Every key=value pair found in the message */
    fields: Record<string, string>;
}

const FIELD_PATTERN = /(\w+)=('[^'\n]*'|\S+)/g;

/**
 * SNS wraps the CloudFormation text in a JSON envelope; raw message delivery does not
 */
export function extractMessageText(body: string): string {
    try {
        const envelope: unknown = JSON.parse(body);
        if (typeof envelope === 'object' && envelope !== null && 'Message' in envelope && typeof envelope.Message === 'string') {
            return envelope.Message;
        }
    } catch (error) {
        if (!(error instanceof SyntaxError)) {
            throw error;
        }
    }
    return body;
}

/**
 * Collect `key='value'` and `key=value` pairs; surrounding single quotes are stripped
 */
export function parseFields(text: string): Record<string, string> {
    const fields: Record<string, string> = {};
    for (const match of text.matchAll(FIELD_PATTERN)) {
        fields[match[1]] = match[2].replace(/^'+|'+$/g, '');
    }
    return fields;
}

function parseProperties(raw: string | undefined): JsonValue | undefined {
    if (raw === undefined) {
        return undefined;
    }
    try {
        const parsed: JsonValue = JSON.parse(raw);
        return parsed;
    } catch {
        return raw;
    }
}

export function parseStackEvent(body: string): StackEvent {
    const fields = parseFields(extractMessageText(body));

    return {
        status: fields.ResourceStatus,
        type: fields.ResourceType,
        name: fields.LogicalResourceId,
        reason: fields.ResourceStatusReason,
        props: parseProperties(fields.ResourceProperties),
        stackName: fields.StackName,
        stackId: fields.StackId,
        physicalResourceId: fields.PhysicalResourceId,
        timestamp: fields.Timestamp,
        fields,
    };
}

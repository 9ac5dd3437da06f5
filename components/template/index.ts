import { createHash } from "crypto";
import { TemplateError } from "../shared/utils/error-handling";

export type TemplateValue =
    | string
    | number
    | boolean
    | null
    | TemplateValue[]
    | { [key: string]: TemplateValue };

export type RefExpression = { Ref: string };

export type GetAttExpression = { "Fn::GetAtt": [string, string] };

export function ref(name: string): RefExpression {
    return { Ref: name };
}

export function getAtt(resourceName: string, attribute: string): GetAttExpression {
    return { "Fn::GetAtt": [resourceName, attribute] };
}

export interface ParameterDeclaration {
    Type: string;
    Default?: string | number;
    Description?: string;
    AllowedPattern?: string;
    AllowedValues?: string[];
    MinLength?: number;
    MaxLength?: number;
    MinValue?: number;
    MaxValue?: number;
    ConstraintDescription?: string;
    NoEcho?: boolean;
}

export interface ResourceDeclaration {
    Type: string;
    Properties?: Record<string, TemplateValue>;
    DependsOn?: string[];
    DeletionPolicy?: string;
    Metadata?: Record<string, TemplateValue>;
}

export interface OutputDeclaration {
    Value: TemplateValue;
    Description?: string;
}

/** First-level key -> second-level key -> value, e.g. region -> AMI name -> AMI id */
export type TemplateMapping = Record<string, Record<string, string>>;

export interface TemplateDocument {
    AWSTemplateFormatVersion: string;
    Description?: string;
    Parameters?: Record<string, ParameterDeclaration>;
    Mappings?: Record<string, TemplateMapping>;
    Resources: Record<string, ResourceDeclaration>;
    Outputs?: Record<string, OutputDeclaration>;
}

export const STACK_RESOURCE_TYPE = "AWS::CloudFormation::Stack";

/**
 * Outputs added at render time; never recorded as stack outputs
 */
export const GENERATED_OUTPUTS = ["templateValidationHash", "dateGenerated"];

const LOGICAL_ID_PATTERN = /^[A-Za-z0-9]+$/;

const EC2_KEY_PATTERN = "[\\x20-\\x7E]*";
const EC2_KEY_MESSAGE = "can contain only ASCII characters.";
const CIDR_PATTERN = "(\\d{1,3})\\.(\\d{1,3})\\.(\\d{1,3})\\.(\\d{1,3})/(\\d{1,2})";
const CIDR_MESSAGE = "must be a valid IP CIDR range of the form x.x.x.x/x.";

export function ec2KeyParameter(defaultKey: string): ParameterDeclaration {
    return {
        Type: "String",
        Default: defaultKey,
        Description: "Name of an existing EC2 KeyPair to enable SSH access to the instances",
        AllowedPattern: EC2_KEY_PATTERN,
        MinLength: 1,
        MaxLength: 255,
        ConstraintDescription: EC2_KEY_MESSAGE,
    };
}

export function remoteAccessParameter(): ParameterDeclaration {
    return {
        Type: "String",
        Default: "0.0.0.0/0",
        Description: "CIDR block identifying the network address space that will be allowed to ingress into public access points within this solution",
        MinLength: 9,
        MaxLength: 18,
        AllowedPattern: CIDR_PATTERN,
        ConstraintDescription: CIDR_MESSAGE,
    };
}

/**
 * In-memory CloudFormation template: parameters, resources, outputs and mappings in
 * declaration order, rendered to a JSON document.
 */
export class Template {
    public readonly name: string;
    public description?: string;
    private readonly parameters = new Map<string, ParameterDeclaration>();
    private readonly resources = new Map<string, ResourceDeclaration>();
    private readonly outputs = new Map<string, OutputDeclaration>();
    private readonly mappings = new Map<string, TemplateMapping>();

    constructor(name: string, description?: string) {
        this.name = name;
        this.description = description;
    }

    public getParameterNames(): string[] {
        return [...this.parameters.keys()];
    }

    public hasParameter(name: string): boolean {
        return this.parameters.has(name);
    }

    public getParameter(name: string): ParameterDeclaration | undefined {
        const declaration = this.parameters.get(name);
        return declaration ? structuredClone(declaration) : undefined;
    }

    public getResourceNames(): string[] {
        return [...this.resources.keys()];
    }

    public hasResource(name: string): boolean {
        return this.resources.has(name);
    }

    public getResource(name: string): ResourceDeclaration | undefined {
        const declaration = this.resources.get(name);
        return declaration ? structuredClone(declaration) : undefined;
    }

    public getOutputNames(): string[] {
        return [...this.outputs.keys()];
    }

    /**
     * Output names worth publishing to sibling templates
     */
    public recordedOutputNames(): string[] {
        return this.getOutputNames().filter(name => !GENERATED_OUTPUTS.includes(name));
    }

    public getMapping(name: string): TemplateMapping | undefined {
        return this.mappings.get(name);
    }

    /**
     * Declare a parameter; a duplicate name is an error
     */
    public addParameter(name: string, declaration: ParameterDeclaration): RefExpression {
        if (this.parameters.has(name)) {
            throw new TemplateError(this.name, `duplicate parameter '${name}'`);
        }
        this.parameters.set(name, this.checkParameter(name, declaration));
        return ref(name);
    }

    /**
     * Declare a parameter unless one with the same name exists
     */
    public addParameterIdempotent(name: string, declaration: ParameterDeclaration): RefExpression {
        if (!this.parameters.has(name)) {
            this.parameters.set(name, this.checkParameter(name, declaration));
        }
        return ref(name);
    }

    public addResource(name: string, declaration: ResourceDeclaration): RefExpression {
        if (this.resources.has(name)) {
            throw new TemplateError(this.name, `duplicate resource '${name}'`);
        }
        return this.setResource(name, declaration);
    }

    /**
     * Add or replace a resource
     */
    public setResource(name: string, declaration: ResourceDeclaration): RefExpression {
        this.checkLogicalId("resource", name);
        if (!declaration.Type) {
            throw new TemplateError(this.name, `resource '${name}' has no Type`);
        }
        this.resources.set(name, structuredClone(declaration));
        return ref(name);
    }

    public addOutput(name: string, declaration: OutputDeclaration): void {
        if (this.outputs.has(name)) {
            throw new TemplateError(this.name, `duplicate output '${name}'`);
        }
        this.checkLogicalId("output", name);
        this.outputs.set(name, structuredClone(declaration));
    }

    /**
     * Add or replace a mapping
     */
    public addMapping(name: string, mapping: TemplateMapping): void {
        this.checkLogicalId("mapping", name);
        this.mappings.set(name, structuredClone(mapping));
    }

    /**
     * Region -> AMI lookup table, referenced with Fn::FindInMap
     */
    public addAmiMapping(amiCache: TemplateMapping): void {
        this.addMapping("RegionMap", amiCache);
    }

    /**
     * Network parameters every child template receives from its parent
     */
    public addCommonParameters(subnetTypes: string[], azCount: number): void {
        this.addParameterIdempotent("vpcCidr", {
            Type: "String",
            Description: "VPC CIDR block",
            AllowedPattern: CIDR_PATTERN,
            ConstraintDescription: CIDR_MESSAGE,
        });
        this.addParameterIdempotent("vpcId", { Type: "String", Description: "ID of the VPC" });
        this.addParameterIdempotent("commonSecurityGroup", {
            Type: "String",
            Description: "Security group that allows common access such as SSH from within the VPC",
        });
        this.addParameterIdempotent("utilityBucket", {
            Type: "String",
            Description: "Name of the S3 bucket used for log aggregation",
        });

        for (let index = 1; index <= azCount; index++) {
            this.addParameterIdempotent(`availabilityZone${index}`, {
                Type: "String",
                Description: `Availability zone ${index}`,
            });
            for (const subnetType of subnetTypes) {
                this.addParameterIdempotent(`${subnetType}Subnet${index}`, {
                    Type: "String",
                    Description: `ID of ${subnetType} subnet ${index}`,
                });
            }
        }
    }

    /**
     * S3 bucket receiving ELB and CloudTrail logs
     */
    public addUtilityBucket(bucketName?: string): RefExpression {
        return this.setResource("utilityBucket", {
            Type: "AWS::S3::Bucket",
            DeletionPolicy: "Retain",
            ...(bucketName ? { Properties: { BucketName: bucketName } } : {}),
        });
    }

    /**
     * Called right before a child template is uploaded; subclasses add their resources here
     */
    public buildHook(): void {
        // nothing by default
    }

    public toDocument(generatedAt: Date = new Date()): TemplateDocument {
        const document: TemplateDocument = {
            AWSTemplateFormatVersion: "2010-09-09",
            Description: this.description,
            Resources: Object.fromEntries(this.resources),
        };

        if (this.parameters.size > 0) {
            document.Parameters = Object.fromEntries(this.parameters);
        }
        if (this.mappings.size > 0) {
            document.Mappings = Object.fromEntries(this.mappings);
        }

        const outputs: Record<string, OutputDeclaration> = {
            ...Object.fromEntries(this.outputs),
            dateGenerated: { Value: generatedAt.toISOString(), Description: "Date the template was generated" },
        };
        document.Outputs = outputs;

        const hash = createHash("sha256").update(JSON.stringify(document)).digest("hex");
        outputs.templateValidationHash = { Value: hash, Description: "SHA-256 of the template without this output" };

        return structuredClone(document);
    }

    public render(generatedAt?: Date): string {
        return JSON.stringify(this.toDocument(generatedAt), null, 4);
    }

    private checkLogicalId(kind: string, name: string): void {
        if (!LOGICAL_ID_PATTERN.test(name)) {
            throw new TemplateError(this.name, `${kind} name '${name}' must be alphanumeric`);
        }
    }

    private checkParameter(name: string, declaration: ParameterDeclaration): ParameterDeclaration {
        this.checkLogicalId("parameter", name);
        if (typeof declaration.Type !== "string" || declaration.Type === "") {
            throw new TemplateError(this.name, `parameter '${name}' has no Type`);
        }
        return structuredClone(declaration);
    }
}

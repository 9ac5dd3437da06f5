import { createHash } from "crypto";
import {
    GENERATED_OUTPUTS,
    Template,
    TemplateDocument,
    ec2KeyParameter,
    getAtt,
    ref,
    remoteAccessParameter
} from "./index";
import { TemplateError } from "../shared/utils/error-handling";

const GENERATED_AT = new Date("2024-03-04T05:06:07.000Z");

describe("Template", () => {
    let template: Template;

    beforeEach(() => {
        template = new Template("network", "Network resources");
    });

    describe("parameters", () => {
        test("adds parameters in declaration order and returns a reference", () => {
            expect(template.addParameter("vpcCidr", { Type: "String" })).toEqual({ Ref: "vpcCidr" });
            template.addParameter("ec2Key", ec2KeyParameter("test-key"));

            expect(template.getParameterNames()).toEqual(["vpcCidr", "ec2Key"]);
            expect(template.getParameter("ec2Key")?.Default).toBe("test-key");
        });

        test("rejects duplicate parameters", () => {
            template.addParameter("vpcCidr", { Type: "String" });

            expect(() => template.addParameter("vpcCidr", { Type: "String" }))
                .toThrow("[network] duplicate parameter 'vpcCidr'");
        });

        test("keeps the first declaration when adding idempotently", () => {
            template.addParameterIdempotent("remoteAccessLocation", remoteAccessParameter());
            template.addParameterIdempotent("remoteAccessLocation", { Type: "String", Default: "10.0.0.0/8" });

            expect(template.getParameter("remoteAccessLocation")?.Default).toBe("0.0.0.0/0");
        });

        test("rejects parameters without a type", () => {
            expect(() => template.addParameter("vpcCidr", { Type: "" })).toThrow("[network] parameter 'vpcCidr' has no Type");
        });

        test("hands out copies of declarations", () => {
            template.addParameter("vpcCidr", { Type: "String", AllowedValues: ["10.0.0.0/16"] });

            template.getParameter("vpcCidr")?.AllowedValues?.push("10.1.0.0/16");

            expect(template.getParameter("vpcCidr")?.AllowedValues).toEqual(["10.0.0.0/16"]);
        });
    });

    describe("resources and outputs", () => {
        test("requires alphanumeric logical ids", () => {
            expect(() => template.addResource("log-bucket", { Type: "AWS::S3::Bucket" }))
                .toThrow(new TemplateError("network", "resource name 'log-bucket' must be alphanumeric").message);
            expect(() => template.addOutput("vpc_id", { Value: "x" })).toThrow("output name 'vpc_id' must be alphanumeric");
        });

        test("rejects duplicate resources but lets setResource replace them", () => {
            template.addResource("logBucket", { Type: "AWS::S3::Bucket" });

            expect(() => template.addResource("logBucket", { Type: "AWS::S3::Bucket" }))
                .toThrow("[network] duplicate resource 'logBucket'");

            template.setResource("logBucket", { Type: "AWS::S3::Bucket", DeletionPolicy: "Retain" });
            expect(template.getResource("logBucket")?.DeletionPolicy).toBe("Retain");
            expect(template.getResourceNames()).toEqual(["logBucket"]);
        });

        test("adds the utility bucket with an optional name", () => {
            template.addUtilityBucket();
            expect(template.getResource("utilityBucket")).toEqual({ Type: "AWS::S3::Bucket", DeletionPolicy: "Retain" });

            template.addUtilityBucket("test-logs");
            expect(template.getResource("utilityBucket")?.Properties).toEqual({ BucketName: "test-logs" });
        });

        test("does not record generated outputs", () => {
            template.addOutput("vpcId", { Value: ref("vpc") });
            template.addOutput("dateGenerated", { Value: "yesterday" });

            expect(template.getOutputNames()).toEqual(["vpcId", "dateGenerated"]);
            expect(template.recordedOutputNames()).toEqual(["vpcId"]);
            expect(GENERATED_OUTPUTS).toContain("dateGenerated");
        });
    });

    describe("addCommonParameters", () => {
        test("declares network parameters per availability zone", () => {
            template.addCommonParameters(["public", "private"], 2);
            template.addCommonParameters(["public", "private"], 2);

            expect(template.getParameterNames()).toEqual([
                "vpcCidr",
                "vpcId",
                "commonSecurityGroup",
                "utilityBucket",
                "availabilityZone1",
                "publicSubnet1",
                "privateSubnet1",
                "availabilityZone2",
                "publicSubnet2",
                "privateSubnet2",
            ]);
        });
    });

    describe("toDocument", () => {
        test("renders only the sections in use plus generated outputs", () => {
            template.addResource("vpc", { Type: "AWS::EC2::VPC", Properties: { CidrBlock: "10.0.0.0/16" } });

            const document = template.toDocument(GENERATED_AT);

            expect(Object.keys(document)).toEqual(["AWSTemplateFormatVersion", "Description", "Resources", "Outputs"]);
            expect(document.AWSTemplateFormatVersion).toBe("2010-09-09");
            expect(document.Description).toBe("Network resources");
            expect(document.Outputs?.dateGenerated.Value).toBe("2024-03-04T05:06:07.000Z");
        });

        test("includes parameters and mappings once declared", () => {
            template.addParameter("ec2Key", ec2KeyParameter("test-key"));
            template.addAmiMapping({ "us-east-1": { amazonLinux: "ami-00000001" } });

            const document = template.toDocument(GENERATED_AT);

            expect(document.Parameters?.ec2Key.Type).toBe("String");
            expect(document.Mappings).toEqual({ RegionMap: { "us-east-1": { amazonLinux: "ami-00000001" } } });
        });

        test("hashes the document without the hash output", () => {
            template.addOutput("vpcId", { Value: getAtt("vpc", "VpcId") });

            const document: TemplateDocument = template.toDocument(GENERATED_AT);
            const outputs = document.Outputs ?? {};
            const hash = outputs.templateValidationHash.Value;
            delete outputs.templateValidationHash;

            expect(Object.keys(outputs)).toEqual(["vpcId", "dateGenerated"]);
            expect(hash).toBe(createHash("sha256").update(JSON.stringify(document)).digest("hex"));
        });

        test("renders the same text for the same timestamp", () => {
            template.addResource("vpc", { Type: "AWS::EC2::VPC" });

            const rendered = template.render(GENERATED_AT);

            expect(rendered).toBe(template.render(GENERATED_AT));
            expect(JSON.parse(rendered).Resources).toEqual({ vpc: { Type: "AWS::EC2::VPC" } });
            expect(rendered.split("\n")[1]).toBe('    "AWSTemplateFormatVersion": "2010-09-09",');
        });
    });
});

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_AMI_CACHE_FILENAME, Environment, EnvironmentOptions, FACTORY_DEFAULT_AMI_CACHE } from "./index";
import { Template } from "../template";
import { readSection } from "../../automation/config-manager";
import { StackProgressReporter } from "../../automation/stack-event-handlers";
import { StackEventHandler } from "../../automation/stack-event-monitor";
import { ConfigLoadError, HandlerRegistrationError, TemplateError } from "../shared/utils/error-handling";
import { DeploymentLogger } from "../shared/utils/logging";
import {
    FakeNotificationProvider,
    FakeObjectStore,
    FakeStackApi,
    ManualClock,
    makeTempDir,
    removeDir,
    stackStatusMessage,
    testConfig
} from "../../tests/test-utils";

const GENERATED_AT = new Date("2024-03-04T05:06:07.000Z");
const KEY_SERIAL = 1709528767;

class BastionTemplate extends Template {
    constructor() {
        super("bastion", "Bastion host");
    }

    public buildHook(): void {
        this.addResource("bastionInstance", { Type: "AWS::EC2::Instance" });
    }
}

class DemoEnvironment extends Environment {
    protected async buildRootTemplate(template: Template): Promise<void> {
        template.addResource("vpc", { Type: "AWS::EC2::VPC" });
        await this.addChildTemplate(new BastionTemplate());
    }
}

describe("Environment", () => {
    let workDir: string;
    let stackApi: FakeStackApi;
    let objectStore: FakeObjectStore;
    let notifications: FakeNotificationProvider;
    let clock: ManualClock;

    const options = (overrides: Partial<EnvironmentOptions> = {}): EnvironmentOptions => ({
        config: testConfig(),
        collaborators: { stackApi, objectStore, notifications },
        workDir,
        monitor: { now: clock.now },
        now: () => GENERATED_AT,
        ...overrides,
    });

    beforeEach(() => {
        workDir = makeTempDir();
        stackApi = new FakeStackApi();
        objectStore = new FakeObjectStore();
        notifications = new FakeNotificationProvider();
        clock = new ManualClock();
        notifications.onReceive = () => clock.advance(1000);
    });

    afterEach(() => {
        removeDir(workDir);
    });

    describe("initializeTemplate", () => {
        test("adds root parameters, the utility bucket and the AMI map", () => {
            const environment = new Environment(options());

            const template = environment.initializeTemplate();

            expect(environment.rootTemplate).toBe(template);
            expect(template.name).toBe("demo.template");
            expect(template.description).toBe("Demo environment");
            expect(template.getParameterNames()).toEqual(["ec2Key", "remoteAccessLocation"]);
            expect(template.getParameter("ec2Key")?.Default).toBe("test-key");
            expect(template.getResource("utilityBucket")).toEqual({ Type: "AWS::S3::Bucket", DeletionPolicy: "Retain" });
            expect(environment.manualParameterBindings).toEqual({ utilityBucket: { Ref: "utilityBucket" } });
            expect(template.getMapping("RegionMap")).toEqual(FACTORY_DEFAULT_AMI_CACHE);
        });

        test("names the utility bucket when configured", () => {
            const config = testConfig();
            readSection(config, "template").utility_bucket = "test-logs";

            const template = new Environment(options({ config })).initializeTemplate();

            expect(template.getResource("utilityBucket")?.Properties).toEqual({ BucketName: "test-logs" });
        });

        test("requires initialization before use", () => {
            expect(() => new Environment(options()).rootTemplate).toThrow(TemplateError);
        });

        test("reads the region from the aws section", () => {
            expect(new Environment(options()).region).toBe("us-east-1");
        });
    });

    describe("loadAmiCache", () => {
        test("writes the bundled cache when none exists", () => {
            new Environment(options()).initializeTemplate();

            const written = fs.readFileSync(path.join(workDir, DEFAULT_AMI_CACHE_FILENAME), "utf8");
            expect(written).toBe(`${JSON.stringify(FACTORY_DEFAULT_AMI_CACHE, null, 4)}\n`);
        });

        test("uses an existing cache", () => {
            fs.writeFileSync(path.join(workDir, DEFAULT_AMI_CACHE_FILENAME), '{ "us-east-1": { "amazonLinuxAmiId": "ami-test" } }');

            const template = new Environment(options()).initializeTemplate();

            expect(template.getMapping("RegionMap")).toEqual({ "us-east-1": { amazonLinuxAmiId: "ami-test" } });
        });

        test("fails when the cache is missing and may not be created", () => {
            const cachePath = path.join(workDir, DEFAULT_AMI_CACHE_FILENAME);

            expect(() => new Environment(options({ createMissingFiles: false })).initializeTemplate())
                .toThrow(new ConfigLoadError(cachePath, "could not be found").message);
            expect(fs.existsSync(cachePath)).toBe(false);
        });

        test("rejects caches of the wrong shape", () => {
            fs.writeFileSync(path.join(workDir, DEFAULT_AMI_CACHE_FILENAME), '{ "us-east-1": ["ami-test"] }');

            expect(() => new Environment(options()).initializeTemplate()).toThrow("must map regions to name -> AMI id mappings");
        });
    });

    describe("addChildTemplate", () => {
        test("uploads the child and embeds it as a stack resource", async () => {
            const environment = new Environment(options());
            const root = environment.initializeTemplate();
            const child = new BastionTemplate();

            await expect(environment.addChildTemplate(child)).resolves.toEqual({ Ref: "bastionStack" });

            const key = `templates/bastion.${KEY_SERIAL}.template`;
            expect(objectStore.objects).toHaveLength(1);
            expect(objectStore.objects[0]).toMatchObject({ bucket: "test-bucket", key, acl: "private" });
            expect(JSON.parse(objectStore.objects[0].body).Resources.bastionInstance).toEqual({ Type: "AWS::EC2::Instance" });
            expect(child.getMapping("RegionMap")).toEqual(FACTORY_DEFAULT_AMI_CACHE);

            expect(root.getResource("bastionStack")).toEqual({
                Type: "AWS::CloudFormation::Stack",
                Properties: {
                    TemplateURL: `https://test-bucket.s3.amazonaws.com/${key}`,
                    Parameters: {
                        vpcCidr: { Ref: "vpcCidr" },
                        vpcId: { Ref: "vpcId" },
                        commonSecurityGroup: { Ref: "commonSecurityGroup" },
                        utilityBucket: { Ref: "utilityBucket" },
                        availabilityZone1: { "Fn::GetAtt": ["privateSubnet1", "AvailabilityZone"] },
                        publicSubnet1: { Ref: "publicSubnet1" },
                        privateSubnet1: { Ref: "privateSubnet1" },
                        availabilityZone2: { "Fn::GetAtt": ["privateSubnet2", "AvailabilityZone"] },
                        publicSubnet2: { Ref: "publicSubnet2" },
                        privateSubnet2: { Ref: "privateSubnet2" },
                        ec2Key: { Ref: "ec2Key" },
                    },
                    TimeoutInMinutes: 30,
                },
            });
            expect(root.getParameterNames()).toEqual([
                "ec2Key",
                "remoteAccessLocation",
                "vpcCidr",
                "vpcId",
                "commonSecurityGroup",
                "publicSubnet1",
                "privateSubnet1",
                "publicSubnet2",
                "privateSubnet2",
            ]);
            expect(environment.stackOutputs.get("bastion")).toEqual([]);
        });

        test("honours per-child upload settings", async () => {
            const environment = new Environment(options());
            environment.initializeTemplate();

            await environment.addChildTemplate(new Template("bastion"), {
                templateBucket: "other-bucket",
                s3TemplatePrefix: "nested",
                templateUploadAcl: "bucket-owner-full-control",
            });

            expect(objectStore.objects[0]).toMatchObject({
                bucket: "other-bucket",
                key: `nested/bastion.${KEY_SERIAL}.template`,
                acl: "bucket-owner-full-control",
            });
        });

        test("binds sibling outputs and orders the child stacks", async () => {
            const environment = new Environment(options());
            const root = environment.initializeTemplate();
            const network = new Template("network");
            network.addOutput("natGateway", { Value: { Ref: "nat" } });
            const app = new Template("app");
            app.addParameter("natGateway", { Type: "String" });

            await environment.addChildTemplate(network);
            await environment.addChildTemplate(app, { dependsOn: ["networkStack"] });

            const appStack = root.getResource("appStack");
            expect(appStack?.DependsOn).toEqual(["networkStack"]);
            expect(appStack?.Properties?.Parameters).toMatchObject({
                natGateway: { "Fn::GetAtt": ["networkStack", "Outputs.natGateway"] },
            });
            expect(environment.stackOutputs.get("network")).toEqual(["natGateway"]);
            expect(() => environment.checkDependsOn()).not.toThrow();
        });

        test("replaces the stack resource when a child is attached again", async () => {
            const environment = new Environment(options());
            const root = environment.initializeTemplate();

            await environment.addChildTemplate(new BastionTemplate());
            const parameters = root.getResource("bastionStack")?.Properties?.Parameters;
            await environment.addChildTemplate(new BastionTemplate());

            expect(root.getResourceNames()).toEqual(["utilityBucket", "bastionStack"]);
            expect(root.getResource("bastionStack")?.Properties?.Parameters).toEqual(parameters);
        });

        test("lets child stacks depend on plain root resources", async () => {
            const environment = new Environment(options());
            const root = environment.initializeTemplate();
            root.addResource("vpc", { Type: "AWS::EC2::VPC" });

            await environment.addChildTemplate(new Template("app"), { dependsOn: ["vpc", "utilityBucket"] });
            const written = environment.writeTemplateToFile();

            const document = JSON.parse(fs.readFileSync(written, "utf8"));
            expect(document.Resources.appStack.DependsOn).toEqual(["vpc", "utilityBucket"]);
        });

        test("rejects DependsOn targets missing from the root template", async () => {
            const environment = new Environment(options());
            environment.initializeTemplate();

            await environment.addChildTemplate(new Template("app"), { dependsOn: ["vpc"] });

            expect(() => environment.writeTemplateToFile())
                .toThrow("[demo.template] 'appStack' depends on 'vpc' which does not exist");
            expect(fs.existsSync(path.join(workDir, "templates", "demo.template"))).toBe(false);
        });

        test("reports dependency cycles between child stacks", () => {
            const environment = new Environment(options());
            const root = environment.initializeTemplate();
            root.setResource("aStack", { Type: "AWS::CloudFormation::Stack", DependsOn: ["bStack"] });
            root.setResource("bStack", { Type: "AWS::CloudFormation::Stack", DependsOn: ["aStack"] });

            expect(() => environment.checkDependsOn()).toThrow(TemplateError);
            expect(() => environment.writeTemplateToFile())
                .toThrow("[demo.template] Circular dependency involving 'aStack', 'bStack'");
        });
    });

    describe("template files", () => {
        test("writes the root template and reads it back with whitespace collapsed", async () => {
            const environment = new DemoEnvironment(options());

            const written = await environment.createAction();

            expect(written).toBe(path.join(workDir, "templates", "demo.template"));
            const document = JSON.parse(fs.readFileSync(written, "utf8"));
            expect(Object.keys(document.Resources)).toEqual(["utilityBucket", "vpc", "bastionStack"]);
            expect(document.Outputs.dateGenerated.Value).toBe("2024-03-04T05:06:07.000Z");
            expect(environment.loadRootTemplate().startsWith(
                '{ "AWSTemplateFormatVersion": "2010-09-09", "Description": "Demo environment", "Resources": { "utilityBucket": '
            )).toBe(true);
            expect(stackApi.calls).toHaveLength(0);
        });

        test("asks for the create action when no template was written", () => {
            const templatePath = path.join(workDir, "templates", "demo.template");

            expect(() => new Environment(options()).loadRootTemplate())
                .toThrow(`${templatePath}: could not be found; run the create action first`);
        });
    });

    describe("stack event handlers", () => {
        test("rejects handlers without handleStackEvent", () => {
            const environment = new Environment(options());
            const broken: StackEventHandler = { handleStackEvent: () => true };
            Reflect.deleteProperty(broken, "handleStackEvent");

            expect(() => environment.addStackEventHandler(broken)).toThrow(HandlerRegistrationError);
            expect(environment.getStackEventHandlers()).toHaveLength(0);
        });
    });

    describe("actions", () => {
        test("deploys the written template without monitoring when no handlers are registered", async () => {
            const environment = new DemoEnvironment(options());
            await environment.createAction();
            environment.deployParameterBindings.push({ ParameterKey: "ec2Key", ParameterValue: "test-key" });

            const result = await environment.deployAction();

            expect(result).toMatchObject({ stackName: "demo", action: "updated" });
            expect(stackApi.calls[0].request?.templateBody).toBe(environment.loadRootTemplate());
            expect(stackApi.calls[0].request?.parameters).toEqual([{ ParameterKey: "ec2Key", ParameterValue: "test-key" }]);
            expect(notifications.receiveCalls).toBe(0);
        });

        test("monitors the deployment through a channel named after the environment", async () => {
            const environment = new DemoEnvironment(options());
            await environment.createAction();
            const reporter = new StackProgressReporter("demo", new DeploymentLogger("demo"));
            environment.addStackEventHandler(reporter);
            notifications.enqueue(stackStatusMessage("demo", "UPDATE_COMPLETE"));

            const result = await environment.deployAction();

            expect(result.monitor).toMatchObject({ state: "Terminated", finalStatus: "UPDATE_COMPLETE" });
            expect(stackApi.calls[0].request?.notificationArns[0]).toMatch(/^arn:aws:sns:us-east-1:000000000000:demo_\d{8}-\d{6}_[a-z0-9]{5}$/);
            expect(notifications.topics.size).toBe(0);
        });

        test("deletes the environment stack", async () => {
            await new Environment(options()).deleteAction();

            expect(stackApi.calls).toEqual([{ method: "deleteStack", stackName: "demo" }]);
        });
    });
});

import * as fs from "fs";
import * as path from "path";
import bundledAmiCache from "../../resources/ami-cache.json";
import { ConfigManager, readSection, readString } from "../../automation/config-manager";
import { checkDependencies } from "../../automation/dependency-resolver";
import { DeploymentOrchestrator } from "../../automation/deployment-orchestrator";
import { StackEventHandler, assertStackEventHandler } from "../../automation/stack-event-monitor";
import {
    ConfigSection,
    DeploymentResult,
    GlobalSettings,
    MonitorOptions,
    NetworkSettings,
    TemplateSettings
} from "../../automation/types";
import { ParameterBindingResolver, childStackName } from "../parameter-binding";
import { NotificationChannelProvider, ObjectStore, StackApi, StackParameter } from "../shared/interfaces";
import { ConfigLoadError, TemplateError, toError } from "../shared/utils/error-handling";
import { ComponentLogger, DeploymentLogger } from "../shared/utils/logging";
import {
    RefExpression,
    STACK_RESOURCE_TYPE,
    Template,
    TemplateMapping,
    TemplateValue,
    ec2KeyParameter,
    remoteAccessParameter
} from "../template";

export const DEFAULT_AMI_CACHE_FILENAME = "ami_cache.json";
export const TEMPLATES_DIRECTORY = "templates";

export const FACTORY_DEFAULT_AMI_CACHE: TemplateMapping = bundledAmiCache;

export interface EnvironmentCollaborators {
    stackApi: StackApi;
    objectStore: ObjectStore;
    /** Needed only when stack event handlers are registered */
    notifications?: NotificationChannelProvider;
}

export interface EnvironmentOptions {
    /** Validated configuration tree */
    config: ConfigSection;
    collaborators: EnvironmentCollaborators;
    /** Write the bundled AMI cache when none is found, default true */
    createMissingFiles?: boolean;
    /** Directory holding ami_cache.json and templates/, default the working directory */
    workDir?: string;
    monitor?: MonitorOptions;
    logger?: ComponentLogger;
    deploymentLogger?: DeploymentLogger;
    /** Clock for upload keys and channel names */
    now?: () => Date;
}

export interface ChildTemplateOptions {
    templateBucket?: string;
    s3TemplatePrefix?: string;
    templateUploadAcl?: string;
    /** Extra stack resources the child stack must wait for */
    dependsOn?: string[];
}

function isTemplateMapping(value: unknown): value is TemplateMapping {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return false;
    }
    return Object.values(value).every(entry =>
        typeof entry === "object" && entry !== null && !Array.isArray(entry)
        && Object.values(entry).every(item => typeof item === "string"));
}

/**
 * Composes a root template from child templates and drives its deployment.
 *
 * Subclasses add their resources in `buildRootTemplate()` and attach children with
 * `addChildTemplate()`; child parameters are bound by name to the root template.
 */
export class Environment {
    public readonly config: ConfigSection;
    public readonly globals: GlobalSettings;
    public readonly templateSettings: TemplateSettings;
    public readonly network: NetworkSettings;
    public readonly createMissingFiles: boolean;
    public readonly workDir: string;

    /** Parameter name -> value, consulted first for every child parameter */
    public readonly manualParameterBindings: Record<string, TemplateValue> = {};
    /** Parameters passed to create/update of the root stack */
    public readonly deployParameterBindings: StackParameter[] = [];
    /** Child template name -> recorded output names */
    public readonly stackOutputs = new Map<string, string[]>();

    private readonly stackEventHandlers: StackEventHandler[] = [];
    private readonly collaborators: EnvironmentCollaborators;
    private readonly monitorOptions?: MonitorOptions;
    private readonly logger: ComponentLogger;
    private readonly deploymentLogger: DeploymentLogger;
    private readonly resolver: ParameterBindingResolver;
    private readonly now: () => Date;
    private template?: Template;

    constructor(options: EnvironmentOptions) {
        this.config = options.config;
        this.globals = ConfigManager.getGlobals(options.config);
        this.templateSettings = ConfigManager.getTemplateSettings(options.config);
        this.network = ConfigManager.getNetworkSettings(options.config);
        this.collaborators = options.collaborators;
        this.createMissingFiles = options.createMissingFiles ?? true;
        this.workDir = options.workDir ?? process.cwd();
        this.monitorOptions = options.monitor;
        this.logger = options.logger ?? new ComponentLogger("Environment", this.globals.environmentName);
        this.deploymentLogger = options.deploymentLogger ?? new DeploymentLogger(this.globals.environmentName);
        this.resolver = new ParameterBindingResolver(this.logger.forOperation("bind"));
        this.now = options.now ?? (() => new Date());
    }

    public get region(): string {
        return readString(readSection(this.config, "aws"), "region", "aws");
    }

    public get rootTemplate(): Template {
        if (!this.template) {
            throw new TemplateError(this.globals.output, "root template is not initialized; call initializeTemplate() first");
        }
        return this.template;
    }

    /**
     * New root template with the common root parameters, the utility bucket and the AMI map
     */
    public initializeTemplate(): Template {
        const template = new Template(this.globals.output, this.templateSettings.description);
        this.template = template;

        template.addParameterIdempotent("ec2Key", ec2KeyParameter(this.templateSettings.ec2KeyDefault));
        template.addParameterIdempotent("remoteAccessLocation", remoteAccessParameter());
        this.manualParameterBindings.utilityBucket = template.addUtilityBucket(this.templateSettings.utilityBucket);
        this.loadAmiCache(template);

        return template;
    }

    /**
     * Attach the region -> AMI map: ami_cache.json in the work directory, else the bundled
     * catalog (written there when missing files may be created)
     */
    public loadAmiCache(template: Template): void {
        const cachePath = path.join(this.workDir, DEFAULT_AMI_CACHE_FILENAME);

        if (fs.existsSync(cachePath)) {
            template.addAmiMapping(this.readAmiCache(cachePath));
            return;
        }
        if (!this.createMissingFiles) {
            throw new ConfigLoadError(cachePath, "could not be found");
        }

        fs.writeFileSync(cachePath, `${JSON.stringify(FACTORY_DEFAULT_AMI_CACHE, null, 4)}\n`, "utf8");
        this.logger.info(`Wrote bundled AMI cache to ${cachePath}`);
        template.addAmiMapping(FACTORY_DEFAULT_AMI_CACHE);
    }

    public addCommonParamsToChildTemplate(template: Template): void {
        template.addCommonParameters(this.network.subnetTypes, this.network.azCount);
        template.addParameterIdempotent("ec2Key", ec2KeyParameter(this.templateSettings.ec2KeyDefault));
    }

    /**
     * Upload a child template and embed it in the root template as `<name>Stack`.
     * Attaching the same child again replaces its stack resource.
     */
    public async addChildTemplate(child: Template, options: ChildTemplateOptions = {}): Promise<RefExpression> {
        const root = this.rootTemplate;

        this.addCommonParamsToChildTemplate(child);
        this.loadAmiCache(child);
        child.buildHook();

        const templateUrl = await this.uploadTemplate(child, options);

        this.stackOutputs.set(child.name, child.recordedOutputNames());
        const bindings = this.resolver.resolve(child, this.manualParameterBindings, root, this.stackOutputs);

        const dependsOn = [...new Set([...(options.dependsOn ?? []), ...bindings.dependsOn])];
        const stackName = childStackName(child.name);

        this.logger.info(`Attached child template ${child.name} as ${stackName}`, {
            templateName: child.name,
            templateUrl,
            addedParentParameters: bindings.addedParentParameters,
        });

        return root.setResource(stackName, {
            Type: STACK_RESOURCE_TYPE,
            Properties: {
                TemplateURL: templateUrl,
                Parameters: bindings.parameters,
                TimeoutInMinutes: this.templateSettings.timeoutInMinutes,
            },
            ...(dependsOn.length > 0 ? { DependsOn: dependsOn } : {}),
        });
    }

    /**
     * Store the rendered template under `<prefix>/<name>.<unixSeconds>.template`; returns its URL
     */
    public async uploadTemplate(template: Template, options: ChildTemplateOptions = {}): Promise<string> {
        const generatedAt = this.now();
        const keySerial = Math.floor(generatedAt.getTime() / 1000);
        const bucket = options.templateBucket ?? this.templateSettings.templateBucket;
        const prefix = options.s3TemplatePrefix ?? this.templateSettings.s3TemplatePrefix;
        const acl = options.templateUploadAcl ?? this.templateSettings.templateUploadAcl;
        const key = `${prefix}/${template.name}.${keySerial}.template`;

        const url = await this.collaborators.objectStore.putObject(bucket, key, template.render(generatedAt), acl);
        this.logger.debug(`Uploaded ${template.name} to ${url}`, { templateName: template.name, bucket, key });
        return url;
    }

    /**
     * Check the DependsOn edges of every root resource: targets must exist and must not loop
     */
    public checkDependsOn(): void {
        const root = this.rootTemplate;
        const nodes = root.getResourceNames().map(name => ({
            name,
            dependencies: root.getResource(name)?.DependsOn ?? [],
        }));

        try {
            checkDependencies(nodes);
        } catch (error) {
            throw new TemplateError(root.name, toError(error).message);
        }
    }

    public templatePath(): string {
        return path.join(this.workDir, TEMPLATES_DIRECTORY, this.globals.output);
    }

    /**
     * Render the root template to templates/<global.output>; returns the path written
     */
    public writeTemplateToFile(): string {
        const root = this.rootTemplate;
        this.checkDependsOn();

        const localPath = this.templatePath();
        fs.mkdirSync(path.dirname(localPath), { recursive: true });

        const reloaded: unknown = JSON.parse(root.render(this.now()));
        fs.writeFileSync(localPath, JSON.stringify(reloaded, null, 4), "utf8");

        this.logger.info(`Wrote root template to ${localPath}`, { templateName: root.name });
        return localPath;
    }

    /**
     * The written root template with whitespace runs collapsed
     */
    public loadRootTemplate(): string {
        const localPath = this.templatePath();
        if (!fs.existsSync(localPath)) {
            throw new ConfigLoadError(localPath, "could not be found; run the create action first");
        }
        return fs.readFileSync(localPath, "utf8").replace(/\s+/g, " ");
    }

    /**
     * Fail-fast registration into the stack event handler chain
     */
    public addStackEventHandler(handler: StackEventHandler): void {
        assertStackEventHandler(handler);
        this.stackEventHandlers.push(handler);
    }

    public getStackEventHandlers(): readonly StackEventHandler[] {
        return this.stackEventHandlers;
    }

    /**
     * Subclasses add resources and child templates to the root template here
     */
    protected async buildRootTemplate(_template: Template): Promise<void> {
        // nothing by default
    }

    public async createAction(): Promise<string> {
        const template = this.initializeTemplate();
        await this.buildRootTemplate(template);
        return this.writeTemplateToFile();
    }

    public async deployAction(signal?: AbortSignal): Promise<DeploymentResult> {
        return this.orchestrator().deploy({
            stackName: this.globals.environmentName,
            templateBody: this.loadRootTemplate(),
            parameters: [...this.deployParameterBindings],
            handlers: this.stackEventHandlers,
            channelPrefix: this.globals.environmentName,
            signal,
        });
    }

    public async deleteAction(): Promise<void> {
        await this.orchestrator().destroy(this.globals.environmentName);
    }

    private orchestrator(): DeploymentOrchestrator {
        return new DeploymentOrchestrator(
            { stackApi: this.collaborators.stackApi, notifications: this.collaborators.notifications },
            {
                timeoutInMinutes: this.templateSettings.timeoutInMinutes,
                monitor: this.monitorOptions,
                logger: this.deploymentLogger,
                now: this.now,
            }
        );
    }

    private readAmiCache(cachePath: string): TemplateMapping {
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(cachePath, "utf8"));
        } catch (error) {
            throw new ConfigLoadError(cachePath, "could not be parsed", error);
        }
        if (!isTemplateMapping(parsed)) {
            throw new ConfigLoadError(cachePath, "must map regions to name -> AMI id mappings");
        }
        return parsed;
    }
}

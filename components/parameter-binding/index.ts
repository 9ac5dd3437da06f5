import { Template, TemplateValue, getAtt, ref } from "../template";
import { BindingResolutionError } from "../shared/utils/error-handling";
import { ComponentLogger } from "../shared/utils/logging";

/**
 * Where a child template parameter got its value, in precedence order
 */
export type BindingSource =
    | "manual"
    | "availability-zone"
    | "parent-parameter"
    | "parent-resource"
    | "stack-output"
    | "pass-through";

/**
 * Child template name -> output names it records
 */
export type OutputRegistry = ReadonlyMap<string, readonly string[]>;

export interface ResolvedBindings {
    /** Parameter name -> literal, Ref or Fn::GetAtt */
    parameters: Record<string, TemplateValue>;
    sources: Record<string, BindingSource>;
    /** Sibling stack resources that must complete before this child */
    dependsOn: string[];
    /** Parameters copied onto the parent by the pass-through rule */
    addedParentParameters: string[];
}

const AVAILABILITY_ZONE_PARAMETER = /^availabilityZone(\d+)$/;

/**
 * Logical name of the stack resource that embeds a child template
 */
export function childStackName(templateName: string): string {
    return `${templateName}Stack`;
}

/**
 * Resolves every parameter a child template declares to a value available in the parent:
 *
 * 1. manual binding supplied by the caller
 * 2. `availabilityZone<N>` -> AvailabilityZone attribute of parent resource `privateSubnet<N>`
 * 3. parent parameter of the same name
 * 4. parent resource of the same name
 * 5. output of the same name recorded by exactly one sibling template (adds a DependsOn edge)
 * 6. otherwise the child's declaration is copied onto the parent and passed through
 *
 * Rule 6 mutates the parent, checked-and-inserted in the child's declaration order, so
 * attaching the same child again binds to the copied parameter through rule 3.
 */
export class ParameterBindingResolver {
    private readonly logger: ComponentLogger;

    constructor(logger?: ComponentLogger) {
        this.logger = logger ?? new ComponentLogger("ParameterBindingResolver", "default");
    }

    public resolve(
        child: Template,
        manualBindings: Readonly<Record<string, TemplateValue>>,
        parent: Template,
        outputRegistry: OutputRegistry
    ): ResolvedBindings {
        const resolved: ResolvedBindings = {
            parameters: {},
            sources: {},
            dependsOn: [],
            addedParentParameters: [],
        };

        for (const name of child.getParameterNames()) {
            const [value, source] = this.resolveOne(child, name, manualBindings, parent, outputRegistry, resolved);
            resolved.parameters[name] = value;
            resolved.sources[name] = source;
            this.logger.parameterBinding(child.name, name, source);
        }

        return resolved;
    }

    private resolveOne(
        child: Template,
        name: string,
        manualBindings: Readonly<Record<string, TemplateValue>>,
        parent: Template,
        outputRegistry: OutputRegistry,
        resolved: ResolvedBindings
    ): [TemplateValue, BindingSource] {
        if (Object.hasOwn(manualBindings, name)) {
            return [structuredClone(manualBindings[name]), "manual"];
        }

        const zone = AVAILABILITY_ZONE_PARAMETER.exec(name);
        if (zone) {
            return [getAtt(`privateSubnet${zone[1]}`, "AvailabilityZone"), "availability-zone"];
        }

        if (parent.hasParameter(name)) {
            return [ref(name), "parent-parameter"];
        }

        if (parent.hasResource(name)) {
            return [ref(name), "parent-resource"];
        }

        const producer = this.findOutputProducer(child.name, name, outputRegistry);
        if (producer !== undefined) {
            const stackName = childStackName(producer);
            if (!resolved.dependsOn.includes(stackName)) {
                resolved.dependsOn.push(stackName);
            }
            return [getAtt(stackName, `Outputs.${name}`), "stack-output"];
        }

        const declaration = child.getParameter(name);
        if (!declaration) {
            throw new BindingResolutionError(child.name, name, "declaration disappeared during composition");
        }
        parent.addParameter(name, declaration);
        resolved.addedParentParameters.push(name);
        return [ref(name), "pass-through"];
    }

    private findOutputProducer(childName: string, outputName: string, outputRegistry: OutputRegistry): string | undefined {
        const producers: string[] = [];
        for (const [templateName, outputs] of outputRegistry) {
            if (templateName !== childName && outputs.includes(outputName)) {
                producers.push(templateName);
            }
        }

        if (producers.length > 1) {
            throw new BindingResolutionError(
                childName,
                outputName,
                `output recorded by several templates (${producers.join(", ")}); add a manual binding to choose one`
            );
        }
        return producers[0];
    }
}

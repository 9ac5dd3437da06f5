/**
 * A logical id with the logical ids it must come after
 */
export interface DependencyNode {
    name: string;
    dependencies?: string[];
}

/**
 * Check a DependsOn graph: every target must be a known node and the edges must not loop.
 * Throws naming the first unknown target, or the nodes caught in a cycle.
 */
export function checkDependencies(nodes: DependencyNode[]): void {
    const known = new Set(nodes.map(node => node.name));
    for (const node of nodes) {
        const unknown = (node.dependencies ?? []).find(dependency => !known.has(dependency));
        if (unknown !== undefined) {
            throw new Error(`'${node.name}' depends on '${unknown}' which does not exist`);
        }
    }

    const waiting = new Map(nodes.map(node => [node.name, new Set(node.dependencies ?? [])]));
    let ready = readyNodes(waiting);
    while (ready.length > 0) {
        for (const name of ready) {
            waiting.delete(name);
            waiting.forEach(dependencies => dependencies.delete(name));
        }
        ready = readyNodes(waiting);
    }
    if (waiting.size === 0) {
        return;
    }

    // Nodes that only wait on a loop are not part of it
    let trimmed = true;
    while (trimmed) {
        const awaited = new Set([...waiting.values()].flatMap(dependencies => [...dependencies]));
        const idle = [...waiting.keys()].filter(name => !awaited.has(name));
        idle.forEach(name => waiting.delete(name));
        trimmed = idle.length > 0;
    }

    const names = [...waiting.keys()].map(name => `'${name}'`).join(', ');
    throw new Error(`Circular dependency involving ${names}`);
}

function readyNodes(waiting: Map<string, Set<string>>): string[] {
    return [...waiting].filter(([, dependencies]) => dependencies.size === 0).map(([name]) => name);
}

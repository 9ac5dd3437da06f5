import { DependencyNode, checkDependencies } from './dependency-resolver';

describe('checkDependencies', () => {
    it('should accept an empty graph', () => {
        expect(() => checkDependencies([])).not.toThrow();
    });

    it('should accept stacks depending on plain resources and on each other', () => {
        const nodes: DependencyNode[] = [
            { name: 'utilityBucket' },
            { name: 'vpc', dependencies: [] },
            { name: 'networkStack', dependencies: ['vpc'] },
            { name: 'appStack', dependencies: ['networkStack', 'utilityBucket'] },
            { name: 'monitoringStack', dependencies: ['appStack', 'vpc'] }
        ];

        expect(() => checkDependencies(nodes)).not.toThrow();
    });

    it('should accept dependencies declared before their target', () => {
        const nodes: DependencyNode[] = [
            { name: 'appStack', dependencies: ['vpcStack'] },
            { name: 'vpcStack' }
        ];

        expect(() => checkDependencies(nodes)).not.toThrow();
    });

    it('should name the first unknown target', () => {
        const nodes: DependencyNode[] = [
            { name: 'vpc' },
            { name: 'appStack', dependencies: ['vpc', 'nonexistent'] }
        ];

        expect(() => checkDependencies(nodes)).toThrow("'appStack' depends on 'nonexistent' which does not exist");
    });

    it('should detect circular dependencies', () => {
        const nodes: DependencyNode[] = [
            { name: 'stack1', dependencies: ['stack2'] },
            { name: 'stack2', dependencies: ['stack1'] }
        ];

        expect(() => checkDependencies(nodes)).toThrow("Circular dependency involving 'stack1', 'stack2'");
    });

    it('should leave nodes that only wait on a cycle out of the message', () => {
        const nodes: DependencyNode[] = [
            { name: 'vpc' },
            { name: 'appStack', dependencies: ['aStack'] },
            { name: 'aStack', dependencies: ['bStack', 'vpc'] },
            { name: 'bStack', dependencies: ['aStack'] }
        ];

        expect(() => checkDependencies(nodes)).toThrow("Circular dependency involving 'aStack', 'bStack'");
    });

    it('should treat a self dependency as a cycle', () => {
        expect(() => checkDependencies([{ name: 'vpc', dependencies: ['vpc'] }]))
            .toThrow("Circular dependency involving 'vpc'");
    });
});

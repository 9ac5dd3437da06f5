#!/usr/bin/env node

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { Environment } from '../components/environment';
import { createAwsCollaborators } from '../components/shared/utils/aws-clients';
import { ErrorHandler, MonitorAbortedError } from '../components/shared/utils/error-handling';
import { DeploymentLogger, LogLevel, setMinLogLevel } from '../components/shared/utils/logging';
import { ConfigManager, DEFAULT_CONFIG_FILENAME, readSection, readString } from './config-manager';
import { StackProgressReporter } from './stack-event-handlers';
import { ConfigSection, DeploymentResult } from './types';

export interface CliOptions {
    config: string;
    createMissingFiles: boolean;
    debug: boolean;
}

export type EnvironmentFactory = (config: ConfigSection, options: CliOptions) => Environment;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

const defaultEnvironmentFactory: EnvironmentFactory = (config, options) => new Environment({
    config,
    collaborators: createAwsCollaborators({ region: readString(readSection(config, 'aws'), 'region', 'aws') }),
    createMissingFiles: options.createMissingFiles,
});

export function parseOptions(args: string[]): CliOptions {
    const options: CliOptions = {
        config: DEFAULT_CONFIG_FILENAME,
        createMissingFiles: true,
        debug: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === '--config' || arg === '--config-file') {
            if (i + 1 >= args.length) {
                throw new Error(`${arg} needs a file name`);
            }
            options.config = args[i + 1];
            i++; // Skip next argument
        } else if (arg === '--no-create-missing-files') {
            options.createMissingFiles = false;
        } else if (arg === '--debug') {
            options.debug = true;
        } else {
            throw new Error(`Unknown option: ${arg}`);
        }
    }

    return options;
}

/**
 * Command line entry point: create, deploy and delete an environment
 */
export class EnvironmentCLI {
    private readonly environmentFactory: EnvironmentFactory;

    constructor(environmentFactory: EnvironmentFactory = defaultEnvironmentFactory) {
        this.environmentFactory = environmentFactory;
    }

    async run(args: string[] = process.argv.slice(2)): Promise<number> {
        if (args.length === 0) {
            this.printHelp();
            return EXIT_OK;
        }

        const command = args[0];

        try {
            switch (command) {
                case 'init':
                    this.handleInit(parseOptions(args.slice(1)));
                    break;
                case 'validate':
                    this.handleValidate(parseOptions(args.slice(1)));
                    break;
                case 'create':
                    await this.handleCreate(parseOptions(args.slice(1)));
                    break;
                case 'deploy':
                    await this.handleDeploy(parseOptions(args.slice(1)));
                    break;
                case 'delete':
                    await this.handleDelete(parseOptions(args.slice(1)));
                    break;
                case 'help':
                    this.printHelp();
                    break;
                default:
                    console.error(`Unknown command: ${command}`);
                    this.printHelp();
                    return EXIT_FAILURE;
            }
        } catch (error) {
            if (error instanceof MonitorAbortedError) {
                console.error(`⚠️  ${error.message}; the stack operation continues remotely`);
                return EXIT_INTERRUPTED;
            }
            console.error(`Command failed: ${ErrorHandler.describe(error)}`);
            return EXIT_FAILURE;
        }

        return EXIT_OK;
    }

    private loadConfig(options: CliOptions): ConfigSection {
        const manager = new ConfigManager({
            configFilename: options.config,
            createMissingFiles: options.createMissingFiles,
        });
        const config = manager.load();

        if ('db' in config) {
            manager.loadDbPasswordsFromEnv(config);
        }
        if (options.debug || ConfigManager.getGlobals(config).printDebug) {
            setMinLogLevel(LogLevel.DEBUG);
        }
        return config;
    }

    private handleInit(options: CliOptions) {
        if (fs.existsSync(options.config)) {
            console.log(`Configuration ${options.config} already exists`);
            return;
        }

        const manager = new ConfigManager({ configFilename: options.config });
        manager.save(manager.getFactoryDefaults(), options.config);
        console.log(`📝 Wrote factory default configuration to ${options.config}`);
    }

    private handleValidate(options: CliOptions) {
        this.loadConfig(options);
        console.log(`✅ Configuration ${options.config} is valid`);
    }

    private async handleCreate(options: CliOptions) {
        const environment = this.environmentFactory(this.loadConfig(options), options);
        const templatePath = await environment.createAction();
        console.log(`📄 Root template written to ${templatePath}`);
    }

    private async handleDeploy(options: CliOptions) {
        const environment = this.environmentFactory(this.loadConfig(options), options);
        const stackName = environment.globals.environmentName;
        environment.addStackEventHandler(new StackProgressReporter(stackName, new DeploymentLogger(stackName)));

        const controller = new AbortController();
        const onInterrupt = () => {
            console.warn('\nInterrupted: removing the notification channel ...');
            controller.abort();
        };
        process.once('SIGINT', onInterrupt);

        try {
            const result = await environment.deployAction(controller.signal);
            this.printDeploymentResult(result);
        } finally {
            process.removeListener('SIGINT', onInterrupt);
        }
    }

    private async handleDelete(options: CliOptions) {
        const environment = this.environmentFactory(this.loadConfig(options), options);
        await environment.deleteAction();
        console.log(`🗑️  Delete requested for stack ${environment.globals.environmentName}`);
    }

    private printDeploymentResult(result: DeploymentResult) {
        console.log(`\n📊 Deployment Summary: ${result.stackName}`);
        console.log(`   Action: ${result.action}`);
        if (result.stackId) {
            console.log(`   Stack id: ${result.stackId}`);
        }
        if (result.monitor) {
            console.log(`   Monitor: ${result.monitor.state} (${result.monitor.reason}), ${result.monitor.eventsProcessed} event(s)`);
            if (result.monitor.finalStatus) {
                console.log(`   Final status: ${result.monitor.finalStatus}`);
            }
        }
        console.log(`   Duration: ${(result.duration / 1000).toFixed(2)}s`);
    }

    private printHelp() {
        console.log(`
Environment CLI - compose and deploy CloudFormation environments

Usage:
  envstack <command> [options]

Commands:
  init                Write the factory default configuration
  validate            Validate the configuration file
  create              Generate the root template into templates/
  deploy              Create or update the stack from the generated template
  delete              Delete the stack
  help                Show this help message

Options:
  --config <path>             Configuration file (default: ${DEFAULT_CONFIG_FILENAME})
  --no-create-missing-files   Fail instead of writing missing config and AMI cache files
  --debug                     Log at debug level

Environment:
  ENVSTACK_LOG_LEVEL          DEBUG, INFO, WARN, ERROR or SILENT
  <DB>_PASSWORD               Overrides db.<db>.password

Examples:
  # Generate and deploy with the default config.json
  envstack create
  envstack deploy

  # Use a YAML configuration without creating missing files
  envstack deploy --config staging.yaml --no-create-missing-files
        `);
    }
}

// Run CLI if this file is executed directly
if (require.main === module) {
    // Load environment variables from .env file if it exists
    if (fs.existsSync('.env')) {
        dotenv.config();
    }

    const cli = new EnvironmentCLI();
    cli.run().then(code => {
        process.exitCode = code;
    }, error => {
        console.error(error);
        process.exitCode = EXIT_FAILURE;
    });
}

/**
 * envstack: compose CloudFormation environments from child templates and deploy them
 */

export * from './automation';
export * from './components';

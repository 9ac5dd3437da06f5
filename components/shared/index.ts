/**
 * Shared Components
 * Collaborator interfaces, AWS-backed collaborators and utilities
 */

export * from './interfaces';
export * from './utils/aws-clients';
export * from './utils/error-handling';
export * from './utils/logging';

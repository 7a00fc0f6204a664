export * from './domain';
export * from './application';
export * from './infrastructure';
export { AuditConfig, ConfigOverrides, loadConfig, parsePositiveInt, DEFAULT_API_URL } from './config';
export { runAudit, createAuditCommand, AuditFormat, AuditCommandOptions, AuditDependencies } from './cli/commands/audit';
export { createProgram } from './cli/program';

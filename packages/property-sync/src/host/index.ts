export * from './data-service';
export * from './execution-context';
export * from './local-plugin-context';
export * from './plugin-base';
export * from './plugin-execution.error';
export * from './plugin-host.service';
export * from './service-provider';
export * from './tracing';

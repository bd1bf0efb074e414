export * from './aliases';
export * as protocol from './protocol';

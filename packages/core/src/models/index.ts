export * from './paths';
export * from './metadata';
export * from './link';
export * from './targets';
export { JsonLink, JsonTargets } from './formats';

export * from './flow-fields';
export * from './flow-meter-reading';

export * from './errors';
export * from './signature';
export * from './coerce';
export * from './variant';
export * from './variantJson';
export * from './valueNode';
export * from './decompose';
export * from './recompose';
export * from './metadata';
export * from './pathUtils';
export * from './notifier';
export * from './config';
export * from './schema';
export * from './backend';
export * from './settingsTree';

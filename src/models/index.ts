export * from './entry';
export * from './tag';

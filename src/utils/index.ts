export * from './ErrorHandler';
export * from './StagedStore';
export * from './logger';
export * from './unitMath';

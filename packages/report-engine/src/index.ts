export * from './aggregate';
export * from './aggregators';
export * from './context';
export * from './errors';
export * from './fanOut';
export * from './identifiers';
export * from './logger';
export * from './normalize';
export * from './pagination';
export * from './records';
export * from './reporter';
export * from './treeWalker';
export * from './waitGroup';
export * from './workerPool';

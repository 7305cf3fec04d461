import { ServiceCollection } from './collection';

export * from './types';
export * from './errors';
export * from './descriptor';
export * from './collection';
export * from './provider';
export * from './utils';

export default ServiceCollection;

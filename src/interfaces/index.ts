export * from './job';
export * from './instance';
export * from './compute';
export * from './remote-ssh';
export * from './config';

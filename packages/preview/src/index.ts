export * from './config';
export * from './scene';
export * from './render';
export * from './svg';

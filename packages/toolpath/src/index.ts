export * from './feed';
export * from './leadIn';
export * from './prepare';
export * from './cutPath';

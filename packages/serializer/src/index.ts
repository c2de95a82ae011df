export * from './gcode';
export * from './subroutines';
export * from './bodies';
export * from './program';
export * from './config';

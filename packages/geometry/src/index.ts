export * from './primitives';
export * from './patterns';
export * from './hexagon';
export * from './compensation';
export * from './arcs';
export * from './corners';
export * from './multipass';
export * from './tubeVoid';

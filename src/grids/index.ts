export * from './directions';
export * from './coords';
export * from './rectangles';

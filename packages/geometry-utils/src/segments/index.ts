export { default as CubicSegment } from './cubic-segment';
export { default as QuadraticSegment } from './quadratic-segment';

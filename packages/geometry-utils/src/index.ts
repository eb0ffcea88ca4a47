export { flattenSubPath, flattenSegment, cleanPolyline } from './flatten';
export { signedArea, pointInContour, groupContours } from './contours';
export { tessellate, tessellateFill, createEmptyMesh } from './tessellator';
export { resolveContours } from './contour-resolver';
export { buildStrokeMesh } from './stroke-mesh';
export { getPolylineLength, slicePolyline, getPointAtLength } from './polyline';
export { getBoundingBox, polygonArea } from './bounding-box';
export { DEFAULT_RESOLUTION, DEFAULT_FILL_OPTIONS } from './constants';
export { FILL_RULE } from './types';
export type { Polyline, Mesh, BoundingBox, FlattenOptions, FillOptions, ContourGroup } from './types';
